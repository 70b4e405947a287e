import { writeFileSync } from 'node:fs';
import { availableParallelism } from 'node:os';

import { DEFAULT_CANVAS_SIZE, DEFAULT_PARAMETERS } from '../src/projection/parameters.js';
import { modelFromParameters } from '../src/projection/projectionModel.js';
import { createInlineExecutor, type RenderExecutor } from '../src/raster/executor.js';
import { createRgbImage, setPixel, type RgbImage } from '../src/raster/rgbImage.js';
import { createRasterWorkerPool } from '../src/raster/workerPool.js';
import { RenderWatchdog, type RenderWatchdogSnapshot } from '../src/runtime/renderWatchdog.js';
import { digestRgbImage } from '../src/serialization/canonicalJson.js';

const SOURCE_DIM = { width: 2048, height: 1024 } as const;
const PASSES = 8;

const createGradientPanorama = (width: number, height: number): RgbImage => {
  const image = createRgbImage(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      setPixel(image, x, y, [
        Math.floor((x / width) * 255),
        Math.floor((y / height) * 255),
        (x ^ y) & 0xff,
      ]);
    }
  }
  return image;
};

type BenchmarkRun = {
  executor: RenderExecutor['kind'];
  workers: number;
  outputDigest: string;
  snapshot: RenderWatchdogSnapshot;
};

const runPasses = async (executor: RenderExecutor, workers: number, source: RgbImage) => {
  const watchdog = new RenderWatchdog({}, { label: `bench:${executor.kind}`, historySize: PASSES });
  const pixels = DEFAULT_CANVAS_SIZE.width * DEFAULT_CANVAS_SIZE.height;
  let digest = '';
  try {
    for (let pass = 0; pass < PASSES; pass++) {
      const model = modelFromParameters(
        { ...DEFAULT_PARAMETERS, rotation: [0, 0.09, (pass / PASSES) * Math.PI] },
        SOURCE_DIM,
        DEFAULT_CANVAS_SIZE,
      );
      watchdog.beginPass(pass);
      const output = await executor.render(source, model);
      watchdog.endPass(pixels);
      digest = digestRgbImage(output);
    }
  } finally {
    await executor.close();
  }
  const run: BenchmarkRun = {
    executor: executor.kind,
    workers,
    outputDigest: digest,
    snapshot: watchdog.snapshot(),
  };
  return run;
};

const main = async () => {
  const outputPath = process.argv[2];
  const source = createGradientPanorama(SOURCE_DIM.width, SOURCE_DIM.height);
  const workers = Math.max(1, availableParallelism() - 1);

  const runs = [
    await runPasses(createInlineExecutor(), 1, source),
    await runPasses(createRasterWorkerPool({ size: workers }), workers, source),
  ];
  if (runs[0].outputDigest !== runs[1].outputDigest) {
    throw new Error('Worker pool output differs from the inline rasterizer');
  }

  for (const run of runs) {
    console.log(
      `[benchmark] ${run.executor} (${run.workers} worker${run.workers === 1 ? '' : 's'}): ` +
        `${run.snapshot.passMsAvg.toFixed(1)}ms avg, ${run.snapshot.passMsMax.toFixed(1)}ms max, ` +
        `${run.snapshot.megapixelsPerSecondAvg.toFixed(2)} MP/s`,
    );
  }

  if (outputPath) {
    const payload = {
      timestamp: new Date().toISOString(),
      source: SOURCE_DIM,
      canvas: DEFAULT_CANVAS_SIZE,
      passes: PASSES,
      runs,
    };
    writeFileSync(outputPath, JSON.stringify(payload, null, 2));
    console.log(`[benchmark] wrote ${outputPath}`);
  }
};

main().catch((error: unknown) => {
  console.error('[benchmark] failed', error);
  process.exitCode = 1;
});
