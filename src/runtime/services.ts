import { requirePresetFile, resolvePreset } from '../config/presetLoader.js';
import {
  DEFAULT_CANVAS_SIZE,
  DEFAULT_PARAMETERS,
  createCanvasSize,
  withParameters,
  type CanvasSize,
  type ProjectionParameters,
  type ProjectionParametersInput,
} from '../projection/parameters.js';
import { modelFromParameters } from '../projection/projectionModel.js';
import { createInlineExecutor, type RenderExecutor } from '../raster/executor.js';
import { createRasterWorkerPool } from '../raster/workerPool.js';
import { digestRgbImage, hashCanonicalJson } from '../serialization/canonicalJson.js';
import {
  DEFAULT_OUTPUT_NAME,
  decodeImage,
  encodeImage,
  type ImageToolOptions,
} from '../cli/utils/ffmpeg.js';
import { RenderWatchdog, type RenderBudget, type RenderPassSample } from './renderWatchdog.js';

export type RenderConfigRequest = {
  presets?: string;
  preset?: string;
  canvas?: CanvasSize;
  overrides?: ProjectionParametersInput;
};

export type ResolvedRenderConfig = {
  canvas: CanvasSize;
  parameters: ProjectionParameters;
  presets: string | null;
  preset: string | null;
};

export const resolveRenderConfig = async (
  request: RenderConfigRequest,
): Promise<ResolvedRenderConfig> => {
  let canvas = DEFAULT_CANVAS_SIZE;
  let parameters = DEFAULT_PARAMETERS;
  let presetId: string | null = null;
  if (request.presets) {
    const config = await requirePresetFile(request.presets);
    const resolved = resolvePreset(config, request.preset);
    canvas = resolved.canvas;
    parameters = resolved.parameters;
    presetId = resolved.presetId;
  } else if (request.preset) {
    throw new Error(`--preset "${request.preset}" requires a presets file`);
  }
  if (request.canvas) {
    canvas = createCanvasSize(request.canvas.width, request.canvas.height);
  }
  if (request.overrides) {
    parameters = withParameters(parameters, request.overrides);
  }
  return { canvas, parameters, presets: request.presets ?? null, preset: presetId };
};

export type RenderFileOptions = RenderConfigRequest & {
  input: string;
  output?: string;
  /** 1 renders on the main thread; more spins up a worker pool for the pass. */
  workers?: number;
  budget?: RenderBudget;
  io?: ImageToolOptions;
  executor?: RenderExecutor;
};

export type RenderFileResult = {
  input: string;
  output: string;
  source: { width: number; height: number };
  canvas: CanvasSize;
  presets: string | null;
  preset: string | null;
  parameters: ProjectionParameters;
  radius: number;
  executor: RenderExecutor['kind'];
  parametersDigest: string;
  outputDigest: string;
  performance: RenderPassSample;
  budgetViolations: number;
};

export const renderFile = async (options: RenderFileOptions): Promise<RenderFileResult> => {
  const config = await resolveRenderConfig(options);
  const source = await decodeImage(options.input, options.io);
  const model = modelFromParameters(
    config.parameters,
    { width: source.width, height: source.height },
    config.canvas,
  );

  const executor =
    options.executor ??
    ((options.workers ?? 1) > 1
      ? createRasterWorkerPool({ size: options.workers })
      : createInlineExecutor());
  const watchdog = new RenderWatchdog(options.budget, { label: 'render-file', historySize: 1 });
  const renderOnce = async () => {
    try {
      return await executor.render(source, model);
    } finally {
      if (!options.executor) {
        await executor.close();
      }
    }
  };
  watchdog.beginPass(0);
  const image = await renderOnce();
  const performance = watchdog.endPass(config.canvas.width * config.canvas.height);

  const output = options.output ?? DEFAULT_OUTPUT_NAME;
  await encodeImage(image, output, options.io);

  return {
    input: options.input,
    output,
    source: { width: source.width, height: source.height },
    canvas: config.canvas,
    presets: config.presets,
    preset: config.preset,
    parameters: config.parameters,
    radius: model.radius,
    executor: executor.kind,
    parametersDigest: hashCanonicalJson({ canvas: config.canvas, ...config.parameters }).hash,
    outputDigest: digestRgbImage(image),
    performance,
    budgetViolations: watchdog.snapshot().violations.length,
  };
};

export type ProjectPointOptions = RenderConfigRequest & {
  x: number;
  y: number;
  image: CanvasSize;
};

export type ProjectPointResult = {
  canvas: CanvasSize;
  image: CanvasSize;
  pixel: [number, number];
  source: [number, number];
  radius: number;
};

export const projectPoint = async (options: ProjectPointOptions): Promise<ProjectPointResult> => {
  const config = await resolveRenderConfig(options);
  const model = modelFromParameters(config.parameters, options.image, config.canvas);
  const [col, row] = model.project(options.x, options.y);
  return {
    canvas: config.canvas,
    image: model.imageSize,
    pixel: [options.x, options.y],
    source: [col, row],
    radius: model.radius,
  };
};
