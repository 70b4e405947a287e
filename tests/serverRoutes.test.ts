import assert from 'node:assert/strict';
import test from 'node:test';

import { UnsupportedInputError } from '../src/cli/utils/ffmpeg.js';
import type { PresetLoadResult } from '../src/config/presetLoader.js';
import { ProjectionConfigError } from '../src/projection/errors.js';
import { DEFAULT_CANVAS_SIZE, DEFAULT_PARAMETERS } from '../src/projection/parameters.js';
import type {
  ProjectPointOptions,
  ProjectPointResult,
  RenderFileOptions,
  RenderFileResult,
} from '../src/runtime/services.js';
import { routeRequest, type RouteServices } from '../src/server/routes.js';

const renderSummary = (options: RenderFileOptions): RenderFileResult => ({
  input: options.input,
  output: options.output ?? 'output.png',
  source: { width: 64, height: 32 },
  canvas: DEFAULT_CANVAS_SIZE,
  presets: null,
  preset: null,
  parameters: DEFAULT_PARAMETERS,
  radius: 90,
  executor: 'inline',
  parametersDigest: 'params-digest',
  outputDigest: 'output-digest',
  performance: {
    passIndex: 0,
    passMs: 5,
    pixels: 360_000,
    megapixelsPerSecond: 72,
    rssMb: 80,
    heapMb: 20,
    cpuPercent: 90,
  },
  budgetViolations: 0,
});

/** Route services that record their inputs instead of touching ffmpeg or the disk. */
const fakeServices = (overrides: Partial<RouteServices> = {}) => {
  const renders: RenderFileOptions[] = [];
  const projections: ProjectPointOptions[] = [];
  const services: RouteServices = {
    renderFile: async (options) => {
      renders.push(options);
      return renderSummary(options);
    },
    projectPoint: async (options): Promise<ProjectPointResult> => {
      projections.push(options);
      return {
        canvas: DEFAULT_CANVAS_SIZE,
        image: options.image,
        pixel: [options.x, options.y],
        source: [12.5, 3.25],
        radius: 90,
      };
    },
    loadPresetFile: async (): Promise<PresetLoadResult> => ({
      kind: 'error',
      message: 'ENOENT',
      issues: undefined,
    }),
    ...overrides,
  };
  return { services, renders, projections };
};

test('GET /health reports ok', async () => {
  const response = await routeRequest('GET', '/health', {});
  assert.deepEqual(response, { status: 200, body: { status: 'ok' } });
});

test('unknown routes return 404', async () => {
  const response = await routeRequest('GET', '/nope', {});
  assert.deepEqual(response, { status: 404, body: { status: 'error', message: 'Not found' } });
});

test('POST /render requires an input path', async () => {
  const { services } = fakeServices();
  const response = await routeRequest('POST', '/render', {}, { services });
  assert.equal(response.status, 400);
  assert.equal(response.body.message, 'render requires an "input" path.');
});

test('POST /render forwards configuration and parameter overrides', async () => {
  const { services, renders } = fakeServices();
  const response = await routeRequest(
    'POST',
    '/render',
    {
      input: 'pano.jpg',
      output: 'planet.png',
      presets: 'presets.json',
      preset: 'tunnel',
      canvas: { width: 320, height: 320 },
      offset: [0.5, 0.5],
      scale: 2,
    },
    { services, workers: 4 },
  );
  assert.equal(response.status, 200);
  assert.equal(response.body.status, 'ok');
  assert.equal(response.body.output, 'planet.png');
  assert.equal(renders.length, 1);
  const [options] = renders;
  assert.equal(options.input, 'pano.jpg');
  assert.equal(options.presets, 'presets.json');
  assert.equal(options.preset, 'tunnel');
  assert.deepEqual(options.canvas, { width: 320, height: 320 });
  assert.deepEqual(options.overrides, { offset: [0.5, 0.5], scale: 2 });
  assert.equal(options.workers, 4);
});

test('malformed parameters are rejected before rendering', async () => {
  const { services, renders } = fakeServices();
  const response = await routeRequest(
    'POST',
    '/render',
    { input: 'pano.jpg', rotation: [0, 1] },
    { services },
  );
  assert.equal(response.status, 400);
  assert.equal(response.body.message, '"rotation" must be an array of 3 finite numbers');
  assert.equal(renders.length, 0);
});

test('projection errors map to 400 with their code', async () => {
  const { services } = fakeServices({
    renderFile: async () => {
      throw new ProjectionConfigError('scale/non-positive', 'Scale must be positive');
    },
  });
  const response = await routeRequest(
    'POST',
    '/render',
    { input: 'pano.jpg', scale: 0 },
    { services },
  );
  assert.deepEqual(response, {
    status: 400,
    body: { status: 'error', message: 'Scale must be positive', code: 'scale/non-positive' },
  });
});

test('unsupported input formats map to 400', async () => {
  const { services } = fakeServices({
    renderFile: async () => {
      throw new UnsupportedInputError('pano.tiff');
    },
  });
  const response = await routeRequest('POST', '/render', { input: 'pano.tiff' }, { services });
  assert.deepEqual(response, {
    status: 400,
    body: {
      status: 'error',
      message:
        'Unsupported input "pano.tiff": expected one of .jpg, .jpeg, .png, .bmp, .gif, .webp',
    },
  });
});

test('unexpected failures map to 500', async () => {
  const { services } = fakeServices({
    renderFile: async () => {
      throw new Error('ffmpeg vanished');
    },
  });
  const response = await routeRequest('POST', '/render', { input: 'pano.jpg' }, { services });
  assert.deepEqual(response, {
    status: 500,
    body: { status: 'error', message: 'ffmpeg vanished' },
  });
});

test('POST /project maps a canvas pixel', async () => {
  const { services, projections } = fakeServices();
  const response = await routeRequest(
    'POST',
    '/project',
    { x: 10, y: 20, image: { width: 64, height: 32 } },
    { services },
  );
  assert.equal(response.status, 200);
  assert.deepEqual(response.body.source, [12.5, 3.25]);
  assert.equal(projections[0].x, 10);
  assert.deepEqual(projections[0].image, { width: 64, height: 32 });
});

test('POST /project validates the pixel', async () => {
  const { services } = fakeServices();
  const response = await routeRequest(
    'POST',
    '/project',
    { y: 20, image: { width: 64, height: 32 } },
    { services },
  );
  assert.equal(response.status, 400);
  assert.equal(response.body.message, '"x" must be a finite number');
});

test('POST /presets/validate summarises inline presets', async () => {
  const response = await routeRequest('POST', '/presets/validate', {
    presets: {
      schemaVersion: '1.0.0',
      metadata: { name: 'Inline' },
      presets: [{ id: 'a' }, { id: 'b', scale: 2 }],
    },
  });
  assert.deepEqual(response, {
    status: 200,
    body: {
      status: 'ok',
      presets: {
        name: 'Inline',
        schemaVersion: '1.0.0',
        canvas: { width: 600, height: 600 },
        ids: ['a', 'b'],
      },
      warnings: [],
    },
  });
});

test('POST /presets/validate reports invalid files', async () => {
  const { services } = fakeServices();
  const inline = await routeRequest('POST', '/presets/validate', {
    presets: { schemaVersion: '1.0.0', presets: [{ id: 'a' }, { id: 'a' }] },
  });
  assert.equal(inline.status, 400);
  assert.equal(inline.body.message, 'Preset file has 1 error(s): Duplicate preset id "a"');

  const fromDisk = await routeRequest(
    'POST',
    '/presets/validate',
    { presetsPath: 'missing.json' },
    { services },
  );
  assert.deepEqual(fromDisk, {
    status: 400,
    body: { status: 'error', message: 'ENOENT', issues: [] },
  });

  const empty = await routeRequest('POST', '/presets/validate', {});
  assert.equal(empty.status, 400);
});
