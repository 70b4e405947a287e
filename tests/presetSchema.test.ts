import assert from 'node:assert/strict';
import test from 'node:test';

import {
  loadPresetFile,
  loadPresetFromJson,
  requirePresetFile,
  resolvePreset,
} from '../src/config/presetLoader.js';
import {
  PRESET_SCHEMA_VERSION,
  PresetValidationError,
  validatePresetFile,
} from '../src/config/presetSchema.js';
import { DEFAULT_CANVAS_SIZE, DEFAULT_PARAMETERS } from '../src/projection/parameters.js';

const basePayload = () => ({
  schemaVersion: PRESET_SCHEMA_VERSION,
  metadata: { name: 'Fixture presets' },
  canvas: { width: 400, height: 400 },
  defaults: { offset: [0.5, 0.5], rotation: [0, 0, 0], scale: 1 },
  presets: [
    { id: 'flat', scale: 2 },
    { id: 'spun', label: 'Spun', rotation: [0, 0, 1] },
  ],
});

test('valid preset files normalise presets against the defaults', () => {
  const { config, issues } = validatePresetFile(basePayload());
  assert.equal(issues.length, 0);
  assert.equal(config.metadata.name, 'Fixture presets');
  assert.deepEqual(config.canvas, { width: 400, height: 400 });
  assert.equal(config.presets[0].label, 'flat');
  assert.deepEqual(config.presets[0].parameters.offset, [0.5, 0.5]);
  assert.equal(config.presets[0].parameters.scale, 2);
  assert.deepEqual(config.presets[1].parameters.rotation, [0, 0, 1]);
  assert.equal(config.presets[1].parameters.scale, 1);
});

test('preset parameters are immutable values', () => {
  const { config } = validatePresetFile(basePayload());
  const all = [config.defaults, ...config.presets.map((preset) => preset.parameters)];
  for (const parameters of all) {
    assert.ok(Object.isFrozen(parameters));
    assert.ok(Object.isFrozen(parameters.offset));
    assert.ok(Object.isFrozen(parameters.rotation));
  }
});

test('missing sections fall back to built-in defaults with warnings', () => {
  const { config, issues } = validatePresetFile({ schemaVersion: '1.2.0' });
  assert.equal(config.metadata.name, 'Untitled presets');
  assert.deepEqual(config.canvas, DEFAULT_CANVAS_SIZE);
  assert.equal(config.defaults, DEFAULT_PARAMETERS);
  assert.deepEqual(config.presets, []);
  assert.deepEqual(
    issues.map((issue) => [issue.code, issue.severity]),
    [['metadata/name', 'warning']],
  );
});

test('out-of-range values and non-square canvases only warn', () => {
  const payload = {
    ...basePayload(),
    canvas: { width: 640, height: 480 },
    defaults: { offset: [2, 0], scale: 8 },
  };
  const { issues } = validatePresetFile(payload);
  assert.deepEqual(
    issues.map((issue) => ({ code: issue.code, path: issue.path, severity: issue.severity })),
    [
      { code: 'canvas/non-square', path: ['canvas'], severity: 'warning' },
      { code: 'parameters/offset-range', path: ['defaults', 'offset', 0], severity: 'warning' },
      { code: 'parameters/scale-range', path: ['defaults', 'scale'], severity: 'warning' },
    ],
  );
});

test('errors are collected and reported together', () => {
  const payload = {
    ...basePayload(),
    schemaVersion: '2.0.0',
    presets: [{ id: 'a' }, { id: 'a' }, { label: 'no id' }, { id: 'neg', scale: -1 }],
  };
  assert.throws(
    () => validatePresetFile(payload),
    (error: unknown) => {
      assert.ok(error instanceof PresetValidationError);
      assert.equal(
        error.message,
        'Preset file has 4 error(s): Unsupported schema major version 2.0.0',
      );
      assert.deepEqual(
        error.issues.map((issue) => issue.code),
        ['preset-file/schemaVersion', 'preset/duplicate', 'preset/id', 'parameters/scale'],
      );
      return true;
    },
  );
});

test('non-object roots fail immediately', () => {
  assert.throws(() => validatePresetFile([]), {
    name: 'PresetValidationError',
    message: 'Preset file root must be an object',
  });
});

test('loadPresetFromJson reports parse failures as results', async () => {
  const result = await loadPresetFromJson('{ nope', 'broken.json');
  assert.equal(result.kind, 'error');
  assert.equal(result.sourceName, 'broken.json');
  assert.equal(result.issues, undefined);
});

test('the bundled sample presets validate', async () => {
  const result = await loadPresetFile('public/presets.json');
  assert.equal(result.kind, 'success');
  if (result.kind !== 'success') return;
  assert.equal(result.sourceName, 'presets.json');
  assert.deepEqual(
    result.config.presets.map((preset) => preset.id),
    ['tiny-planet', 'wide-horizon', 'tunnel'],
  );
  // the tunnel yaw sits just past the rotation control range
  assert.deepEqual(
    result.issues.map((issue) => [issue.code, issue.path]),
    [['parameters/rotation-range', ['presets', 2, 'rotation', 2]]],
  );
  assert.deepEqual(result.config.presets[2].parameters.offset, [0, 0.4]);
});

test('resolvePreset selects defaults or a named preset', async () => {
  const config = await requirePresetFile('public/presets.json');
  const defaults = resolvePreset(config);
  assert.equal(defaults.presetId, null);
  assert.equal(defaults.parameters, config.defaults);

  const tiny = resolvePreset(config, 'tiny-planet');
  assert.equal(tiny.presetId, 'tiny-planet');
  assert.equal(tiny.parameters.scale, 1);

  assert.throws(() => resolvePreset(config, 'missing'), {
    name: 'PresetValidationError',
    message: 'Unknown preset "missing" (available: tiny-planet, wide-horizon, tunnel)',
  });
});
