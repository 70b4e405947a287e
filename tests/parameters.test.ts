import assert from 'node:assert/strict';
import test from 'node:test';

import { parseVec2, parseVec3 } from '../src/math/vector.js';
import { ProjectionConfigError } from '../src/projection/errors.js';
import {
  DEFAULT_CANVAS_SIZE,
  DEFAULT_PARAMETERS,
  createCanvasSize,
  createProjectionParameters,
  parametersEqual,
  parseCanvasSize,
  withParameters,
} from '../src/projection/parameters.js';

const hasCode = (code: string) => (error: unknown) =>
  error instanceof ProjectionConfigError && error.code === code;

test('defaults match the interactive starting point', () => {
  assert.deepEqual(DEFAULT_CANVAS_SIZE, { width: 600, height: 600 });
  assert.deepEqual(DEFAULT_PARAMETERS.offset, [0, 0.4]);
  assert.deepEqual(DEFAULT_PARAMETERS.rotation, [0, 0.09, 0]);
  assert.equal(DEFAULT_PARAMETERS.scale, 1.5);
  assert.equal(Object.isFrozen(DEFAULT_PARAMETERS), true);
});

test('withParameters patches only the supplied fields', () => {
  const next = withParameters(DEFAULT_PARAMETERS, { scale: 2, offset: [0.5, 0.5] });
  assert.deepEqual(next.offset, [0.5, 0.5]);
  assert.deepEqual(next.rotation, [0, 0.09, 0]);
  assert.equal(next.scale, 2);
  assert.equal(DEFAULT_PARAMETERS.scale, 1.5);
});

test('malformed parameters raise typed errors', () => {
  assert.throws(() => createProjectionParameters({ offset: [1] }), hasCode('offset/non-finite'));
  assert.throws(
    () => createProjectionParameters({ rotation: [0, Number.NaN, 0] }),
    hasCode('rotation/non-finite'),
  );
  assert.throws(
    () => createProjectionParameters({ scale: Number.POSITIVE_INFINITY }),
    hasCode('scale/non-positive'),
  );
});

test('parametersEqual compares every component', () => {
  const same = createProjectionParameters({}, DEFAULT_PARAMETERS);
  assert.equal(parametersEqual(same, DEFAULT_PARAMETERS), true);
  assert.equal(parametersEqual(withParameters(same, { rotation: [0, 0.09, 0.1] }), same), false);
});

test('canvas sizes parse from WIDTHxHEIGHT', () => {
  assert.deepEqual(parseCanvasSize('640x480'), { width: 640, height: 480 });
  assert.deepEqual(parseCanvasSize(' 32X16 '), { width: 32, height: 16 });
  assert.equal(parseCanvasSize('0x5'), null);
  assert.equal(parseCanvasSize('wide'), null);
  assert.throws(() => createCanvasSize(0, 5), hasCode('dimensions/invalid'));
  assert.throws(() => createCanvasSize(2.5, 5), hasCode('dimensions/invalid'));
});

test('vectors parse from comma separated text', () => {
  assert.deepEqual(parseVec2('0.1, -0.2'), [0.1, -0.2]);
  assert.deepEqual(parseVec3('1,2,3'), [1, 2, 3]);
  assert.equal(parseVec2('1,2,3'), null);
  assert.equal(parseVec3('1,x,3'), null);
});
