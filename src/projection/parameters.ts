import type { EulerAngles } from '../math/rotation.js';
import type { Vec2 } from '../math/vector.js';
import { ProjectionConfigError, assertDimensions } from './errors.js';

export type ProjectionParameters = {
  readonly offset: Vec2;
  readonly rotation: EulerAngles;
  readonly scale: number;
};

export type ProjectionParametersInput = {
  offset?: readonly number[];
  rotation?: readonly number[];
  scale?: number;
};

export type CanvasSize = {
  readonly width: number;
  readonly height: number;
};

export type ParameterRange = {
  readonly min: number;
  readonly max: number;
};

/**
 * Slider ranges of the interactive control surface. The core never clamps to them. Note the
 * offset range is [-1, 1] while the recentring formula treats 0.5 as "no shift".
 */
export const PARAMETER_RANGES = {
  offset: { min: -1, max: 1 },
  rotation: { min: 0, max: Math.PI },
  scale: { min: 0.1, max: 5 },
} as const satisfies Record<string, ParameterRange>;

export const DEFAULT_CANVAS_SIZE: CanvasSize = Object.freeze({ width: 600, height: 600 });

export const DEFAULT_PARAMETERS: ProjectionParameters = Object.freeze({
  offset: Object.freeze([0, 0.4] as const),
  rotation: Object.freeze([0, 0.09, 0] as const),
  scale: 1.5,
});

const readPair = (value: readonly number[] | undefined, fallback: Vec2): Vec2 => {
  if (value === undefined) {
    return fallback;
  }
  if (value.length !== 2 || !value.every(Number.isFinite)) {
    throw new ProjectionConfigError(
      'offset/non-finite',
      `Offset must be two finite numbers (received ${JSON.stringify(value)})`,
    );
  }
  return [value[0], value[1]];
};

const readAngles = (value: readonly number[] | undefined, fallback: EulerAngles): EulerAngles => {
  if (value === undefined) {
    return fallback;
  }
  if (value.length !== 3 || !value.every(Number.isFinite)) {
    throw new ProjectionConfigError(
      'rotation/non-finite',
      `Rotation must be three finite angles (received ${JSON.stringify(value)})`,
    );
  }
  return [value[0], value[1], value[2]];
};

export const createProjectionParameters = (
  input: ProjectionParametersInput = {},
  base: ProjectionParameters = DEFAULT_PARAMETERS,
): ProjectionParameters => {
  const scale = input.scale ?? base.scale;
  if (!Number.isFinite(scale)) {
    throw new ProjectionConfigError(
      'scale/non-positive',
      `Scale must be finite (received ${scale})`,
    );
  }
  return Object.freeze({
    offset: Object.freeze(readPair(input.offset, base.offset)),
    rotation: Object.freeze(readAngles(input.rotation, base.rotation)),
    scale,
  });
};

export const withParameters = (
  base: ProjectionParameters,
  patch: ProjectionParametersInput,
): ProjectionParameters => createProjectionParameters(patch, base);

export const parametersEqual = (a: ProjectionParameters, b: ProjectionParameters): boolean =>
  a.scale === b.scale &&
  a.offset[0] === b.offset[0] &&
  a.offset[1] === b.offset[1] &&
  a.rotation[0] === b.rotation[0] &&
  a.rotation[1] === b.rotation[1] &&
  a.rotation[2] === b.rotation[2];

export const createCanvasSize = (width: number, height: number): CanvasSize => {
  assertDimensions('Canvas', width, height);
  return Object.freeze({ width, height });
};

export const parseCanvasSize = (text: string): CanvasSize | null => {
  const match = /^(\d+)x(\d+)$/i.exec(text.trim());
  if (!match) {
    return null;
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width < 1 || height < 1) {
    return null;
  }
  return { width, height };
};
