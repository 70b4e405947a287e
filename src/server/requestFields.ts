import type { CanvasSize, ProjectionParametersInput } from '../projection/parameters.js';

export type JsonValue = Record<string, unknown>;

/** Malformed request payload; reported to the client as a 400. */
export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const optionalString = (body: JsonValue, key: string): string | undefined => {
  const value = body[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new RequestError(`"${key}" must be a string`);
  }
  return value;
};

export const requireNumber = (body: JsonValue, key: string): number => {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RequestError(`"${key}" must be a finite number`);
  }
  return value;
};

const optionalNumbers = (body: JsonValue, key: string, size: number): number[] | undefined => {
  const value = body[key];
  if (value === undefined) {
    return undefined;
  }
  if (
    !Array.isArray(value) ||
    value.length !== size ||
    !value.every((entry) => typeof entry === 'number' && Number.isFinite(entry))
  ) {
    throw new RequestError(`"${key}" must be an array of ${size} finite numbers`);
  }
  return value.map(Number);
};

export const readSize = (value: unknown, key: string): CanvasSize => {
  if (
    !isRecord(value) ||
    typeof value.width !== 'number' ||
    typeof value.height !== 'number'
  ) {
    throw new RequestError(`"${key}" must be an object with numeric width and height`);
  }
  return { width: value.width, height: value.height };
};

export const readParameterPatch = (body: JsonValue): ProjectionParametersInput => {
  const patch: ProjectionParametersInput = {};
  const offset = optionalNumbers(body, 'offset', 2);
  if (offset) {
    patch.offset = offset;
  }
  const rotation = optionalNumbers(body, 'rotation', 3);
  if (rotation) {
    patch.rotation = rotation;
  }
  if (body.scale !== undefined) {
    patch.scale = requireNumber(body, 'scale');
  }
  return patch;
};
