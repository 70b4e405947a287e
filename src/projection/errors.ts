export type ProjectionConfigErrorCode =
  | 'dimensions/invalid'
  | 'dimensions/mismatch'
  | 'scale/non-positive'
  | 'offset/non-finite'
  | 'rotation/non-finite'
  | 'image/buffer-length';

export class ProjectionConfigError extends Error {
  readonly code: ProjectionConfigErrorCode;

  constructor(code: ProjectionConfigErrorCode, message: string) {
    super(message);
    this.name = 'ProjectionConfigError';
    this.code = code;
  }
}

export const isPositiveInteger = (value: number): boolean =>
  Number.isInteger(value) && value >= 1;

export const assertDimensions = (label: string, width: number, height: number): void => {
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new ProjectionConfigError(
      'dimensions/invalid',
      `${label} dimensions must be positive integers (received ${width}x${height})`,
    );
  }
};
