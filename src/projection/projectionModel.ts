import {
  identityRotation,
  isRotation3,
  rotateVector,
  rotationFromAngles,
  type Rotation3,
} from '../math/rotation.js';
import {
  normalize3,
  normSquared2,
  renormalizeFast,
  type Vec2,
  type Vec3,
} from '../math/vector.js';
import { ProjectionConfigError, assertDimensions } from './errors.js';
import type { CanvasSize, ProjectionParameters } from './parameters.js';

const TAU = Math.PI * 2;

export type ProjectionModelInput = {
  imageSize: CanvasSize;
  canvasSize: CanvasSize;
  offset: Vec2;
  rotation?: Rotation3;
  scale: number;
};

/** Plain-data form of a model; survives `postMessage` into a worker thread. */
export type ProjectionModelSnapshot = {
  readonly imageSize: CanvasSize;
  readonly canvasSize: CanvasSize;
  readonly offset: Vec2;
  readonly rotation: Rotation3;
  readonly scale: number;
};

export class ProjectionModel {
  readonly radius: number;
  readonly imageSize: CanvasSize;
  readonly canvasSize: CanvasSize;
  readonly offset: Vec2;
  readonly rotation: Rotation3;
  readonly scale: number;
  private readonly shiftX: number;
  private readonly shiftY: number;

  constructor(input: ProjectionModelInput) {
    assertDimensions('Source image', input.imageSize.width, input.imageSize.height);
    assertDimensions('Canvas', input.canvasSize.width, input.canvasSize.height);
    if (!Number.isFinite(input.scale) || input.scale <= 0) {
      throw new ProjectionConfigError(
        'scale/non-positive',
        `Scale must be a positive finite number (received ${input.scale})`,
      );
    }
    if (!Number.isFinite(input.offset[0]) || !Number.isFinite(input.offset[1])) {
      throw new ProjectionConfigError(
        'offset/non-finite',
        `Offset must be finite (received ${input.offset[0]}, ${input.offset[1]})`,
      );
    }
    const rotation = input.rotation ?? identityRotation();
    if (!isRotation3(rotation)) {
      throw new ProjectionConfigError('rotation/non-finite', 'Rotation matrix must be finite');
    }

    this.imageSize = { width: input.imageSize.width, height: input.imageSize.height };
    this.canvasSize = { width: input.canvasSize.width, height: input.canvasSize.height };
    this.offset = [input.offset[0], input.offset[1]];
    this.rotation = rotation;
    this.scale = input.scale;
    this.radius = (Math.min(this.canvasSize.width, this.canvasSize.height) / 10) * input.scale;
    this.shiftX = (this.offset[0] - 0.5) * this.canvasSize.width;
    this.shiftY = (this.offset[1] - 0.5) * this.canvasSize.height;
  }

  /** Maps a canvas pixel to a fractional source-image coordinate `[col, row]`. */
  project(x: number, y: number): Vec2 {
    const planar: Vec2 = [x + this.shiftX, y + this.shiftY];
    const onSphere = this.planeToSphere(planar);
    const rotated = rotateVector(this.rotation, onSphere);
    return this.sphereToImage(rotated);
  }

  /** Inverse stereographic projection; the plane origin lands on `(0, 0, 1)`. */
  planeToSphere(p: Vec2): Vec3 {
    const r2 = this.radius * this.radius;
    const k = (2 * r2) / (normSquared2(p) + r2);
    return normalize3([k * p[0], k * p[1], (k - 1) * this.radius]);
  }

  sphereToImage(v: Vec3): Vec2 {
    const unit = renormalizeFast(v);
    // rounding can leave z a hair outside [-1, 1]
    const row = Math.acos(Math.min(1, Math.max(-1, unit[2]))) / Math.PI;
    const col = Math.atan2(unit[0], unit[1]) / TAU + 0.5;
    return [col * this.imageSize.width, row * this.imageSize.height];
  }

  toSnapshot(): ProjectionModelSnapshot {
    return {
      imageSize: this.imageSize,
      canvasSize: this.canvasSize,
      offset: this.offset,
      rotation: this.rotation,
      scale: this.scale,
    };
  }
}

export const createProjectionModel = (input: ProjectionModelInput): ProjectionModel =>
  new ProjectionModel(input);

export const projectionModelFromSnapshot = (
  snapshot: ProjectionModelSnapshot,
): ProjectionModel => new ProjectionModel(snapshot);

export const modelFromParameters = (
  parameters: ProjectionParameters,
  imageSize: CanvasSize,
  canvasSize: CanvasSize,
): ProjectionModel =>
  new ProjectionModel({
    imageSize,
    canvasSize,
    offset: parameters.offset,
    rotation: rotationFromAngles(parameters.rotation),
    scale: parameters.scale,
  });
