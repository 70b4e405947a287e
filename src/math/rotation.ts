import { ProjectionConfigError } from '../projection/errors.js';
import type { Vec3 } from './vector.js';

/** Row-major 3x3 rotation matrix. */
export type Rotation3 = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
];

export type EulerAngles = readonly [roll: number, pitch: number, yaw: number];

export const identityRotation = (): Rotation3 => [1, 0, 0, 0, 1, 0, 0, 0, 1];

/**
 * Builds `Rz(yaw) * Ry(pitch) * Rx(roll)`: roll about X is applied first, yaw about Z last.
 */
export const rotationFromEulerAngles = (roll: number, pitch: number, yaw: number): Rotation3 => {
  if (!Number.isFinite(roll) || !Number.isFinite(pitch) || !Number.isFinite(yaw)) {
    throw new ProjectionConfigError(
      'rotation/non-finite',
      `Rotation angles must be finite (received ${roll}, ${pitch}, ${yaw})`,
    );
  }
  const sr = Math.sin(roll);
  const cr = Math.cos(roll);
  const sp = Math.sin(pitch);
  const cp = Math.cos(pitch);
  const sy = Math.sin(yaw);
  const cy = Math.cos(yaw);
  return [
    cy * cp,
    cy * sp * sr - sy * cr,
    cy * sp * cr + sy * sr,
    sy * cp,
    sy * sp * sr + cy * cr,
    sy * sp * cr - cy * sr,
    -sp,
    cp * sr,
    cp * cr,
  ];
};

export const rotationFromAngles = (angles: EulerAngles): Rotation3 =>
  rotationFromEulerAngles(angles[0], angles[1], angles[2]);

export const rotateVector = (r: Rotation3, v: Vec3): Vec3 => [
  r[0] * v[0] + r[1] * v[1] + r[2] * v[2],
  r[3] * v[0] + r[4] * v[1] + r[5] * v[2],
  r[6] * v[0] + r[7] * v[1] + r[8] * v[2],
];

/** `a * b`: the result applies `b` first, then `a`. */
export const multiplyRotations = (a: Rotation3, b: Rotation3): Rotation3 => {
  const out: number[] = new Array(9).fill(0);
  for (let row = 0; row < 3; row++) {
    for (let col = 0; col < 3; col++) {
      let sum = 0;
      for (let k = 0; k < 3; k++) {
        sum += a[row * 3 + k] * b[k * 3 + col];
      }
      out[row * 3 + col] = sum;
    }
  }
  return [out[0], out[1], out[2], out[3], out[4], out[5], out[6], out[7], out[8]];
};

export const invertRotation = (r: Rotation3): Rotation3 => [
  r[0],
  r[3],
  r[6],
  r[1],
  r[4],
  r[7],
  r[2],
  r[5],
  r[8],
];

export const isRotation3 = (value: unknown): value is Rotation3 =>
  Array.isArray(value) &&
  value.length === 9 &&
  value.every((entry) => typeof entry === 'number' && Number.isFinite(entry));
