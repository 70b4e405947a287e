export type Vec2 = readonly [number, number];
export type Vec3 = readonly [number, number, number];

export const normSquared2 = (v: Vec2): number => v[0] * v[0] + v[1] * v[1];

export const normSquared3 = (v: Vec3): number => v[0] * v[0] + v[1] * v[1] + v[2] * v[2];

export const norm3 = (v: Vec3): number => Math.sqrt(normSquared3(v));

export const scale3 = (v: Vec3, factor: number): Vec3 => [
  v[0] * factor,
  v[1] * factor,
  v[2] * factor,
];

export const normalize3 = (v: Vec3): Vec3 => {
  const length = norm3(v);
  return length > 0 ? scale3(v, 1 / length) : v;
};

/**
 * One Newton step towards unit length. Only meaningful for vectors already close to the unit
 * sphere; it counters rounding drift after a rotation without a square root.
 */
export const renormalizeFast = (v: Vec3): Vec3 => scale3(v, 0.5 * (3 - normSquared3(v)));

export const parseVec2 = (text: string): Vec2 | null => {
  const parts = text.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 2 || parts.some((part) => !Number.isFinite(part))) {
    return null;
  }
  return [parts[0], parts[1]];
};

export const parseVec3 = (text: string): Vec3 | null => {
  const parts = text.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 3 || parts.some((part) => !Number.isFinite(part))) {
    return null;
  }
  return [parts[0], parts[1], parts[2]];
};
