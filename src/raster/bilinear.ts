import { RGB_CHANNELS, type Rgb, type RgbImage } from './rgbImage.js';

/** Floors a fractional coordinate into `[0, size - 1]`; NaN and negatives land on 0. */
const toIndex = (value: number, size: number): number =>
  value > 0 ? Math.min(Math.floor(value), size - 1) : 0;

const clampCoordinate = (value: number, size: number): number =>
  value > 0 ? Math.min(value, size - 1) : 0;

/**
 * Weighted blend of two channel values, truncated to an integer. With `w1 + w2 === 0` the two
 * neighbours coincide (image border) and `q1` is returned as is. Written as an interpolation
 * from `q1` so equal samples come back unchanged.
 */
export const blendChannel = (q1: number, w1: number, q2: number, w2: number): number => {
  const total = w1 + w2;
  if (total === 0) {
    return q1;
  }
  return Math.trunc(q1 + (q2 - q1) * (w2 / total));
};

/**
 * Samples `image` at a fractional coordinate. Horizontal blends are truncated to 8 bits before
 * the vertical blend. Coordinates at or past an edge return the edge pixel.
 */
export const sampleBilinear = (image: RgbImage, x: number, y: number): Rgb => {
  const out: [number, number, number] = [0, 0, 0];
  sampleBilinearInto(image, x, y, out, 0);
  return out;
};

/** Allocation-free variant used by the rasterizer; writes three channels at `offset`. */
export const sampleBilinearInto = (
  image: RgbImage,
  x: number,
  y: number,
  out: { [index: number]: number },
  offset: number,
): void => {
  const { width, height, data } = image;
  const x1 = toIndex(x, width);
  const y1 = toIndex(y, height);
  const x2 = Math.min(x1 + 1, width - 1);
  const y2 = Math.min(y1 + 1, height - 1);

  const cx = clampCoordinate(x, width);
  const cy = clampCoordinate(y, height);
  const wx1 = x2 - cx;
  const wx2 = cx - x1;
  const wy1 = y2 - cy;
  const wy2 = cy - y1;

  const i11 = (y1 * width + x1) * RGB_CHANNELS;
  const i21 = (y1 * width + x2) * RGB_CHANNELS;
  const i12 = (y2 * width + x1) * RGB_CHANNELS;
  const i22 = (y2 * width + x2) * RGB_CHANNELS;

  for (let c = 0; c < RGB_CHANNELS; c++) {
    const r1 = blendChannel(data[i11 + c], wx1, data[i21 + c], wx2);
    const r2 = blendChannel(data[i12 + c], wx1, data[i22 + c], wx2);
    out[offset + c] = blendChannel(r1, wy1, r2, wy2);
  }
};
