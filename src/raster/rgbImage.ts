import { ProjectionConfigError, assertDimensions } from '../projection/errors.js';

export type Rgb = readonly [number, number, number];

export type RgbImage = {
  readonly width: number;
  readonly height: number;
  /** Interleaved 8-bit RGB, row-major, `width * height * 3` bytes. */
  readonly data: Uint8Array;
};

export const RGB_CHANNELS = 3;

export const createRgbImage = (width: number, height: number, fill: Rgb = [0, 0, 0]): RgbImage => {
  assertDimensions('Image', width, height);
  const image: RgbImage = { width, height, data: new Uint8Array(width * height * RGB_CHANNELS) };
  if (fill[0] !== 0 || fill[1] !== 0 || fill[2] !== 0) {
    fillRgbImage(image, fill);
  }
  return image;
};

export const wrapRgbImage = (width: number, height: number, data: Uint8Array): RgbImage => {
  assertDimensions('Image', width, height);
  const expected = width * height * RGB_CHANNELS;
  if (data.length !== expected) {
    throw new ProjectionConfigError(
      'image/buffer-length',
      `Expected ${expected} bytes for a ${width}x${height} RGB image, received ${data.length}`,
    );
  }
  return { width, height, data };
};

export const fillRgbImage = (image: RgbImage, color: Rgb): void => {
  const { data } = image;
  for (let i = 0; i < data.length; i += RGB_CHANNELS) {
    data[i] = color[0];
    data[i + 1] = color[1];
    data[i + 2] = color[2];
  }
};

export const getPixel = (image: RgbImage, x: number, y: number): Rgb => {
  const index = (y * image.width + x) * RGB_CHANNELS;
  return [image.data[index], image.data[index + 1], image.data[index + 2]];
};

export const setPixel = (image: RgbImage, x: number, y: number, color: Rgb): void => {
  const index = (y * image.width + x) * RGB_CHANNELS;
  image.data[index] = color[0];
  image.data[index + 1] = color[1];
  image.data[index + 2] = color[2];
};

/** Drops the alpha channel of an RGBA buffer. */
export const rgbImageFromRgba = (width: number, height: number, rgba: Uint8Array): RgbImage => {
  assertDimensions('Image', width, height);
  const texels = width * height;
  if (rgba.length !== texels * 4) {
    throw new ProjectionConfigError(
      'image/buffer-length',
      `Expected ${texels * 4} bytes for a ${width}x${height} RGBA image, received ${rgba.length}`,
    );
  }
  const data = new Uint8Array(texels * RGB_CHANNELS);
  for (let i = 0; i < texels; i++) {
    data[i * 3] = rgba[i * 4];
    data[i * 3 + 1] = rgba[i * 4 + 1];
    data[i * 3 + 2] = rgba[i * 4 + 2];
  }
  return { width, height, data };
};

export const rgbaFromRgbImage = (image: RgbImage, alpha = 255): Uint8ClampedArray => {
  const texels = image.width * image.height;
  const out = new Uint8ClampedArray(texels * 4);
  for (let i = 0; i < texels; i++) {
    out[i * 4] = image.data[i * 3];
    out[i * 4 + 1] = image.data[i * 3 + 1];
    out[i * 4 + 2] = image.data[i * 3 + 2];
    out[i * 4 + 3] = alpha;
  }
  return out;
};

export const cloneRgbImage = (image: RgbImage): RgbImage => ({
  width: image.width,
  height: image.height,
  data: new Uint8Array(image.data),
});
