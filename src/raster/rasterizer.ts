import { ProjectionConfigError } from '../projection/errors.js';
import type { ProjectionModel } from '../projection/projectionModel.js';
import { sampleBilinearInto } from './bilinear.js';
import { RGB_CHANNELS, createRgbImage, type RgbImage } from './rgbImage.js';

export type RowBand = {
  readonly rowStart: number;
  readonly rowEnd: number;
};

/**
 * Fills canvas rows `[rowStart, rowEnd)` of `target`. Each pixel reads only the shared source
 * and model and writes only its own three bytes, so bands can run on any thread in any order.
 */
export const rasterizeRows = (
  source: RgbImage,
  model: ProjectionModel,
  target: RgbImage,
  rowStart: number,
  rowEnd: number,
): void => {
  const { width } = target;
  const end = Math.min(rowEnd, target.height);
  for (let y = Math.max(0, rowStart); y < end; y++) {
    let index = y * width * RGB_CHANNELS;
    for (let x = 0; x < width; x++) {
      const p = model.project(x, y);
      sampleBilinearInto(source, p[0], p[1], target.data, index);
      index += RGB_CHANNELS;
    }
  }
};

export const renderProjection = (source: RgbImage, model: ProjectionModel): RgbImage => {
  assertSourceMatchesModel(source, model);
  const { width, height } = model.canvasSize;
  const canvas = createRgbImage(width, height);
  rasterizeRows(source, model, canvas, 0, height);
  return canvas;
};

export const partitionRows = (height: number, bandHeight: number): RowBand[] => {
  const step = Math.max(1, Math.floor(bandHeight));
  const bands: RowBand[] = [];
  for (let rowStart = 0; rowStart < height; rowStart += step) {
    bands.push({ rowStart, rowEnd: Math.min(height, rowStart + step) });
  }
  return bands;
};

export const assertSourceMatchesModel = (source: RgbImage, model: ProjectionModel): void => {
  if (source.width !== model.imageSize.width || source.height !== model.imageSize.height) {
    throw new ProjectionConfigError(
      'dimensions/mismatch',
      `Source image is ${source.width}x${source.height} but the projection expects ${model.imageSize.width}x${model.imageSize.height}`,
    );
  }
};
