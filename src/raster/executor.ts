import type { ProjectionModel } from '../projection/projectionModel.js';
import { renderProjection } from './rasterizer.js';
import type { RgbImage } from './rgbImage.js';

/** Anything that can turn a source image and a model into a fully populated canvas. */
export type RenderExecutor = {
  readonly kind: 'inline' | 'worker-pool';
  render(source: RgbImage, model: ProjectionModel): Promise<RgbImage>;
  close(): Promise<void>;
};

export const createInlineExecutor = (): RenderExecutor => ({
  kind: 'inline',
  render: async (source, model) => renderProjection(source, model),
  close: async () => {},
});
