export * from './math/rotation.js';
export * from './math/vector.js';
export * from './projection/errors.js';
export * from './projection/parameters.js';
export * from './projection/projectionModel.js';
export * from './raster/rgbImage.js';
export * from './raster/bilinear.js';
export * from './raster/rasterizer.js';
export * from './raster/executor.js';
export * from './raster/workerPool.js';
export * from './scheduling/renderScheduler.js';
export * from './session/renderSession.js';
export * from './runtime/renderWatchdog.js';
export * from './serialization/canonicalJson.js';
export * from './config/presetSchema.js';
export * from './config/presetLoader.js';
export { renderFile, projectPoint, resolveRenderConfig } from './runtime/services.js';
export type {
  RenderFileOptions,
  RenderFileResult,
  ProjectPointOptions,
  ProjectPointResult,
  RenderConfigRequest,
  ResolvedRenderConfig,
} from './runtime/services.js';
export { startServer, type ServerOptions } from './server/index.js';
