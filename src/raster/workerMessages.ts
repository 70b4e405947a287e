import type { ProjectionModelSnapshot } from '../projection/projectionModel.js';

export type SharedRaster = {
  readonly width: number;
  readonly height: number;
  readonly buffer: SharedArrayBuffer;
};

export type BandTaskMessage = {
  readonly kind: 'band';
  readonly taskId: number;
  readonly source: SharedRaster;
  readonly target: SharedRaster;
  readonly model: ProjectionModelSnapshot;
  readonly rowStart: number;
  readonly rowEnd: number;
};

export type BandReplyMessage =
  | { readonly kind: 'done'; readonly taskId: number }
  | { readonly kind: 'error'; readonly taskId: number; readonly message: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isSharedRaster = (value: unknown): value is SharedRaster =>
  isRecord(value) &&
  typeof value.width === 'number' &&
  typeof value.height === 'number' &&
  value.buffer instanceof SharedArrayBuffer;

export const isBandTaskMessage = (value: unknown): value is BandTaskMessage =>
  isRecord(value) &&
  value.kind === 'band' &&
  typeof value.taskId === 'number' &&
  typeof value.rowStart === 'number' &&
  typeof value.rowEnd === 'number' &&
  isSharedRaster(value.source) &&
  isSharedRaster(value.target) &&
  isRecord(value.model);

export const isBandReplyMessage = (value: unknown): value is BandReplyMessage =>
  isRecord(value) &&
  typeof value.taskId === 'number' &&
  (value.kind === 'done' || (value.kind === 'error' && typeof value.message === 'string'));
