import { availableParallelism } from 'node:os';
import { Worker } from 'node:worker_threads';

import type { ProjectionModel } from '../projection/projectionModel.js';
import type { RenderExecutor } from './executor.js';
import { assertSourceMatchesModel, partitionRows } from './rasterizer.js';
import { RGB_CHANNELS, wrapRgbImage, type RgbImage } from './rgbImage.js';
import {
  isBandReplyMessage,
  type BandTaskMessage,
  type SharedRaster,
} from './workerMessages.js';

export type RasterWorkerPoolOptions = {
  /** Worker thread count; defaults to one less than the available cores. */
  size?: number;
  /** Rows per dispatched band; defaults to roughly four bands per worker. */
  bandHeight?: number;
};

export class RasterWorkerError extends Error {
  readonly taskId: number;

  constructor(taskId: number, message: string) {
    super(message);
    this.name = 'RasterWorkerError';
    this.taskId = taskId;
  }
}

type PendingTask = {
  message: BandTaskMessage;
  resolve: () => void;
  reject: (reason: unknown) => void;
};

type WorkerSlot = {
  worker: Worker;
  current: PendingTask | null;
};

const resolveWorkerUrl = (): URL => {
  const extension = import.meta.url.endsWith('.ts') ? '.ts' : '.js';
  return new URL(`./rasterWorker${extension}`, import.meta.url);
};

const clampPoolSize = (value: number | undefined): number => {
  if (value === undefined || !Number.isFinite(value)) {
    return Math.max(1, availableParallelism() - 1);
  }
  return Math.max(1, Math.floor(value));
};

export class RasterWorkerPool implements RenderExecutor {
  readonly kind = 'worker-pool' as const;
  readonly size: number;
  private readonly bandHeight: number | undefined;
  private readonly workerUrl = resolveWorkerUrl();
  private readonly slots: WorkerSlot[] = [];
  private readonly queue: PendingTask[] = [];
  private readonly sharedSources = new WeakMap<Uint8Array, SharedArrayBuffer>();
  private nextTaskId = 1;
  private closed = false;

  constructor(options: RasterWorkerPoolOptions = {}) {
    this.size = clampPoolSize(options.size);
    this.bandHeight = options.bandHeight;
    for (let i = 0; i < this.size; i++) {
      this.slots.push(this.spawn());
    }
  }

  async render(source: RgbImage, model: ProjectionModel): Promise<RgbImage> {
    if (this.closed) {
      throw new Error('RasterWorkerPool has been closed');
    }
    assertSourceMatchesModel(source, model);
    const { width, height } = model.canvasSize;
    const sourceRaster: SharedRaster = {
      width: source.width,
      height: source.height,
      buffer: this.shareSource(source),
    };
    const targetRaster: SharedRaster = {
      width,
      height,
      buffer: new SharedArrayBuffer(width * height * RGB_CHANNELS),
    };
    const snapshot = model.toSnapshot();
    const bandHeight = this.bandHeight ?? Math.ceil(height / (this.size * 4));

    await Promise.all(
      partitionRows(height, bandHeight).map(
        (band) =>
          new Promise<void>((resolve, reject) => {
            this.queue.push({
              message: {
                kind: 'band',
                taskId: this.nextTaskId++,
                source: sourceRaster,
                target: targetRaster,
                model: snapshot,
                rowStart: band.rowStart,
                rowEnd: band.rowEnd,
              },
              resolve,
              reject,
            });
            this.dispatch();
          }),
      ),
    );

    return wrapRgbImage(width, height, new Uint8Array(targetRaster.buffer).slice());
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const closing = new Error('RasterWorkerPool closed before the band completed');
    for (const task of this.queue.splice(0)) {
      task.reject(closing);
    }
    await Promise.all(
      this.slots.map(async (slot) => {
        slot.current?.reject(closing);
        slot.current = null;
        await slot.worker.terminate();
      }),
    );
  }

  private shareSource(source: RgbImage): SharedArrayBuffer {
    const cached = this.sharedSources.get(source.data);
    if (cached) {
      return cached;
    }
    const shared = new SharedArrayBuffer(source.data.byteLength);
    new Uint8Array(shared).set(source.data);
    this.sharedSources.set(source.data, shared);
    return shared;
  }

  private spawn(): WorkerSlot {
    const slot: WorkerSlot = { worker: new Worker(this.workerUrl), current: null };
    slot.worker.on('message', (reply: unknown) => {
      if (!isBandReplyMessage(reply)) {
        return;
      }
      const task = slot.current;
      if (!task || task.message.taskId !== reply.taskId) {
        return;
      }
      slot.current = null;
      if (reply.kind === 'done') {
        task.resolve();
      } else {
        task.reject(new RasterWorkerError(reply.taskId, reply.message));
      }
      this.dispatch();
    });
    slot.worker.on('error', (error: Error) => {
      this.replace(slot, error);
    });
    slot.worker.on('exit', (code) => {
      if (!this.closed && code !== 0) {
        this.replace(slot, new Error(`Raster worker exited with code ${code}`));
      }
    });
    return slot;
  }

  private replace(slot: WorkerSlot, error: Error) {
    const index = this.slots.indexOf(slot);
    if (index === -1) {
      return;
    }
    const task = slot.current;
    slot.current = null;
    if (task) {
      task.reject(new RasterWorkerError(task.message.taskId, error.message));
    }
    if (this.closed) {
      return;
    }
    this.slots[index] = this.spawn();
    slot.worker.terminate().catch((terminateError: unknown) => {
      console.error('[raster-pool] failed to terminate worker', terminateError);
    });
    this.dispatch();
  }

  private dispatch() {
    for (const slot of this.slots) {
      if (this.queue.length === 0) {
        return;
      }
      if (slot.current) {
        continue;
      }
      const task = this.queue.shift();
      if (!task) {
        return;
      }
      slot.current = task;
      slot.worker.postMessage(task.message);
    }
  }
}

export const createRasterWorkerPool = (options: RasterWorkerPoolOptions = {}): RasterWorkerPool =>
  new RasterWorkerPool(options);
