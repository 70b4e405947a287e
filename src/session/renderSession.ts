import {
  DEFAULT_CANVAS_SIZE,
  DEFAULT_PARAMETERS,
  parametersEqual,
  withParameters,
  type CanvasSize,
  type ProjectionParameters,
  type ProjectionParametersInput,
} from '../projection/parameters.js';
import { modelFromParameters } from '../projection/projectionModel.js';
import type { RenderExecutor } from '../raster/executor.js';
import type { RgbImage } from '../raster/rgbImage.js';
import type { RenderPassSample, RenderWatchdog } from '../runtime/renderWatchdog.js';
import {
  RenderScheduler,
  type ScheduleOutcome,
  type SchedulerPolicy,
} from '../scheduling/renderScheduler.js';

export type RenderFrame = {
  readonly sequence: number;
  readonly image: RgbImage;
  readonly parameters: ProjectionParameters;
  readonly performance: RenderPassSample | null;
};

export type RenderSessionEvent =
  | { readonly kind: 'frame'; readonly frame: RenderFrame }
  | { readonly kind: 'error'; readonly sequence: number; readonly error: unknown }
  | { readonly kind: 'dropped'; readonly parameters: ProjectionParameters };

export type RenderSessionListener = (event: RenderSessionEvent) => void;

export type RenderSessionOutcome =
  | ScheduleOutcome<RenderFrame>
  | { readonly status: 'unchanged' }
  | { readonly status: 'no-source' };

export type RenderSessionOptions = {
  executor: RenderExecutor;
  canvasSize?: CanvasSize;
  parameters?: ProjectionParameters;
  policy?: SchedulerPolicy;
  watchdog?: RenderWatchdog;
};

type RenderRequest = {
  sequence: number;
  source: RgbImage;
  parameters: ProjectionParameters;
  canvasSize: CanvasSize;
};

/**
 * Interactive state for one viewer: the current source and parameters, and the last frame.
 * A render is requested only when an input actually changed; while one is in flight further
 * requests follow the scheduler policy (dropped by default).
 */
export class RenderSession {
  readonly canvasSize: CanvasSize;
  private readonly executor: RenderExecutor;
  private readonly watchdog: RenderWatchdog | undefined;
  private readonly scheduler: RenderScheduler<RenderRequest, RenderFrame>;
  private readonly listeners = new Set<RenderSessionListener>();
  private source: RgbImage | null = null;
  private current: ProjectionParameters;
  private lastFrame: RenderFrame | null = null;
  private sequence = 0;

  constructor(options: RenderSessionOptions) {
    this.executor = options.executor;
    this.canvasSize = options.canvasSize ?? DEFAULT_CANVAS_SIZE;
    this.current = options.parameters ?? DEFAULT_PARAMETERS;
    this.watchdog = options.watchdog;
    this.scheduler = new RenderScheduler(
      (request: RenderRequest) => this.renderRequest(request),
      { policy: options.policy ?? 'drop' },
    );
  }

  get parameters(): ProjectionParameters {
    return this.current;
  }

  get output(): RenderFrame | null {
    return this.lastFrame;
  }

  isRendering(): boolean {
    return this.scheduler.isBusy();
  }

  subscribe(listener: RenderSessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setSource(image: RgbImage): Promise<RenderSessionOutcome> {
    this.source = image;
    return this.requestRender();
  }

  updateParameters(patch: ProjectionParametersInput): Promise<RenderSessionOutcome> {
    const next = withParameters(this.current, patch);
    if (parametersEqual(next, this.current)) {
      return Promise.resolve({ status: 'unchanged' });
    }
    this.current = next;
    return this.requestRender();
  }

  /** Re-renders with the current inputs even if nothing changed. */
  refresh(): Promise<RenderSessionOutcome> {
    return this.requestRender();
  }

  idle(): Promise<void> {
    return this.scheduler.idle();
  }

  close(): void {
    this.scheduler.close();
    this.listeners.clear();
  }

  private async requestRender(): Promise<RenderSessionOutcome> {
    if (!this.source) {
      return { status: 'no-source' };
    }
    const parameters = this.current;
    const outcome = await this.scheduler.request({
      sequence: ++this.sequence,
      source: this.source,
      parameters,
      canvasSize: this.canvasSize,
    });
    if (outcome.status === 'dropped') {
      this.emit({ kind: 'dropped', parameters });
    }
    return outcome;
  }

  private async renderRequest(request: RenderRequest): Promise<RenderFrame> {
    this.watchdog?.beginPass(request.sequence);
    try {
      const model = modelFromParameters(
        request.parameters,
        { width: request.source.width, height: request.source.height },
        request.canvasSize,
      );
      const image = await this.executor.render(request.source, model);
      const performance =
        this.watchdog?.endPass(request.canvasSize.width * request.canvasSize.height) ?? null;
      const frame: RenderFrame = {
        sequence: request.sequence,
        image,
        parameters: request.parameters,
        performance,
      };
      this.lastFrame = frame;
      this.emit({ kind: 'frame', frame });
      return frame;
    } catch (error) {
      this.watchdog?.cancelPass();
      this.emit({ kind: 'error', sequence: request.sequence, error });
      throw error;
    }
  }

  private emit(event: RenderSessionEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('[session] listener failed', error);
      }
    }
  }
}
