export type SchedulerPolicy = 'drop' | 'latest';

export type ScheduleOutcome<TResult> =
  | { readonly status: 'completed'; readonly result: TResult }
  | { readonly status: 'failed'; readonly error: unknown }
  | { readonly status: 'dropped' }
  | { readonly status: 'superseded' };

export type RenderSchedulerOptions = {
  /**
   * `drop`: a request arriving while a render is in flight is discarded.
   * `latest`: it is parked, replacing any parked request, and starts once the render settles.
   */
  policy?: SchedulerPolicy;
};

export class RenderSchedulerClosedError extends Error {
  constructor() {
    super('RenderScheduler is closed');
    this.name = 'RenderSchedulerClosedError';
  }
}

type ParkedRequest<TRequest, TResult> = {
  request: TRequest;
  resolve: (outcome: ScheduleOutcome<TResult> | Promise<ScheduleOutcome<TResult>>) => void;
};

/** Single-flight gate around an async render task. At most one task runs at a time. */
export class RenderScheduler<TRequest, TResult> {
  readonly policy: SchedulerPolicy;
  private readonly task: (request: TRequest) => Promise<TResult>;
  private inFlight: Promise<void> | null = null;
  private parked: ParkedRequest<TRequest, TResult> | null = null;
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(
    task: (request: TRequest) => Promise<TResult>,
    options: RenderSchedulerOptions = {},
  ) {
    this.task = task;
    this.policy = options.policy ?? 'drop';
  }

  request(request: TRequest): Promise<ScheduleOutcome<TResult>> {
    if (this.closed) {
      return Promise.reject(new RenderSchedulerClosedError());
    }
    if (!this.inFlight) {
      return this.run(request);
    }
    if (this.policy === 'drop') {
      return Promise.resolve({ status: 'dropped' });
    }
    return new Promise((resolve) => {
      this.parked?.resolve({ status: 'superseded' });
      this.parked = { request, resolve };
    });
  }

  isBusy(): boolean {
    return this.inFlight !== null;
  }

  hasPending(): boolean {
    return this.parked !== null;
  }

  idle(): Promise<void> {
    if (!this.inFlight && !this.parked) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Rejects future requests; a parked request is dropped, the in-flight one runs out. */
  close(): void {
    this.closed = true;
    this.parked?.resolve({ status: 'dropped' });
    this.parked = null;
  }

  private run(request: TRequest): Promise<ScheduleOutcome<TResult>> {
    const execution = this.execute(request);
    this.inFlight = execution.then(() => this.settle());
    return execution;
  }

  private async execute(request: TRequest): Promise<ScheduleOutcome<TResult>> {
    try {
      const result = await this.task(request);
      return { status: 'completed', result };
    } catch (error) {
      return { status: 'failed', error };
    }
  }

  private settle() {
    this.inFlight = null;
    const next = this.parked;
    this.parked = null;
    if (next) {
      next.resolve(this.closed ? { status: 'dropped' } : this.run(next.request));
    }
    if (!this.inFlight) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }
}
