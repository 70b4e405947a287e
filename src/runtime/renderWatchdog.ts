export type RenderBudget = {
  passMs?: number;
  rssMb?: number;
  heapMb?: number;
  cpuPercent?: number;
};

export type RenderPassSample = {
  passIndex: number;
  passMs: number;
  pixels: number;
  megapixelsPerSecond: number;
  rssMb: number;
  heapMb: number;
  /** Main-thread CPU only; worker threads are not attributed here. */
  cpuPercent: number;
};

export type RenderBudgetViolationType = keyof RenderBudget;

export type RenderBudgetViolation = {
  type: RenderBudgetViolationType;
  value: number;
  limit: number;
  passIndex: number;
};

export type RenderWatchdogSnapshot = {
  passes: number;
  passMsAvg: number;
  passMsMax: number;
  megapixelsPerSecondAvg: number;
  rssMbMax: number;
  heapMbMax: number;
  lastSample: RenderPassSample | null;
  history: RenderPassSample[];
  violations: RenderBudgetViolation[];
};

export type MeasurementProvider = {
  now: () => bigint;
  cpu: () => NodeJS.CpuUsage;
  memory: () => NodeJS.MemoryUsage;
};

export type RenderWatchdogOptions = {
  label?: string;
  tolerance?: number;
  historySize?: number;
};

const bytesToMb = (bytes: number) => bytes / (1024 * 1024);

const PROCESS_PROVIDER: MeasurementProvider = {
  now: () => process.hrtime.bigint(),
  cpu: () => process.cpuUsage(),
  memory: () => process.memoryUsage(),
};

type OpenPass = {
  passIndex: number;
  time: bigint;
  cpu: NodeJS.CpuUsage;
};

/** Samples each render pass and records passes that exceed the configured budget. */
export class RenderWatchdog {
  private readonly budget: RenderBudget;
  private readonly tolerance: number;
  private readonly historySize: number;
  private readonly provider: MeasurementProvider;
  private readonly label: string;
  private readonly history: RenderPassSample[] = [];
  private readonly violations: RenderBudgetViolation[] = [];

  private passes = 0;
  private passMsTotal = 0;
  private passMsMax = 0;
  private throughputTotal = 0;
  private rssMbMax = 0;
  private heapMbMax = 0;
  private lastSample: RenderPassSample | null = null;
  private open: OpenPass | null = null;

  constructor(
    budget: RenderBudget = {},
    options: RenderWatchdogOptions = {},
    provider: MeasurementProvider = PROCESS_PROVIDER,
  ) {
    this.budget = { ...budget };
    this.tolerance = Math.max(0, options.tolerance ?? 0.1);
    this.historySize = Math.max(0, Math.floor(options.historySize ?? 32));
    this.provider = provider;
    this.label = options.label ?? 'render';
  }

  beginPass(passIndex: number) {
    if (this.open) {
      throw new Error(`[${this.label}] beginPass called twice without endPass.`);
    }
    this.open = { passIndex, time: this.provider.now(), cpu: this.provider.cpu() };
  }

  endPass(pixels: number): RenderPassSample {
    const start = this.open;
    if (!start) {
      throw new Error(`[${this.label}] endPass called without beginPass.`);
    }
    this.open = null;
    const passMs = Number(this.provider.now() - start.time) / 1_000_000;
    const cpu = this.provider.cpu();
    const memory = this.provider.memory();
    const cpuMs = (cpu.user - start.cpu.user + (cpu.system - start.cpu.system)) / 1000;

    const sample: RenderPassSample = {
      passIndex: start.passIndex,
      passMs,
      pixels,
      megapixelsPerSecond: passMs > 0 ? pixels / 1_000_000 / (passMs / 1000) : 0,
      rssMb: bytesToMb(memory.rss),
      heapMb: bytesToMb(memory.heapUsed),
      cpuPercent: passMs > 0 ? (cpuMs / passMs) * 100 : 0,
    };

    this.passes += 1;
    this.passMsTotal += passMs;
    this.passMsMax = Math.max(this.passMsMax, passMs);
    this.throughputTotal += sample.megapixelsPerSecond;
    this.rssMbMax = Math.max(this.rssMbMax, sample.rssMb);
    this.heapMbMax = Math.max(this.heapMbMax, sample.heapMb);
    this.lastSample = sample;

    if (this.historySize > 0) {
      this.history.push(sample);
      if (this.history.length > this.historySize) {
        this.history.shift();
      }
    }
    this.checkBudget(sample);
    return sample;
  }

  /** Abandons an open pass (the render failed) without recording a sample. */
  cancelPass() {
    this.open = null;
  }

  private checkBudget(sample: RenderPassSample) {
    const slack = 1 + this.tolerance;
    const checks: Array<[RenderBudgetViolationType, number | undefined, number]> = [
      ['passMs', this.budget.passMs, sample.passMs],
      ['rssMb', this.budget.rssMb, sample.rssMb],
      ['heapMb', this.budget.heapMb, sample.heapMb],
      ['cpuPercent', this.budget.cpuPercent, sample.cpuPercent],
    ];
    for (const [type, limit, value] of checks) {
      if (typeof limit === 'number' && Number.isFinite(limit) && value > limit * slack) {
        this.violations.push({ type, value, limit, passIndex: sample.passIndex });
      }
    }
  }

  snapshot(): RenderWatchdogSnapshot {
    const passes = this.passes;
    return {
      passes,
      passMsAvg: passes > 0 ? this.passMsTotal / passes : 0,
      passMsMax: this.passMsMax,
      megapixelsPerSecondAvg: passes > 0 ? this.throughputTotal / passes : 0,
      rssMbMax: this.rssMbMax,
      heapMbMax: this.heapMbMax,
      lastSample: this.lastSample,
      history: [...this.history],
      violations: [...this.violations],
    };
  }
}
