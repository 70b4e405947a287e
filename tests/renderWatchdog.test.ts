import assert from 'node:assert/strict';
import test from 'node:test';

import {
  RenderWatchdog,
  type MeasurementProvider,
  type RenderBudget,
  type RenderWatchdogOptions,
} from '../src/runtime/renderWatchdog.js';

type ProviderSequences = {
  now: bigint[];
  cpu: NodeJS.CpuUsage[];
  memory: NodeJS.MemoryUsage[];
};

const createProvider = (sequences: ProviderSequences): MeasurementProvider => ({
  now: () => {
    const value = sequences.now.shift();
    if (value == null) throw new Error('Ran out of now() samples');
    return value;
  },
  cpu: () => {
    const value = sequences.cpu.shift();
    if (value == null) throw new Error('Ran out of cpu() samples');
    return value;
  },
  memory: () => {
    const value = sequences.memory.shift();
    if (value == null) throw new Error('Ran out of memory() samples');
    return value;
  },
});

const makeMemory = (rssMb: number, heapMb: number): NodeJS.MemoryUsage => ({
  rss: rssMb * 1024 * 1024,
  heapTotal: heapMb * 1024 * 1024,
  heapUsed: heapMb * 1024 * 1024,
  external: 0,
  arrayBuffers: 0,
});

const createWatchdog = (
  budget: RenderBudget,
  providerSequences: ProviderSequences,
  options?: RenderWatchdogOptions,
) => new RenderWatchdog(budget, options, createProvider(providerSequences));

test('RenderWatchdog records samples within budget', () => {
  const sequences: ProviderSequences = {
    now: [0n, 16_000_000n, 16_000_000n, 32_000_000n],
    cpu: [
      { user: 0, system: 0 },
      { user: 4000, system: 1000 },
      { user: 4000, system: 1000 },
      { user: 8000, system: 2000 },
    ],
    memory: [makeMemory(225, 152), makeMemory(230, 155)],
  };
  const watchdog = createWatchdog(
    { passMs: 20, rssMb: 500, heapMb: 250, cpuPercent: 200 },
    sequences,
  );

  watchdog.beginPass(0);
  const firstSample = watchdog.endPass(1_000_000);
  watchdog.beginPass(1);
  const secondSample = watchdog.endPass(1_000_000);

  assert.equal(firstSample.passIndex, 0);
  assert.equal(secondSample.passIndex, 1);
  assert.equal(firstSample.passMs, 16);
  assert.equal(firstSample.cpuPercent, 31.25);
  assert.ok(Math.abs(firstSample.megapixelsPerSecond - 62.5) < 1e-9);
  assert.equal(firstSample.rssMb, 225);

  const snapshot = watchdog.snapshot();
  assert.equal(snapshot.passes, 2);
  assert.equal(snapshot.passMsAvg, 16);
  assert.equal(snapshot.passMsMax, 16);
  assert.equal(snapshot.rssMbMax, 230);
  assert.equal(snapshot.heapMbMax, 155);
  assert.equal(snapshot.violations.length, 0);
  assert.deepEqual(snapshot.lastSample, secondSample);
  assert.equal(snapshot.history.length, 2);
});

test('RenderWatchdog flags budget violations', () => {
  const sequences: ProviderSequences = {
    now: [0n, 20_000_000n],
    cpu: [
      { user: 0, system: 0 },
      { user: 25_000, system: 5_000 },
    ],
    memory: [makeMemory(620, 410)],
  };
  const watchdog = createWatchdog(
    { passMs: 12, rssMb: 500, heapMb: 300, cpuPercent: 160 },
    sequences,
    { tolerance: 0.05 },
  );

  watchdog.beginPass(7);
  const sample = watchdog.endPass(360_000);

  assert.equal(sample.passMs, 20);
  assert.equal(sample.cpuPercent, 150);
  const snapshot = watchdog.snapshot();
  assert.equal(snapshot.passes, 1);
  const types = snapshot.violations.map((v) => v.type).sort();
  assert.deepEqual(types, ['heapMb', 'passMs', 'rssMb']);
  const passViolation = snapshot.violations.find((v) => v.type === 'passMs');
  assert.deepEqual(passViolation, { type: 'passMs', value: 20, limit: 12, passIndex: 7 });
});

test('RenderWatchdog keeps a bounded history', () => {
  const sequences: ProviderSequences = {
    now: [0n, 1_000_000n, 1_000_000n, 3_000_000n],
    cpu: [
      { user: 0, system: 0 },
      { user: 0, system: 0 },
      { user: 0, system: 0 },
      { user: 0, system: 0 },
    ],
    memory: [makeMemory(100, 50), makeMemory(100, 50)],
  };
  const watchdog = createWatchdog({}, sequences, { historySize: 1 });
  watchdog.beginPass(0);
  watchdog.endPass(10);
  watchdog.beginPass(1);
  watchdog.endPass(10);
  const snapshot = watchdog.snapshot();
  assert.equal(snapshot.history.length, 1);
  assert.equal(snapshot.history[0].passIndex, 1);
  assert.equal(snapshot.passMsAvg, 1.5);
  assert.equal(snapshot.passMsMax, 2);
});

test('RenderWatchdog rejects unbalanced pass calls', () => {
  const sequences: ProviderSequences = {
    now: [0n, 0n],
    cpu: [
      { user: 0, system: 0 },
      { user: 0, system: 0 },
    ],
    memory: [],
  };
  const watchdog = createWatchdog({}, sequences, { label: 'probe' });
  assert.throws(() => watchdog.endPass(1), /\[probe\] endPass called without beginPass/);
  watchdog.beginPass(0);
  assert.throws(() => watchdog.beginPass(1), /\[probe\] beginPass called twice/);
  watchdog.cancelPass();
  watchdog.beginPass(2);
  assert.equal(watchdog.snapshot().passes, 0);
});
