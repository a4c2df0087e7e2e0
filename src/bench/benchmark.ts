import { Emitter } from '../events/emitter.js';
import { Receiver } from '../events/receiver.js';

export interface BenchEvents {
  bar(a: number, b: boolean, c: number): void;
}

class CountingReceiver extends Receiver<BenchEvents> implements BenchEvents {
  barCallCount = 0;

  bar(_a: number, _b: boolean, _c: number): void {
    this.barCallCount++;
  }
}

export type BenchmarkScenario = 'emit-to-receivers' | 'receive-from-emitters';

export interface BenchmarkResult {
  scenario: BenchmarkScenario;
  size: number;
  runs: number;
  calls: number;
  elapsedMs: number;
  nsPerCall: number;
}

export interface BenchmarkOptions {
  now?: () => number;
}

const BAR_A = 1;
const BAR_B = true;
const BAR_C = 2.3;

function measure(runs: number, now: () => number, body: () => void): number {
  const start = now();
  for (let run = 0; run < runs; run++) body();
  return now() - start;
}

function toResult(scenario: BenchmarkScenario, size: number, runs: number, calls: number, elapsedMs: number): BenchmarkResult {
  const expected = size * runs;
  if (calls !== expected) {
    throw new Error(`${scenario}: received ${calls} calls, expected ${expected}`);
  }
  return { scenario, size, runs, calls, elapsedMs, nsPerCall: calls > 0 ? (elapsedMs * 1e6) / calls : 0 };
}

/**
 * One emitter, `size` receivers, `runs` emissions.
 */
export function emitToManyReceivers(size: number, runs: number, options: BenchmarkOptions = {}): BenchmarkResult {
  const now = options.now ?? (() => performance.now());
  const emitter = new Emitter<BenchEvents>({ name: 'bench-emitter' });
  const receivers = Array.from({ length: size }, () => new CountingReceiver());
  for (const receiver of receivers) emitter.connect(receiver);

  try {
    const elapsedMs = measure(runs, now, () => emitter.emit('bar', BAR_A, BAR_B, BAR_C));
    const calls = receivers.reduce((sum, receiver) => sum + receiver.barCallCount, 0);
    return toResult('emit-to-receivers', size, runs, calls, elapsedMs);
  } finally {
    emitter.destroy();
    for (const receiver of receivers) receiver.destroy();
  }
}

/**
 * `size` emitters, one receiver; each run emits once on every emitter.
 */
export function receiveFromManyEmitters(size: number, runs: number, options: BenchmarkOptions = {}): BenchmarkResult {
  const now = options.now ?? (() => performance.now());
  const emitters = Array.from({ length: size }, (_, i) => new Emitter<BenchEvents>({ name: `bench-emitter-${i}` }));
  const receiver = new CountingReceiver();
  for (const emitter of emitters) emitter.connect(receiver);

  try {
    const elapsedMs = measure(runs, now, () => {
      for (const emitter of emitters) emitter.emit('bar', BAR_A, BAR_B, BAR_C);
    });
    return toResult('receive-from-emitters', size, runs, receiver.barCallCount, elapsedMs);
  } finally {
    receiver.destroy();
    for (const emitter of emitters) emitter.destroy();
  }
}

export function runBenchmarks(sizes: readonly number[], runs: number, options: BenchmarkOptions = {}): BenchmarkResult[] {
  const results: BenchmarkResult[] = [];
  for (const size of sizes) results.push(emitToManyReceivers(size, runs, options));
  for (const size of sizes) results.push(receiveFromManyEmitters(size, runs, options));
  return results;
}

export function formatBenchmarkResult(result: BenchmarkResult): string {
  const label =
    result.scenario === 'emit-to-receivers'
      ? `Emit to ${result.size} receivers`
      : `Receive from ${result.size} emitters`;
  return `${label} x ${result.runs} runs: ${result.calls} calls in ${result.elapsedMs.toFixed(2)} ms (${result.nsPerCall.toFixed(1)} ns/call)`;
}
