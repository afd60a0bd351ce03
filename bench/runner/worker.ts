import { SampleSet } from '../stats/sample_set.ts';
import type { ObjectStorage } from '../storage/types.ts';
import { runTask, type Task } from './task.ts';

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => Number(process.hrtime.bigint()) / 1e6,
};

// 1ns floor so a clock that did not advance still yields a finite bandwidth.
export const MIN_LATENCY_MS = 1e-6;

export interface Measurements {
  /** Bytes per second, one sample per iteration. */
  bandwidth: SampleSet;
  /** Milliseconds per iteration. */
  latency: SampleSet;
  /** Running average of completed operations per second since the shared start. */
  iops: SampleSet;
}

export interface WorkerParams {
  storage: ObjectStorage;
  task: Task;
  key: string;
  startMs: number;
  runTimeMs: number;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface WorkerResult extends Measurements {
  iterations: number;
}

/**
 * Repeats `task` until `runTimeMs` has elapsed since the shared `startMs`. The
 * deadline is only checked between operations, so the loop may overrun by one
 * operation's latency.
 */
export async function runWorker(params: WorkerParams): Promise<WorkerResult> {
  const { storage, task, key, startMs, runTimeMs, signal } = params;
  const clock = params.clock ?? monotonicClock;

  const bandwidth = new SampleSet();
  const latency = new SampleSet();
  const iops = new SampleSet();
  let iterations = 0;

  while (clock.now() - startMs < runTimeMs && !signal?.aborted) {
    const begin = clock.now();
    const bytes = await runTask(task, storage, key);
    const end = clock.now();
    const latencyMs = Math.max(end - begin, MIN_LATENCY_MS);

    iterations += 1;
    latency.add(latencyMs);
    bandwidth.add(bytes / (latencyMs / 1000));
    iops.add(iterations / (Math.max(end - startMs, MIN_LATENCY_MS) / 1000));
  }

  return { bandwidth, latency, iops, iterations };
}
