import { SampleSet } from '../stats/sample_set.ts';
import { createObjectStorage } from '../storage/index.ts';
import type { ObjectStorage } from '../storage/types.ts';
import { silentLogger, type Logger } from '../util/logger.ts';
import { formatOneLineError } from '../util/text.ts';
import { JobError } from './errors.ts';
import type { JobConfig, ServiceConfig } from './job_config.ts';
import { prepareTask, workerObjectKey, writtenObjectKeys, type Task } from './task.ts';
import { monotonicClock, runWorker, type Clock, type Measurements, type WorkerResult } from './worker.ts';

export interface RunOptions {
  /** Backend owned by the caller; it is not closed when the job ends. */
  storage?: ObjectStorage;
  /** Builds the backend when `storage` is not given; the result is closed when the job ends. */
  createStorage?: (service: ServiceConfig) => ObjectStorage;
  clock?: Clock;
  logger?: Logger;
  /** Overrides the generated object key. */
  objectKey?: string;
  /** Remove the objects the job wrote once it ends (default true). */
  cleanup?: boolean;
}

export interface WorkerSummary {
  index: number;
  key: string;
  iterations: number;
}

export interface JobResult extends Measurements {
  key: string;
  workers: WorkerSummary[];
  startedAtMs: number;
  finishedAtMs: number;
  /** Measured phase only, on the job clock. */
  elapsedMs: number;
}

const MAX_LOGGED_ERROR_BYTES = 512;

async function removeObjects(storage: ObjectStorage, keys: readonly string[], logger: Logger): Promise<void> {
  for (const key of keys) {
    try {
      await storage.remove(key);
    } catch (err) {
      logger.warn({ key, err: formatOneLineError(err, MAX_LOGGED_ERROR_BYTES) }, 'cleanup_failed');
    }
  }
}

async function runWorkers(
  config: JobConfig,
  task: Task,
  storage: ObjectStorage,
  clock: Clock,
  logger: Logger,
): Promise<{ results: WorkerResult[]; workers: WorkerSummary[]; elapsedMs: number }> {
  const { numJobs, runTimeMs, uploadKeyMode } = config.job;
  const keys = Array.from({ length: numJobs }, (_, index) => workerObjectKey(task, index, uploadKeyMode));
  const controller = new AbortController();
  const startMs = clock.now();

  logger.info({ numJobs, runTimeMs }, 'workers_started');

  const settled = await Promise.allSettled(
    keys.map((key, index) =>
      runWorker({ storage, task, key, startMs, runTimeMs, clock, signal: controller.signal }).catch(
        (err: unknown) => {
          // Siblings stop at their next iteration boundary.
          controller.abort();
          logger.error({ worker: index, key, err: formatOneLineError(err, MAX_LOGGED_ERROR_BYTES) }, 'worker_failed');
          throw err;
        },
      ),
    ),
  );
  const elapsedMs = clock.now() - startMs;

  const results: WorkerResult[] = [];
  const workers: WorkerSummary[] = [];
  for (const [index, outcome] of settled.entries()) {
    if (outcome.status === 'rejected') {
      throw new JobError('run', 'failed to run job', { workload: task.kind, key: task.key, cause: outcome.reason });
    }
    results.push(outcome.value);
    workers.push({ index, key: keys[index] ?? task.key, iterations: outcome.value.iterations });
  }
  return { results, workers, elapsedMs };
}

/**
 * Runs one benchmark job: stages the task, fans it out to `numJobs` concurrent
 * workers sharing one start instant, and merges their samples. Any worker failure
 * fails the whole job; no partial statistics are returned.
 */
export async function runJob(config: JobConfig, options: RunOptions = {}): Promise<JobResult> {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? monotonicClock;
  const ownsStorage = options.storage === undefined;
  const storage = options.storage ?? (options.createStorage ?? createObjectStorage)(config.service);
  const { job } = config;

  const startedAtMs = Date.now();
  logger.info(
    {
      service: config.service.type,
      workload: job.workload,
      numJobs: job.numJobs,
      fileSize: job.fileSize,
      runTimeMs: job.runTimeMs,
    },
    'job_start',
  );

  let task: Task | undefined;
  try {
    task = await prepareTask(job, storage, options.objectKey);
    logger.info({ key: task.key, workload: task.kind }, 'task_prepared');

    const { results, workers, elapsedMs } = await runWorkers(config, task, storage, clock, logger);

    let bandwidth = new SampleSet();
    let latency = new SampleSet();
    let iops = new SampleSet();
    for (const result of results) {
      bandwidth = bandwidth.merge(result.bandwidth);
      latency = latency.merge(result.latency);
      iops = iops.merge(result.iops);
    }

    if (latency.count === 0) {
      logger.warn({ runTimeMs: job.runTimeMs }, 'job_no_samples');
    }
    logger.info({ samples: latency.count, elapsedMs }, 'job_finished');

    return {
      bandwidth,
      latency,
      iops,
      key: task.key,
      workers,
      startedAtMs,
      finishedAtMs: Date.now(),
      elapsedMs,
    };
  } finally {
    if (task && options.cleanup !== false) {
      await removeObjects(storage, writtenObjectKeys(task, job.numJobs, job.uploadKeyMode), logger);
    }
    if (ownsStorage) {
      try {
        await storage.close();
      } catch (err) {
        logger.warn({ err: formatOneLineError(err, MAX_LOGGED_ERROR_BYTES) }, 'storage_close_failed');
      }
    }
  }
}
