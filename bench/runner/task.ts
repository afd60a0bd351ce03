import { randomUUID } from 'node:crypto';

import type { ObjectStorage } from '../storage/types.ts';
import { JobError } from './errors.ts';
import type { JobSettings, UploadKeyMode, Workload } from './job_config.ts';

export const OBJECT_KEY_PREFIX = 'objbench-test-';
export const PAYLOAD_FILL_BYTE = 0xfe;

export type DownloadTask = Readonly<{ kind: 'download'; key: string }>;
export type UploadTask = Readonly<{ kind: 'upload'; key: string; payload: Uint8Array }>;

/** The single operation every worker repeats; frozen once built. */
export type Task = DownloadTask | UploadTask;

export function generateObjectKey(): string {
  return `${OBJECT_KEY_PREFIX}${randomUUID()}`;
}

export function createPayload(size: number): Uint8Array {
  return new Uint8Array(size).fill(PAYLOAD_FILL_BYTE);
}

/**
 * Builds the task before the timed phase. Download stages its object with a single
 * write; a failure there aborts the whole job. Upload makes no storage call.
 */
export async function prepareTask(
  job: Pick<JobSettings, 'workload' | 'fileSize'>,
  storage: ObjectStorage,
  key: string = generateObjectKey(),
): Promise<Task> {
  const payload = createPayload(job.fileSize);

  switch (job.workload) {
    case 'download': {
      try {
        await storage.write(key, payload);
      } catch (err) {
        throw new JobError('prepare', `failed to stage object: ${key}`, { workload: 'download', key, cause: err });
      }
      const task: DownloadTask = { kind: 'download', key };
      return Object.freeze(task);
    }
    case 'upload': {
      const task: UploadTask = { kind: 'upload', key, payload };
      return Object.freeze(task);
    }
  }
}

/** Object key worker `workerIndex` targets. Downloads always share the staged object. */
export function workerObjectKey(task: Task, workerIndex: number, mode: UploadKeyMode): string {
  if (task.kind === 'upload' && mode === 'per_worker') return `${task.key}-${workerIndex}`;
  return task.key;
}

/** Every key a job may have written, for cleanup after the run. */
export function writtenObjectKeys(task: Task, numJobs: number, mode: UploadKeyMode): string[] {
  if (task.kind === 'upload' && mode === 'per_worker') {
    return Array.from({ length: numJobs }, (_, i) => workerObjectKey(task, i, mode));
  }
  return [task.key];
}

function workloadOf(task: Task): Workload {
  return task.kind;
}

/** Performs one operation and resolves to the bytes moved. */
export async function runTask(task: Task, storage: ObjectStorage, key: string = task.key): Promise<number> {
  try {
    return task.kind === 'download' ? await storage.read(key) : await storage.write(key, task.payload);
  } catch (err) {
    throw new JobError('run', `failed to ${workloadOf(task)} object: ${key}`, {
      workload: workloadOf(task),
      key,
      cause: err,
    });
  }
}
