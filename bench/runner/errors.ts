import type { Workload } from './job_config.ts';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export type StorageOperation = 'read' | 'write' | 'remove';

export class StorageError extends Error {
  readonly operation: StorageOperation;
  readonly key: string;

  constructor(operation: StorageOperation, key: string, message: string, options?: { cause?: unknown }) {
    super(`${operation} ${key}: ${message}`, options);
    this.name = 'StorageError';
    this.operation = operation;
    this.key = key;
  }
}

// prepare: staging before the timed phase; run: a worker failed; storage: backend setup.
export type JobErrorKind = 'prepare' | 'run' | 'storage';

export class JobError extends Error {
  readonly kind: JobErrorKind;
  readonly workload?: Workload;
  readonly key?: string;

  constructor(
    kind: JobErrorKind,
    message: string,
    context: { workload?: Workload; key?: string; cause?: unknown } = {},
  ) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'JobError';
    this.kind = kind;
    this.workload = context.workload;
    this.key = context.key;
  }
}

/** Joins an error and its `cause` chain into one readable message. */
export function describeErrorChain(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  for (let depth = 0; current !== undefined && depth < 8; depth += 1) {
    parts.push(current instanceof Error ? current.message : String(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(': ');
}
