import { readFile } from 'node:fs/promises';

import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';

import { ConfigError } from './errors.ts';

const serviceTypes = ['s3', 'oss', 'cos', 'minio', 'fs', 'memory'] as const;
const workloads = ['download', 'upload'] as const;
const uploadKeyModes = ['per_worker', 'shared'] as const;

export type ServiceType = (typeof serviceTypes)[number];
export type Workload = (typeof workloads)[number];
export type UploadKeyMode = (typeof uploadKeyModes)[number];

export const MIN_FILE_SIZE = 4096;
export const DEFAULT_FS_ROOT = '/tmp/objbench';

export type ServiceConfig = Readonly<{
  type: ServiceType;
  endpoint: string;
  bucket: string;
  /** Key root for object stores, directory root for `fs`. */
  prefix?: string;
  region?: string;
  accessKey: string;
  secretKey: string;
  virtualHostedStyle: boolean;
}>;

export type JobSettings = Readonly<{
  numJobs: number;
  workload: Workload;
  fileSize: number;
  runTimeMs: number;
  uploadKeyMode: UploadKeyMode;
}>;

export type JobConfig = Readonly<{
  service: ServiceConfig;
  job: JobSettings;
}>;

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  msec: 1,
  millis: 1,
  s: 1000,
  sec: 1000,
  secs: 1000,
  second: 1000,
  seconds: 1000,
  m: 60_000,
  min: 60_000,
  mins: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hr: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
};

/**
 * Parses a human duration such as `500ms`, `10s`, `1min` or `1m 30s` into
 * milliseconds. A bare number is read as seconds.
 */
export function parseDuration(raw: string | number): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw <= 0) throw new Error(`invalid duration: ${raw}`);
    return raw * 1000;
  }

  const text = raw.trim().toLowerCase();
  if (!text) throw new Error('invalid duration: empty');
  if (/^\d+(\.\d+)?$/.test(text)) return parseDuration(Number(text));

  const token = /(\d+(?:\.\d+)?)\s*([a-z]+)\s*/gy;
  let total = 0;
  let offset = 0;
  while (offset < text.length) {
    token.lastIndex = offset;
    const match = token.exec(text);
    if (!match) throw new Error(`invalid duration: ${text}`);
    const [, amount, unit] = match;
    const scale = unit === undefined ? undefined : DURATION_UNITS_MS[unit];
    if (scale === undefined) throw new Error(`unknown duration unit "${unit}" in ${text}`);
    total += Number(amount) * scale;
    offset = token.lastIndex;
  }
  if (total <= 0) throw new Error(`invalid duration: ${text}`);
  return total;
}

const REMOTE_FIELDS = ['endpoint', 'bucket', 'access_key', 'secret_key'] as const;

const serviceSchema = z
  .object({
    type: z.enum(serviceTypes),
    endpoint: z.string().optional().default(''),
    bucket: z.string().optional().default(''),
    prefix: z.string().optional(),
    region: z.string().optional(),
    access_key: z.string().optional().default(''),
    secret_key: z.string().optional().default(''),
    virtual_hosted_style: z.boolean().optional().default(false),
  })
  .superRefine((service, ctx) => {
    if (service.type === 'fs' || service.type === 'memory') return;
    for (const field of REMOTE_FIELDS) {
      if (!service[field].trim()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `${field} is required for service type ${service.type}`,
        });
      }
    }
  });

const jobSchema = z.object({
  num_jobs: z.number().int().min(1).optional().default(1),
  workload: z.enum(workloads),
  file_size: z
    .number()
    .int()
    .min(MIN_FILE_SIZE, { message: `file_size must be greater or equal to ${MIN_FILE_SIZE}` }),
  run_time: z.union([z.string(), z.number()]).transform((value, ctx) => {
    try {
      return parseDuration(value);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      return z.NEVER;
    }
  }),
  upload_key_mode: z.enum(uploadKeyModes).optional().default('per_worker'),
});

const configSchema = z.object({
  service: serviceSchema,
  job: jobSchema,
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Validates an already-parsed document (TOML table or plain object). */
export function validateJobConfig(input: unknown): JobConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid job configuration', formatIssues(parsed.error));
  }

  const { service, job } = parsed.data;
  return {
    service: {
      type: service.type,
      endpoint: service.endpoint.trim(),
      bucket: service.bucket.trim(),
      prefix: service.prefix,
      region: service.region,
      accessKey: service.access_key,
      secretKey: service.secret_key,
      virtualHostedStyle: service.virtual_hosted_style,
    },
    job: {
      numJobs: job.num_jobs,
      workload: job.workload,
      fileSize: job.file_size,
      runTimeMs: job.run_time,
      uploadKeyMode: job.upload_key_mode,
    },
  };
}

export function parseJobConfig(text: string): JobConfig {
  let doc: unknown;
  try {
    doc = parseToml(text);
  } catch (err) {
    throw new ConfigError(`Invalid TOML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return validateJobConfig(doc);
}

export async function loadJobConfig(path: string): Promise<JobConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read job file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseJobConfig(text);
}

export function withJobOverrides(
  config: JobConfig,
  overrides: { numJobs?: number; runTimeMs?: number },
): JobConfig {
  return {
    service: config.service,
    job: {
      ...config.job,
      ...(overrides.numJobs === undefined ? {} : { numJobs: overrides.numJobs }),
      ...(overrides.runTimeMs === undefined ? {} : { runTimeMs: overrides.runTimeMs }),
    },
  };
}
