import { isLogLevel, type LogLevel } from '../util/logger.ts';
import { parseDuration } from './job_config.ts';

export interface CliOptions {
  jobFile: string;
  outDir?: string;
  json: boolean;
  logLevel: LogLevel;
  numJobs?: number;
  runTimeMs?: number;
}

export type CliCommand = { kind: 'help'; error?: string } | { kind: 'run'; options: CliOptions };

export function formatBenchUsage(): string {
  return [
    'Usage:',
    '  objbench <job.toml> [options]',
    '',
    'Options:',
    '  --workers <n>          Override job.num_jobs',
    '  --run-time <duration>  Override job.run_time (e.g. 500ms, 10s, 1min)',
    '  --out-dir <dir>        Also write report.json to <dir> (or env OBJBENCH_OUT_DIR)',
    '  --json                 Print the report as JSON instead of text',
    '  --log-level <level>    fatal|error|warn|info|debug|trace|silent (or env OBJBENCH_LOG_LEVEL)',
    '  --help                 Show this help',
    '',
    'Example job file:',
    '  [service]',
    '  type = "fs"',
    '  prefix = "/tmp/objbench"',
    '',
    '  [job]',
    '  num_jobs = 4',
    '  workload = "download"',
    '  file_size = 1048576',
    '  run_time = "10s"',
    '',
  ].join('\n');
}

function parseWorkers(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n >= 1 ? n : undefined;
}

export function parseBenchCli(argv: readonly string[], env: Record<string, string | undefined>): CliCommand {
  let jobFile: string | undefined;
  let outDir = env.OBJBENCH_OUT_DIR || undefined;
  let json = false;
  let logLevelRaw = env.OBJBENCH_LOG_LEVEL || 'info';
  let numJobs: number | undefined;
  let runTimeMs: number | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg === '--help' || arg === '-h') return { kind: 'help' };

    if (arg === '--json') {
      json = true;
      continue;
    }

    if (arg === '--workers' || arg === '--run-time' || arg === '--out-dir' || arg === '--log-level') {
      const next = argv[i + 1];
      if (!next) return { kind: 'help', error: `${arg} requires a value` };
      i += 1;

      if (arg === '--workers') {
        numJobs = parseWorkers(next);
        if (numJobs === undefined) return { kind: 'help', error: `--workers must be a positive integer, got ${next}` };
      } else if (arg === '--run-time') {
        try {
          runTimeMs = parseDuration(next);
        } catch (err) {
          return { kind: 'help', error: `--run-time: ${err instanceof Error ? err.message : String(err)}` };
        }
      } else if (arg === '--out-dir') {
        outDir = next;
      } else {
        logLevelRaw = next;
      }
      continue;
    }

    if (arg.startsWith('-')) return { kind: 'help', error: `Unknown option: ${arg}` };

    if (!jobFile) {
      jobFile = arg;
      continue;
    }

    return { kind: 'help', error: `Unexpected argument: ${arg}` };
  }

  if (!jobFile) return { kind: 'help', error: 'Missing job file' };
  if (!isLogLevel(logLevelRaw)) return { kind: 'help', error: `Invalid log level: ${logLevelRaw}` };

  return {
    kind: 'run',
    options: { jobFile, outDir, json, logLevel: logLevelRaw, numJobs, runTimeMs },
  };
}
