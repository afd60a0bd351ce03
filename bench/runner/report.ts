import type { SampleSet } from '../stats/sample_set.ts';
import type { JobConfig, Workload } from './job_config.ts';
import type { JobResult } from './run.ts';

export interface Metric {
  numSamples: number;
  min: number;
  max: number;
  avg: number;
  stdev: number;
  p99: number;
  p95: number;
  p50: number;
}

export interface JobReport {
  service: string;
  workload: Workload;
  numJobs: number;
  fileSize: number;
  runTimeMs: number;
  elapsedMs: number;
  /** KiB/s */
  bandwidth: Metric;
  /** ms */
  latency: Metric;
  /** operations/s */
  iops: Metric;
}

export const BYTES_PER_KIB = 1024;

export function summarize(samples: SampleSet, scale = 1): Metric {
  return {
    numSamples: samples.count,
    min: samples.min() * scale,
    max: samples.max() * scale,
    avg: samples.avg() * scale,
    stdev: samples.stdev() * scale,
    p99: samples.percentile(99) * scale,
    p95: samples.percentile(95) * scale,
    p50: samples.percentile(50) * scale,
  };
}

export function buildJobReport(config: JobConfig, result: JobResult): JobReport {
  return {
    service: config.service.type,
    workload: config.job.workload,
    numJobs: config.job.numJobs,
    fileSize: config.job.fileSize,
    runTimeMs: config.job.runTimeMs,
    elapsedMs: result.elapsedMs,
    bandwidth: summarize(result.bandwidth, 1 / BYTES_PER_KIB),
    latency: summarize(result.latency),
    iops: summarize(result.iops),
  };
}

export function formatValue(value: number): string {
  return Number.isFinite(value) ? value.toFixed(3) : 'n/a';
}

function formatMetric(title: string, unit: string, metric: Metric): string[] {
  const suffix = unit ? `(${unit})` : '';
  return [
    `${title}:`,
    `  num_samples: ${metric.numSamples}`,
    `  min${suffix}: ${formatValue(metric.min)}`,
    `  max${suffix}: ${formatValue(metric.max)}`,
    `  avg${suffix}: ${formatValue(metric.avg)}`,
    `  stdev${suffix}: ${formatValue(metric.stdev)}`,
    `  p99${suffix}: ${formatValue(metric.p99)}`,
    `  p95${suffix}: ${formatValue(metric.p95)}`,
    `  p50${suffix}: ${formatValue(metric.p50)}`,
  ];
}

export function formatJobReport(report: JobReport): string {
  return [
    `Service: ${report.service}`,
    `Workload: ${report.workload}`,
    `Jobs: ${report.numJobs}`,
    `File size: ${report.fileSize} bytes`,
    `Run time: ${formatValue(report.elapsedMs / 1000)}s (requested ${formatValue(report.runTimeMs / 1000)}s)`,
    '',
    ...formatMetric('Bandwidth', 'KiB/s', report.bandwidth),
    '',
    ...formatMetric('Latency', 'ms', report.latency),
    '',
    ...formatMetric('IOPS', '', report.iops),
    '',
  ].join('\n');
}
