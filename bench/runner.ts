import { saveJobArtifacts } from './runner/artifacts.ts';
import { formatBenchUsage, parseBenchCli, type CliOptions } from './runner/config.ts';
import { describeErrorChain } from './runner/errors.ts';
import { loadJobConfig, withJobOverrides } from './runner/job_config.ts';
import { buildJobReport, formatJobReport } from './runner/report.ts';
import { runJob } from './runner/run.ts';
import { createLogger } from './util/logger.ts';

async function runFromCli(options: CliOptions): Promise<void> {
  const logger = createLogger(options.logLevel);
  const config = withJobOverrides(await loadJobConfig(options.jobFile), options);

  const result = await runJob(config, { logger });
  const report = buildJobReport(config, result);

  if (options.outDir) await saveJobArtifacts(options.outDir, report, logger);

  process.stdout.write(options.json ? `${JSON.stringify(report, null, 2)}\n` : formatJobReport(report));
}

const command = parseBenchCli(process.argv.slice(2), process.env);

if (command.kind === 'help') {
  if (command.error) console.error(command.error);
  process.stdout.write(formatBenchUsage());
  process.exitCode = command.error ? 1 : 0;
} else {
  try {
    await runFromCli(command.options);
  } catch (err) {
    console.error(`objbench: ${describeErrorChain(err)}`);
    process.exitCode = 1;
  }
}
