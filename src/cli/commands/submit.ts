import { InvalidArgumentError, type Command } from 'commander';
import ora from 'ora';
import { basename } from 'node:path';
import type { Status } from '../../status/status.js';
import { submitJobs, type SubmissionRecord } from '../../batch/submitter.js';
import { getContext } from '../context.js';
import { setLogWriter, type LogWriter } from '../../utils/logger.js';
import { failWith, printInfo, printJson, printSuccess, printTable, isJsonOutput } from '../output.js';

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(limit)) {
    throw new InvalidArgumentError('Limit must be an integer.');
  }
  return limit;
}

/** The parts of an ora spinner a log line has to work around. */
export interface SpinnerSurface {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

/** Log lines written while a spinner is running, without leaving frame debris. */
export function spinnerLogWriter(spinner: SpinnerSurface): LogWriter {
  return (line) => {
    spinner.clear();
    console.error(line);
    // ora never animates on a non-TTY stream; render() would still print a frame there
    if (spinner.isSpinning) spinner.render();
  };
}

interface SweepOptions {
  job?: string;
  path: string;
}

async function runSweep(targetStatus: Status, verb: string, limit: number | undefined, options: SweepOptions): Promise<void> {
  const ctx = await getContext();
  const spinner = isJsonOutput() ? null : ora(`Submitting ${targetStatus} jobs from ${options.path}...`).start();

  if (spinner) {
    setLogWriter(spinnerLogWriter(spinner));
  }

  let records: SubmissionRecord[];
  try {
    records = await submitJobs(targetStatus, {
      limit: limit ?? ctx.config.submitLimit,
      jobScript: options.job ?? ctx.config.jobScript,
      path: options.path,
      scheduler: ctx.scheduler,
      onSubmitted: (record) => {
        if (spinner) spinner.text = `Submitted ${basename(record.dir)} (${record.jobId})`;
      },
    });
  } catch (err) {
    spinner?.stop();
    failWith(err);
    return;
  } finally {
    setLogWriter();
    spinner?.stop();
  }

  if (isJsonOutput()) {
    printJson({ [verb]: records });
    return;
  }

  if (records.length > 0) {
    printTable(
      ['Directory', 'Job ID', 'Submitted'],
      records.map(r => [basename(r.dir), r.jobId, r.timestamp]),
    );
    printSuccess(`${records.length} job(s) ${verb}.`);
  } else {
    printInfo(`0 job(s) ${verb}.`);
  }
}

export function registerSubmitCommands(program: Command): void {
  program
    .command('sub')
    .description('Submit INITIALIZED jobs via qsub')
    .argument('[limit]', 'max number of jobs to submit (default from config: 10)', parseLimit)
    .option('--job <file>', 'PBS script filename (default from config: job.pbs)')
    .option('--path <dir>', 'parent directory to scan', '.')
    .action(async (limit: number | undefined, options: SweepOptions) => {
      await runSweep('INITIALIZED', 'submitted', limit, options);
    });

  program
    .command('continue')
    .description('Re-submit PARTIAL (incomplete) jobs via qsub')
    .argument('[limit]', 'max number of jobs to submit (default from config: 10)', parseLimit)
    .option('--job <file>', 'PBS script filename (default from config: job.pbs)')
    .option('--path <dir>', 'parent directory to scan', '.')
    .action(async (limit: number | undefined, options: SweepOptions) => {
      await runSweep('PARTIAL', 're-submitted', limit, options);
    });
}
