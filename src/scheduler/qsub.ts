import { exec } from '../utils/process.js';
import { SchedulerError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface SubmitScriptOptions {
  /** Job directory; the script name is resolved relative to it. */
  cwd: string;
  restart: 0 | 1;
  command?: string;
  timeoutMs?: number;
}

export interface SubmitScriptResult {
  jobId: string;
  /** Untrimmed scheduler reply, e.g. "12345.pbs-server\n" */
  raw: string;
}

export function buildQsubArgs(scriptName: string, restart: 0 | 1): string[] {
  return ['-v', `RESTART=${restart}`, scriptName];
}

export function parseJobId(stdout: string): string {
  const reply = stdout.trim();
  const dot = reply.indexOf('.');
  return dot === -1 ? reply : reply.slice(0, dot);
}

/**
 * Submit one script through the scheduler binary.
 * Throws CommandNotFoundError when the binary is missing and
 * SchedulerError when it exits non-zero.
 */
export async function submitScript(scriptName: string, options: SubmitScriptOptions): Promise<SubmitScriptResult> {
  const command = options.command ?? 'qsub';
  const args = buildQsubArgs(scriptName, options.restart);
  logger.debug(`Running ${command} ${args.join(' ')} in ${options.cwd}`);

  const result = await exec(command, args, { cwd: options.cwd, timeout: options.timeoutMs });
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    throw new SchedulerError(
      `${command} exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
      result.exitCode,
      stderr,
    );
  }

  return { jobId: parseJobId(result.stdout), raw: result.stdout };
}
