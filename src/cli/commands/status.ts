import { Argument, type Command } from 'commander';
import { STATUSES, parseStatus } from '../../status/status.js';
import { readStatus, setStatus } from '../../projects/store.js';
import { failWith, printError, printJson, printSuccess, isJsonOutput, statusColor } from '../output.js';

export function registerStatusCommands(program: Command): void {
  program
    .command('set-status')
    .description('Set the project status')
    .addArgument(new Argument('<status>', 'status to set').choices(STATUSES))
    .argument('[path]', 'project directory', '.')
    .action(async (value: string, path: string) => {
      try {
        const status = parseStatus(value);
        await setStatus(status, path);
        printSuccess(`Status set to ${statusColor(status)}`);
      } catch (err) {
        failWith(err);
      }
    });

  program
    .command('read-status')
    .description('Read the current project status')
    .argument('[path]', 'project directory', '.')
    .action(async (path: string) => {
      try {
        const status = await readStatus(path);
        if (!status) {
          printError('No status found.');
          process.exitCode = 1;
          return;
        }
        if (isJsonOutput()) {
          printJson({ status });
          return;
        }
        // Plain value so scripts can capture it
        console.log(status);
      } catch (err) {
        failWith(err);
      }
    });
}
