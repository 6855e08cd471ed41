import { Argument, type Command } from 'commander';
import { basename } from 'node:path';
import { STATUSES, parseStatus } from '../../status/status.js';
import { listStatus } from '../../batch/scanner.js';
import { failWith, printInfo, printJson, isJsonOutput } from '../output.js';

export function registerLsCommand(program: Command): void {
  program
    .command('ls')
    .description('List sub-directories matching a given status')
    .addArgument(new Argument('<status>', 'status to filter by').choices(STATUSES))
    .option('--path <dir>', 'parent directory to scan', '.')
    .action(async (value: string, options: { path: string }) => {
      try {
        const status = parseStatus(value);
        const names = (await listStatus(status, options.path)).map(dir => basename(dir));
        if (isJsonOutput()) {
          printJson(names);
          return;
        }
        if (names.length === 0) {
          printInfo(`No sub-directories with status ${status}.`);
          return;
        }
        for (const name of names) {
          console.log(name);
        }
      } catch (err) {
        failWith(err);
      }
    });
}
