import type { Command } from 'commander';
import { init } from '../../projects/store.js';
import { failWith, printJson, printSuccess, isJsonOutput } from '../output.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize .skong tracking in a directory')
    .argument('[path]', 'directory to initialize', '.')
    .action(async (path: string) => {
      try {
        const dir = await init(path);
        if (isJsonOutput()) {
          printJson({ trackingDir: dir, status: 'INITIALIZED' });
          return;
        }
        printSuccess(`Initialized .skong in ${dir}`);
      } catch (err) {
        failWith(err);
      }
    });
}
