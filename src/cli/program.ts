import { Command } from 'commander';
import { setJsonOutput } from './output.js';
import { registerInitCommand } from './commands/init.js';
import { registerStatusCommands } from './commands/status.js';
import { registerLogCommands } from './commands/log.js';
import { registerSubmitCommands } from './commands/submit.js';
import { registerLsCommand } from './commands/ls.js';
import { getContext } from './context.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('skong')
    .description('Track the history of computational projects and submit them to PBS')
    .version(VERSION)
    .option('--json', 'output in JSON format')
    .hook('preAction', async (thisCommand) => {
      // Loads config and applies its log level before any command runs
      await getContext();
      const opts = thisCommand.opts();
      if (opts.json) {
        setJsonOutput(true);
      }
    });

  registerInitCommand(program);
  registerStatusCommands(program);
  registerLogCommands(program);
  registerSubmitCommands(program);
  registerLsCommand(program);

  return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
