import type { Command } from 'commander';
import { log, parseEntry, readHistory, type HistoryEntry } from '../../projects/history.js';
import { failWith, printError, printInfo, printJson, printSuccess, printTable, isJsonOutput } from '../output.js';

function describeEntry(entry: HistoryEntry): string {
  const rest = Object.entries(entry).filter(([key]) => key !== 'event' && key !== 'timestamp');
  return rest.length > 0 ? JSON.stringify(Object.fromEntries(rest)) : '';
}

export function registerLogCommands(program: Command): void {
  program
    .command('log')
    .description('Append a JSON entry to .skong/history.jsonl')
    .argument('<entry>', 'JSON object to log, e.g. \'{"step": 1, "energy": -42.5}\'')
    .argument('[path]', 'project directory', '.')
    .action(async (raw: string, path: string) => {
      try {
        parseEntry(raw);
      } catch (err) {
        printError(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
        return;
      }

      try {
        await log(raw, path);
        printSuccess('Entry logged.');
      } catch (err) {
        failWith(err);
      }
    });

  program
    .command('history')
    .description('Show the history log of a project')
    .argument('[path]', 'project directory', '.')
    .action(async (path: string) => {
      try {
        const entries = await readHistory(path);
        if (isJsonOutput()) {
          printJson(entries);
          return;
        }
        if (entries.length === 0) {
          printInfo('No history entries.');
          return;
        }
        const rows = entries.map((e, i) => [
          String(i + 1),
          typeof e.timestamp === 'string' ? e.timestamp : '-',
          typeof e.event === 'string' ? e.event : '-',
          describeEntry(e),
        ]);
        printTable(['#', 'Timestamp', 'Event', 'Details'], rows);
      } catch (err) {
        failWith(err);
      }
    });
}
