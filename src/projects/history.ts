import { appendFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { requireInitialized } from './store.js';
import { HistoryParseError } from '../errors.js';

export const HISTORY_FILE = 'history.jsonl';

export type HistoryEntry = Record<string, unknown>;

/** Entry the submitter appends after a successful `qsub`. */
export interface SubmittedEvent extends HistoryEntry {
  event: 'submitted';
  job_id: string;
  timestamp: string;
  restart: 0 | 1;
  previous_status: string;
}

export function parseEntry(raw: string): HistoryEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SyntaxError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isHistoryEntry(parsed)) {
    throw new TypeError('Entry must be a JSON object.');
  }
  return parsed;
}

/**
 * Single history line for `entry`.
 *
 * Text is validated but written as given, minus line breaks, so numbers
 * beyond double precision survive. Line breaks are whitespace in valid JSON.
 */
export function historyLine(entry: HistoryEntry | string): string {
  if (typeof entry !== 'string') {
    return JSON.stringify(entry);
  }
  const line = entry.replace(/[\r\n]+/g, ' ').trim();
  parseEntry(line);
  return line;
}

export async function log(entry: HistoryEntry | string, path: string = process.cwd()): Promise<void> {
  const line = historyLine(entry);
  const dir = await requireInitialized(path);
  await appendFile(join(dir, HISTORY_FILE), line + '\n', 'utf-8');
}

export async function readHistory(path: string = process.cwd()): Promise<HistoryEntry[]> {
  const dir = await requireInitialized(path);
  let content: string;
  try {
    content = await readFile(join(dir, HISTORY_FILE), 'utf-8');
  } catch {
    return [];
  }

  const entries: HistoryEntry[] = [];
  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new HistoryParseError(i + 1, err instanceof Error ? err.message : String(err));
    }
    if (!isHistoryEntry(parsed)) {
      throw new HistoryParseError(i + 1, 'entry is not a JSON object');
    }
    entries.push(parsed);
  }
  return entries;
}

export function isHistoryEntry(value: unknown): value is HistoryEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
