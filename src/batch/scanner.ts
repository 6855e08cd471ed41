import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Status } from '../status/status.js';
import { trackingDir } from '../projects/store.js';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function hasMarker(project: string, status: Status): Promise<boolean> {
  if (!(await isDirectory(trackingDir(project)))) return false;
  try {
    await stat(join(trackingDir(project), status));
    return true;
  } catch {
    return false;
  }
}

/**
 * Immediate sub-directories of `path` currently marked with `status`,
 * sorted by name. Plain files and untracked directories are ignored.
 */
export async function listStatus(status: Status, path: string = process.cwd()): Promise<string[]> {
  const parent = resolve(path);
  const names = (await readdir(parent)).sort();

  const matches: string[] = [];
  for (const name of names) {
    const child = join(parent, name);
    // stat follows symlinks, so a linked job directory still counts
    if (!(await isDirectory(child))) continue;
    if (await hasMarker(child, status)) {
      matches.push(child);
    }
  }
  return matches;
}
