import { mkdir, rm, stat, writeFile, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { STATUSES, type Status } from '../status/status.js';
import { NotInitializedError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const TRACKING_DIR = '.skong';

export function trackingDir(path: string): string {
  return join(path, TRACKING_DIR);
}

function markerPath(path: string, status: Status): string {
  return join(trackingDir(path), status);
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isInitialized(path: string = process.cwd()): Promise<boolean> {
  try {
    return (await stat(trackingDir(path))).isDirectory();
  } catch {
    return false;
  }
}

export async function requireInitialized(path: string): Promise<string> {
  if (!(await isInitialized(path))) {
    throw new NotInitializedError(path);
  }
  return trackingDir(path);
}

/** Create the tracking directory (if needed) and mark the project INITIALIZED. */
export async function init(path: string = process.cwd()): Promise<string> {
  const dir = trackingDir(path);
  await mkdir(dir, { recursive: true });
  await setStatus('INITIALIZED', path);
  logger.debug(`Initialized ${dir}`);
  return resolve(dir);
}

/**
 * Overwrite the project status. Any status may replace any other.
 *
 * All other markers are removed first, so at most one remains. INITIALIZED
 * is allowed on an untracked directory and creates the tracking directory.
 */
export async function setStatus(status: Status, path: string = process.cwd(), content = ''): Promise<void> {
  if (status === 'INITIALIZED') {
    await mkdir(trackingDir(path), { recursive: true });
  } else {
    await requireInitialized(path);
  }

  for (const other of STATUSES) {
    if (other === status) continue;
    await rm(markerPath(path, other), { force: true });
  }
  await writeFile(markerPath(path, status), content, 'utf-8');
  logger.debug(`Set status of ${path} to ${status}`);
}

/** Every status whose marker is present, in declaration order. */
export async function listMarkers(path: string = process.cwd()): Promise<Status[]> {
  await requireInitialized(path);
  const present: Status[] = [];
  for (const status of STATUSES) {
    if (await exists(markerPath(path, status))) {
      present.push(status);
    }
  }
  return present;
}

export async function readStatus(path: string = process.cwd()): Promise<Status | null> {
  const present = await listMarkers(path);
  if (present.length > 1) {
    logger.warn(`Multiple status markers in ${resolve(trackingDir(path))}: ${present.join(', ')}. Using ${present[0]}.`);
  }
  return present[0] ?? null;
}

/** Text stored in a marker, or null when that marker is absent. */
export async function readMarker(status: Status, path: string = process.cwd()): Promise<string | null> {
  await requireInitialized(path);
  try {
    return await readFile(markerPath(path, status), 'utf-8');
  } catch {
    return null;
  }
}
