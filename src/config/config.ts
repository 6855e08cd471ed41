import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import JSON5 from 'json5';
import type { SkongConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { TRACKING_DIR } from '../projects/store.js';
import { isLogLevel, logger } from '../utils/logger.js';

const GLOBAL_CONFIG_FILE = join(homedir(), TRACKING_DIR, 'config.json');
const LOCAL_CONFIG_FILE = join(TRACKING_DIR, 'config.json');

type ConfigObject = Record<string, unknown>;

function isObject(value: unknown): value is ConfigObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function loadJsonFile(path: string): Promise<ConfigObject | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON5.parse(content);
    if (isObject(parsed)) return parsed;
    logger.warn(`Ignoring ${path}: config must be an object`);
  } catch (err) {
    logger.warn(`Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return null;
}

function deepMerge(base: ConfigObject, override: ConfigObject): ConfigObject {
  const result = { ...base };
  for (const key of Object.keys(override)) {
    const val = override[key];
    const current = result[key];
    if (isObject(val) && isObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

function pick<T>(value: unknown, guard: (v: unknown) => v is T, fallback: T): T {
  return guard(value) ? value : fallback;
}

const isString = (v: unknown): v is string => typeof v === 'string' && v.length > 0;
const isCount = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v) && v >= 0;
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';

/** Keep recognised, well-typed fields and fall back to defaults for the rest. */
export function normalizeConfig(raw: ConfigObject): SkongConfig {
  const scheduler: ConfigObject = isObject(raw.scheduler) ? raw.scheduler : {};
  return {
    scheduler: {
      command: pick(scheduler.command, isString, DEFAULT_CONFIG.scheduler.command),
      timeoutMs: pick(scheduler.timeoutMs, isCount, DEFAULT_CONFIG.scheduler.timeoutMs),
    },
    jobScript: pick(raw.jobScript, isString, DEFAULT_CONFIG.jobScript),
    submitLimit: pick(raw.submitLimit, isCount, DEFAULT_CONFIG.submitLimit),
    logLevel: pick(raw.logLevel, isLogLevel, DEFAULT_CONFIG.logLevel),
    jsonOutput: pick(raw.jsonOutput, isBoolean, DEFAULT_CONFIG.jsonOutput),
  };
}

let cachedConfig: SkongConfig | null = null;

export interface LoadConfigOptions {
  /** Directory holding the local `.skong/config.json` (default: cwd) */
  cwd?: string;
  /** Override the global config file, mostly for tests */
  globalFile?: string;
}

export async function loadConfig(options?: LoadConfigOptions): Promise<SkongConfig> {
  if (cachedConfig) return cachedConfig;

  let merged: ConfigObject = { ...DEFAULT_CONFIG, scheduler: { ...DEFAULT_CONFIG.scheduler } };

  const globalPath = options?.globalFile ?? GLOBAL_CONFIG_FILE;
  const globalConfig = await loadJsonFile(globalPath);
  if (globalConfig) {
    logger.debug('Loaded global config from ' + globalPath);
    merged = deepMerge(merged, globalConfig);
  }

  const localPath = options?.cwd ? join(options.cwd, LOCAL_CONFIG_FILE) : LOCAL_CONFIG_FILE;
  const localConfig = await loadJsonFile(localPath);
  if (localConfig) {
    logger.debug('Loaded local config from ' + localPath);
    merged = deepMerge(merged, localConfig);
  }

  cachedConfig = normalizeConfig(merged);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
