import chalk, { type ChalkInstance } from 'chalk';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVEL_NAMES[number];

type MessageLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const STYLE: Record<MessageLevel, { tag: string; color: ChalkInstance }> = {
  debug: { tag: 'DEBUG', color: chalk.gray },
  info: { tag: 'INFO ', color: chalk.green },
  warn: { tag: 'WARN ', color: chalk.yellow },
  error: { tag: 'ERROR', color: chalk.red },
};

export type LogWriter = (line: string) => void;

const writeToStderr: LogWriter = (line) => console.error(line);

let currentLevel: LogLevel = 'info';
let writer: LogWriter = writeToStderr;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Redirect log lines, e.g. so a spinner can clear itself first.
 * Pass nothing to go back to stderr.
 */
export function setLogWriter(next?: LogWriter): void {
  writer = next ?? writeToStderr;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** Logger whose lines are labelled with a job directory (or any other scope). */
  scoped(label: string): Logger;
}

function createLogger(scope?: string): Logger {
  const emit = (level: MessageLevel, msg: string): void => {
    if (SEVERITY[level] < SEVERITY[currentLevel]) return;
    const { tag, color } = STYLE[level];
    const time = new Date().toISOString().slice(11, 19);
    const label = scope ? `[${scope}] ` : '';
    writer(color(`[${time}] ${tag} ${label}${msg}`));
  };

  return {
    debug: (msg) => emit('debug', msg),
    info: (msg) => emit('info', msg),
    warn: (msg) => emit('warn', msg),
    error: (msg) => emit('error', msg),
    scoped: (label) => createLogger(scope ? `${scope}/${label}` : label),
  };
}

// Everything goes to stderr by default so `ls` and `read-status` stay pipeable.
export const logger: Logger = createLogger();
