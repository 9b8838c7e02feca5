/**
 * Levelled JSON-lines logger for library diagnostics.
 * Warnings and errors go to stderr, everything else to stdout unless the
 * sink is set to 'stderr' (the CLI keeps stdout for results).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly time: string;
  readonly [key: string]: unknown;
}

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export type LogSink = 'split' | 'stderr';

let currentLevel: LogLevel = 'info';
let currentSink: LogSink = 'split';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setLogSink(sink: LogSink): void {
  currentSink = sink;
}

function writeLog(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;

  const entry: LogEntry = {
    level,
    msg,
    time: new Date().toISOString(),
    ...ctx,
  };
  const out = JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
  if (currentSink === 'stderr' || level === 'error' || level === 'warn') {
    process.stderr.write(out + '\n');
  } else {
    process.stdout.write(out + '\n');
  }
}

export const logger = {
  debug(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('debug', msg, ctx);
  },
  info(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('info', msg, ctx);
  },
  warn(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('warn', msg, ctx);
  },
  error(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('error', msg, ctx);
  },
};
