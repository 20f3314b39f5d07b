import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { env } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  format: 'text' | 'json';
  /** Plain-text log file; empty or omitted disables it. */
  file?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

// Error instances stringify to {} otherwise
function replacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? `${value.name}: ${value.message}` : value;
}

export function formatLine(
  format: LoggerOptions['format'],
  ts: string,
  level: LogLevel,
  message: string,
  meta?: LogMeta,
): string {
  if (format === 'json') {
    return JSON.stringify({ timestamp: ts, level, message, ...meta }, replacer);
  }
  return meta
    ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(meta, replacer)}`
    : `[${ts}] [${level.toUpperCase()}] ${message}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const stdout = options.stdout ?? ((line: string) => process.stdout.write(line + '\n'));
  const stderr = options.stderr ?? ((line: string) => process.stderr.write(line + '\n'));
  let file = options.file || null;
  let fileReady = false;

  // A broken file sink is reported once on stderr, then switched off
  const toFile = (line: string): void => {
    if (!file) return;
    try {
      if (!fileReady) {
        mkdirSync(dirname(file), { recursive: true });
        fileReady = true;
      }
      appendFileSync(file, line + '\n');
    } catch (err) {
      stderr(`[logger] file sink disabled (${file}): ${err instanceof Error ? err.message : String(err)}`);
      file = null;
    }
  };

  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVELS[level] < LEVELS[options.level]) return;
    const out = formatLine(options.format, new Date().toISOString(), level, message, meta);
    level === 'error' ? stderr(out) : stdout(out);
    toFile(out);
  };

  return {
    debug: (msg, meta) => log('debug', msg, meta),
    info:  (msg, meta) => log('info',  msg, meta),
    warn:  (msg, meta) => log('warn',  msg, meta),
    error: (msg, meta) => log('error', msg, meta),
  };
}

export const logger = createLogger({
  level:  env.LOG_LEVEL,
  format: env.LOG_FORMAT,
  file:   env.LOG_FILE,
});
