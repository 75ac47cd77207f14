import { redact } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  ts: string;
  msg: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env['LOG_LEVEL'];
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  const entry: LogEntry = {
    level,
    ts: new Date().toISOString(),
    msg,
    ...extra,
  };
  const line = JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'string' ? redact(value) : value,
  );
  if (level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

function createLogger(bindings: Record<string, unknown>): Logger {
  const merge = (extra?: Record<string, unknown>) => ({ ...bindings, ...extra });
  return {
    debug: (msg, extra) => log('debug', msg, merge(extra)),
    info: (msg, extra) => log('info', msg, merge(extra)),
    warn: (msg, extra) => log('warn', msg, merge(extra)),
    error: (msg, extra) => log('error', msg, merge(extra)),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger: Logger = createLogger({});
