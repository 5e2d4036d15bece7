/**
 * Console logger shared by the ledger pipeline, batch runner and CLI.
 * Lines read `[time] [LEVEL] [Stage] message {meta}`; stages tag themselves
 * (`Pipeline`, `Batch`, `TickRounder`, `CLI`). `LOG_LEVEL` is re-read on each
 * call so tests and `.env` can change it after import.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function minLevel(): number {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function log(level: LogLevel, tag: string, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < minLevel()) return;
  const ts = new Date().toISOString();
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${ts}] [${level.toUpperCase()}] [${tag}] ${message}${metaStr}`;
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export const logger = {
  debug(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('debug', tag, msg, meta);
  },
  info(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('info', tag, msg, meta);
  },
  warn(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('warn', tag, msg, meta);
  },
  error(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('error', tag, msg, meta);
  }
};
