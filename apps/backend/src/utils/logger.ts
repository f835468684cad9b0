export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const SERVICE = 'imageshelf';

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? '').toLowerCase();
  if (isLogLevel(configured)) return configured;
  if (process.env.NODE_ENV === 'test') return 'warn';
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

// Error instances stringify to `{}`; keep their name and message instead.
function plainValue(value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

function serialize(record: LogMeta): string {
  try {
    return JSON.stringify(record, (_key, value: unknown) => plainValue(value));
  } catch {
    return JSON.stringify({ time: record.time, level: record.level, msg: record.msg, service: SERVICE, logError: 'unserializable meta' });
  }
}

/** One JSON line per event: `{ time, level, service, msg, ...meta }`. Errors go to stderr. */
export function log(level: LogLevel, msg: string, meta: LogMeta = {}): void {
  if (SEVERITY[level] < SEVERITY[minimumLevel()]) return;

  const line = serialize({ time: new Date().toISOString(), level, service: SERVICE, msg, ...meta });
  const stream = level === 'error' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = {
  debug: (msg: string, meta?: LogMeta) => log('debug', msg, meta),
  info: (msg: string, meta?: LogMeta) => log('info', msg, meta),
  warn: (msg: string, meta?: LogMeta) => log('warn', msg, meta),
  error: (msg: string, meta?: LogMeta) => log('error', msg, meta),
};
