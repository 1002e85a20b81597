import type { Logger, LogLevel } from '../../domain/ports/Logger.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  /** Defaults to `LOG_LEVEL` from the environment, then `info`. */
  readonly level?: LogLevel;
  /** Fields merged into every entry (e.g. `{ batchId }`). */
  readonly fields?: Record<string, unknown>;
  /** Line writer. Defaults to stdout, with `error` entries going to stderr. */
  readonly write?: (line: string, level: LogLevel) => void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function defaultWrite(line: string, level: LogLevel): void {
  if (level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

/** JSON-lines logger: one `{ level, ts, msg, ...extra }` object per line. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const envLevel = process.env['LOG_LEVEL'];
  const threshold = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const write = options.write ?? defaultWrite;
  const fields = options.fields ?? {};

  const log = (level: LogLevel, msg: string, extra?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const entry = { level, ts: new Date().toISOString(), msg, ...fields, ...extra };
    write(JSON.stringify(entry), level);
  };

  return {
    debug: (msg, extra) => log('debug', msg, extra),
    info: (msg, extra) => log('info', msg, extra),
    warn: (msg, extra) => log('warn', msg, extra),
    error: (msg, extra) => log('error', msg, extra),
  };
}
