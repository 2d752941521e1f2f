export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EntryLevel = Exclude<LogLevel, 'silent'>;

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

export type LogSink = (level: EntryLevel, line: string) => void;

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
};

// Errors are not enumerable, JSON.stringify would drop them to {}
function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export function createLogger(
  level: LogLevel,
  bindings: LogMeta = {},
  sink: LogSink = consoleSink,
): Logger {
  const threshold = PRIORITY[level];

  const write = (entryLevel: EntryLevel, msg: string, meta: LogMeta = {}): void => {
    if (PRIORITY[entryLevel] < threshold) return;

    const entry: LogMeta = { time: new Date().toISOString(), level: entryLevel, msg };
    for (const [key, value] of Object.entries({ ...bindings, ...meta })) {
      entry[key] = serialize(value);
    }
    sink(entryLevel, JSON.stringify(entry));
  };

  return {
    debug: (msg, meta) => write('debug', msg, meta),
    info: (msg, meta) => write('info', msg, meta),
    warn: (msg, meta) => write('warn', msg, meta),
    error: (msg, meta) => write('error', msg, meta),
    child: extra => createLogger(level, { ...bindings, ...extra }, sink),
  };
}
