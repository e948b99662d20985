export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

let threshold: LogLevel = 'warn';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(RANK, value);
}

const enabled = (level: LogLevel) => RANK[level] >= RANK[threshold];

// Console logging with a bracketed tag, e.g. log.debug('[Gen]', 'seed', seed)
export const log = {
  debug: (tag: string, ...args: unknown[]) => { if (enabled('debug')) console.debug(tag, ...args); },
  info: (tag: string, ...args: unknown[]) => { if (enabled('info')) console.info(tag, ...args); },
  warn: (tag: string, ...args: unknown[]) => { if (enabled('warn')) console.warn(tag, ...args); },
  error: (tag: string, ...args: unknown[]) => { if (enabled('error')) console.error(tag, ...args); }
};
