/*
  Minimal application logger. Everything goes to stderr so that stdout only ever
  carries a report; the level threshold is the only knob.
*/
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

function enabled(level: LogLevel) {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.error('[debug]', ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.error('[info]', ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.error('[warn]', ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error('[error]', ...args);
  }
};
