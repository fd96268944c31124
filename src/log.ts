export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
}

function line(level: string, msg: string): string {
  return `${new Date().toISOString()} - ${level} - ${msg}`;
}

/**
 * Console-backed logger. `debug` lines only appear when DEBUG is set.
 */
export const logger: Logger = {
  debug: (msg, meta) => {
    if (process.env.DEBUG) {
      console.log(line('DEBUG', msg), meta ? JSON.stringify(meta) : '');
    }
  },

  info: (msg, meta) => {
    console.log(line('INFO', msg), meta ? JSON.stringify(meta) : '');
  },

  warn: (msg, meta) => {
    console.warn(line('WARN', msg), meta ? JSON.stringify(meta) : '');
  },

  error: (msg, error) => {
    console.error(line('ERROR', msg), error instanceof Error ? error.message : error ?? '');
  },
};
