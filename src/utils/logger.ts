import pino from 'pino';

const base = pino({
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  base: { service: 'forum-post-admin-bot' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

function bindings(meta: unknown): Record<string, unknown> {
  if (meta === undefined) {
    return {};
  }
  if (meta instanceof Error) {
    return { err: meta };
  }
  return { data: meta };
}

/**
 * Application logger
 * Keeps the (message, meta) call shape used across handlers and services
 */
export const logger = {
  debug(message: string, meta?: unknown): void {
    base.debug(bindings(meta), message);
  },
  info(message: string, meta?: unknown): void {
    base.info(bindings(meta), message);
  },
  warn(message: string, meta?: unknown): void {
    base.warn(bindings(meta), message);
  },
  error(message: string, meta?: unknown): void {
    base.error(bindings(meta), message);
  },
};

export type Logger = typeof logger;
