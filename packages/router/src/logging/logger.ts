/**
 * Console logger with a bracketed scope prefix, e.g. `[router] Dispatched …`.
 *
 * `debug` output is suppressed unless PUSH_DISPATCH_DEBUG is set.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const prefix = `[${scope}]`;
  const debugEnabled = Boolean(env['PUSH_DISPATCH_DEBUG']);

  return {
    debug(message, ...details) {
      if (debugEnabled) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
