import settings from '../config/settings';

export const DEBUG = {
  enabled: settings.debug,
};

type LogFn = (...args: unknown[]) => void;

export interface Logger {
  log: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/**
 * Creates a namespaced logger. Everything except errors is silent unless
 * debug logging is switched on, so normal runs leave the terminal UI alone.
 *
 * @example
 * const log = createLogger('Api')
 * log.info('GET /', { q: 'graphs' }) // [Api] GET / { q: 'graphs' } (debug only)
 * log.error('Request failed', err)   // [Api] Request failed ... (always)
 */
export function createLogger(namespace: string): Logger {
  const prefix = `[${namespace}]`;

  return {
    log: (...args: unknown[]) => {
      if (DEBUG.enabled) console.log(prefix, ...args);
    },
    info: (...args: unknown[]) => {
      if (DEBUG.enabled) console.info(prefix, ...args);
    },
    warn: (...args: unknown[]) => {
      if (DEBUG.enabled) console.warn(prefix, ...args);
    },
    error: (...args: unknown[]) => {
      console.error(prefix, ...args);
    },
  };
}
