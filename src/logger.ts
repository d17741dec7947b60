export interface ImouLogger {
  debug(message: string, ...args: Array<unknown>): void;
  info(message: string, ...args: Array<unknown>): void;
  warn(message: string, ...args: Array<unknown>): void;
  error(message: string, ...args: Array<unknown>): void;
}

const DEBUG_ENABLED = Boolean(process?.env?.IMOU_PTZ_DEBUG);

/**
 * Console logger prefixed with the module scope. Debug output is only
 * printed when IMOU_PTZ_DEBUG is set.
 */
export function createLogger(scope: string): ImouLogger {
  const prefix = `[imou-ptz][${scope}]`;
  /* eslint-disable no-console */
  return {
    debug: (message, ...args) => {
      if (DEBUG_ENABLED) {
        console.debug(`${prefix} ${message}`, ...args);
      }
    },
    info: (message, ...args) => console.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => console.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => console.error(`${prefix} ${message}`, ...args)
  };
  /* eslint-enable no-console */
}
