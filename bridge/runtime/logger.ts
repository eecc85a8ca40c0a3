import type { Logger } from '../types/index.js';

/**
 * Console logger. Debug lines only appear when REDMINE_BRIDGE_DEBUG is set.
 */
export function createConsoleLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const debugEnabled = Boolean(env.REDMINE_BRIDGE_DEBUG);

  return {
    debug: (msg: string) => {
      if (debugEnabled) console.debug(`[debug] ${msg}`);
    },
    info: (msg: string) => console.log(msg),
    error: (msg: string) => console.error(msg),
  };
}

export const consoleLogger: Logger = createConsoleLogger();
