/**
 * Debug logging for hooks.
 *
 * stdout belongs to the hook protocol, so events go to stderr, one JSON
 * object per line, and only when debug is enabled.
 */

export type LogCategory = 'io' | 'filter' | 'state' | 'resolve' | 'error';

export interface Logger {
  log(category: LogCategory, message: string, details?: Record<string, unknown>): void;
}

export const silentLogger: Logger = {
  log() {},
};

export function createLogger(enabled: boolean, hookName: string): Logger {
  if (!enabled) return silentLogger;

  return {
    log(category, message, details) {
      console.error(
        JSON.stringify({
          time: new Date().toISOString(),
          hook: hookName,
          category,
          message,
          ...details,
        })
      );
    },
  };
}

/** Normalise a caught value to a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
