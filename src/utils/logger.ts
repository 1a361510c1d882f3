export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function isVerbose(): boolean {
  return process.env.FLOWSTORY_VERBOSE === '1';
}

/**
 * Scoped logger: progress output is silent unless FLOWSTORY_VERBOSE=1,
 * warnings and errors always print.
 */
export function createLogger(scope: string): Logger {
  return {
    log(message: string): void {
      if (isVerbose()) {
        console.log(`[${scope}] ${message}`);
      }
    },
    warn(message: string): void {
      console.warn(`⚠️ ${message}`);
    },
    error(message: string, error?: unknown): void {
      console.error(`❌ ${message}`, error instanceof Error ? error.message : '');
    },
  };
}
