import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Base class for the passes that run around the scan loop
 */
export abstract class BaseAnalyzer {
  private logger: Logger | null = null;

  /**
   * Get the analyzer name
   */
  abstract getName(): string;

  /**
   * Log analysis progress (silent by default, set FLOWSTORY_VERBOSE=1 to enable)
   */
  protected log(message: string): void {
    this.getLogger().log(message);
  }

  /**
   * Log warning (always shown)
   */
  protected warn(message: string): void {
    this.getLogger().warn(message);
  }

  private getLogger(): Logger {
    if (!this.logger) this.logger = createLogger(this.getName());
    return this.logger;
  }
}
