/**
 * Logging utility for zone-connect
 * Console-backed logger shared by the directory, factory and resolvers
 */

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export interface LoggingConfig {
  component?: string;
  enableInfoLogs?: boolean;
  enableDebugLogs?: boolean;
  enableTestMode?: boolean;
}

export class FrameworkLogger implements Logger {
  private readonly prefix: string;

  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
    this.prefix = config.component ? `[${config.component}] ` : '';
  }

  /**
   * Log informational messages (connection setup, credential notices)
   */
  info(message: string, ...args: unknown[]): void {
    if (this.config.enableInfoLogs !== false && !this.config.enableTestMode) {
      console.log(`${this.prefix}[INFO] ${message}`, ...args);
    }
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`${this.prefix}[WARN] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`${this.prefix}[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Log debug messages (development, or when explicitly enabled)
   */
  debug(message: string, ...args: unknown[]): void {
    const enabled = this.config.enableDebugLogs ?? process.env.NODE_ENV === 'development';
    if (enabled && !this.config.enableTestMode) {
      console.debug(`${this.prefix}[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): FrameworkLogger {
  return new FrameworkLogger(config);
}

/**
 * Default logger instance for simple usage
 */
export const defaultLogger = new FrameworkLogger({
  component: 'zone-connect'
});
