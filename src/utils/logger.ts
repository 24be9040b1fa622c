/**
 * Leveled logger for the retrieval run
 * - levels follow the verboselogs scale (spam < debug < verbose < info < notice < warning)
 * - error() and critical() always print, whatever the configured level
 * - progress(): per-message progress indicator
 */

export const LOG_LEVELS = {
  spam: 5,
  debug: 10,
  verbose: 15,
  info: 20,
  notice: 25,
  warning: 30,
  error: 40,
  critical: 50,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const PREFIX = '[retrieve-bankmail]';

export interface LoggerConfig {
  level?: LogLevel;
}

export interface ProgressStats {
  phase: string;
  current: number;
  total: number;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel;

  constructor(config?: LoggerConfig) {
    this.level = config?.level ?? DEFAULT_LOG_LEVEL;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  spam(message: string): void {
    this.write('spam', message);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  /**
   * Step-by-step navigation notes, shown with --verbose
   */
  verbose(message: string): void {
    this.write('verbose', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  notice(message: string): void {
    this.write('notice', message);
  }

  warn(message: string): void {
    this.write('warning', message);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }

  critical(message: string): void {
    console.error(`${PREFIX} CRITICAL: ${message}`);
  }

  /**
   * Progress indicator for a phase
   * Every step at verbose, otherwise only the first and last
   */
  progress(stats: ProgressStats): void {
    const { phase, current, total } = stats;
    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;
    const line = `${phase}: ${current}/${total} (${percentage}%)`;

    if (this.isEnabled('verbose')) {
      this.verbose(line);
    } else if (current === 0 || current === total) {
      this.info(line);
    }
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }

    if (level === 'info') {
      console.log(`${PREFIX} ${message}`);
    } else if (level === 'warning') {
      console.warn(`${PREFIX} WARNING: ${message}`);
    } else {
      console.log(`${PREFIX} ${level.toUpperCase()}: ${message}`);
    }
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 * The config only applies on first creation
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  }
  return loggerInstance;
}

/**
 * Apply the run's logging configuration to the singleton
 */
export function configureLogger(config: LoggerConfig): Logger {
  const logger = getLogger(config);
  logger.setLevel(config.level ?? DEFAULT_LOG_LEVEL);
  return logger;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
