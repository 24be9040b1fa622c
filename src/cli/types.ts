/**
 * CLI argument parsing and validation types
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * Options as commander hands them to the action
 */
export interface CliOptions {
  verbose?: boolean;
  debug?: boolean;
  showBrowser?: boolean;
  limit?: number;
  logLevel?: LogLevel;
  outDir: string;
  credentials: string;
  timeoutMs?: number;
}

/**
 * Fully resolved settings for one run
 */
export interface RunOptions {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly showBrowser: boolean;
  readonly limit?: number;
  readonly logLevel?: LogLevel;
  /** Effective level after precedence is applied */
  readonly resolvedLogLevel: LogLevel;
  readonly outDir: string;
  readonly credentialsFile: string;
  readonly timeoutMs?: number;
}
