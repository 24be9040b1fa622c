/**
 * Error taxonomy with stable exit codes
 * Each error class extends BankmailError and provides:
 * - code: stable exit code (1-5)
 * - message: user-facing message
 * - details: optional detail, logged at debug
 */

import { getLogger } from './logger.js';

/**
 * Base error class with exit code
 */
export abstract class BankmailError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log at error level, details at debug
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: malformed flag values
 */
export class InvalidInputError extends BankmailError {
  readonly code = 1;

  static fromInvalidLimit(value: string): InvalidInputError {
    return new InvalidInputError(
      `--limit must be a positive integer, got: ${value}`,
      'Pass the maximum number of messages to retrieve, e.g. --limit 10'
    );
  }

  static fromInvalidLogLevel(value: string, allowed: readonly string[]): InvalidInputError {
    return new InvalidInputError(
      `Unknown log level: ${value}`,
      `Expected one of: ${allowed.join(', ')}`
    );
  }

  static fromInvalidTimeout(value: string): InvalidInputError {
    return new InvalidInputError(`--timeout-ms must be a positive integer, got: ${value}`);
  }
}

/**
 * Credentials error (exit code 2)
 * Triggered by: PAN or password still empty after prompting
 */
export class CredentialsError extends BankmailError {
  readonly code = 2;

  static fromMissing(field: 'PAN' | 'password'): CredentialsError {
    return new CredentialsError(
      `Unable to log into online banking without a ${field}`,
      'Set PAN and PASSWORD in the credentials file, or enter them when prompted'
    );
  }

  static fromUnreadableFile(path: string, reason: string): CredentialsError {
    return new CredentialsError(`Could not read credentials file: ${path}`, reason);
  }
}

/**
 * Login error (exit code 3)
 * Triggered by: the logged-in page never appearing after submitting credentials
 */
export class LoginError extends BankmailError {
  readonly code = 3;

  static fromRejected(): LoginError {
    return new LoginError(
      'Login failed: online banking did not accept the PAN and password',
      'The logout button never appeared after submitting the login form. Run with --show-browser to watch the login'
    );
  }

  static fromNavigationFailure(reason: string): LoginError {
    return new LoginError('Login failed: could not load the login page', reason);
  }
}

/**
 * Scrape error (exit code 4)
 * Triggered by: navigation failures, missing elements and timeouts after login
 */
export class ScrapeError extends BankmailError {
  readonly code = 4;

  static fromTimeout(phase: string, reason?: string): ScrapeError {
    return new ScrapeError(
      `Timed out while loading the ${phase}. The site may be slow or its layout may have changed.`,
      reason
    );
  }

  static fromNavigationFailure(phase: string, reason: string): ScrapeError {
    return new ScrapeError(`Failed to load the ${phase}`, reason);
  }

  static fromMissingElement(phase: string, selector: string): ScrapeError {
    return new ScrapeError(
      `Unexpected page structure on the ${phase}`,
      `No element matched ${selector}`
    );
  }
}

/**
 * Storage error (exit code 5)
 * Triggered by: failures writing messages or the manifest
 */
export class StorageError extends BankmailError {
  readonly code = 5;

  static fromWriteFailure(path: string, reason: string): StorageError {
    return new StorageError(`Failed to write ${path}`, reason);
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof BankmailError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Log an error at error level with its detail at debug
 */
export function reportError(error: unknown): void {
  if (error instanceof BankmailError) {
    error.log();
    return;
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  reportError(error);
  process.exit(getExitCode(error));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
