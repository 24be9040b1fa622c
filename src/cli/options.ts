import { DEFAULT_LOG_LEVEL, LOG_LEVELS, getLogger, isLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';
import { InvalidInputError } from '../utils/errors.js';
import type { CliOptions, RunOptions } from './types.js';

export const MAX_TIMEOUT_MS = 300000;

const POSITIVE_INTEGER = /^[0-9]+$/;

/**
 * --limit: a positive integer, nothing else
 */
export function parseLimit(value: string): number {
  const trimmed = value.trim();
  if (!POSITIVE_INTEGER.test(trimmed)) {
    throw InvalidInputError.fromInvalidLimit(value);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1 || !Number.isSafeInteger(parsed)) {
    throw InvalidInputError.fromInvalidLimit(value);
  }
  return parsed;
}

/**
 * --log-level: one of the logger's level names, any case
 */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw InvalidInputError.fromInvalidLogLevel(value, Object.keys(LOG_LEVELS));
  }
  return normalized;
}

/**
 * --timeout-ms: positive integer, capped at MAX_TIMEOUT_MS
 */
export function parseTimeout(value: string): number {
  const trimmed = value.trim();
  if (!POSITIVE_INTEGER.test(trimmed)) {
    throw InvalidInputError.fromInvalidTimeout(value);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1) {
    throw InvalidInputError.fromInvalidTimeout(value);
  }

  if (parsed > MAX_TIMEOUT_MS) {
    getLogger().warn(`--timeout-ms ${parsed}ms exceeds maximum of ${MAX_TIMEOUT_MS}ms, capping to ${MAX_TIMEOUT_MS}ms`);
    return MAX_TIMEOUT_MS;
  }
  return parsed;
}

/**
 * Explicit --log-level wins over --debug, which wins over --verbose
 */
export function resolveLogLevel(options: Pick<CliOptions, 'verbose' | 'debug' | 'logLevel'>): LogLevel {
  if (options.logLevel) {
    return options.logLevel;
  }
  if (options.debug) {
    return 'debug';
  }
  if (options.verbose) {
    return 'verbose';
  }
  return DEFAULT_LOG_LEVEL;
}

export function toRunOptions(options: CliOptions): RunOptions {
  return Object.freeze({
    verbose: options.verbose ?? false,
    debug: options.debug ?? false,
    showBrowser: options.showBrowser ?? false,
    limit: options.limit,
    logLevel: options.logLevel,
    resolvedLogLevel: resolveLogLevel(options),
    outDir: options.outDir,
    credentialsFile: options.credentials,
    timeoutMs: options.timeoutMs,
  });
}
