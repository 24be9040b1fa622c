import { readFileSync } from 'fs';
import { join } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { LOG_LEVELS } from '../utils/logger.js';
import { InvalidInputError } from '../utils/errors.js';
import { DEFAULT_CREDENTIALS_FILE } from '../credentials/index.js';
import { MAX_TIMEOUT_MS, parseLimit, parseLogLevel, parseTimeout, toRunOptions } from './options.js';
import type { CliOptions, RunOptions } from './types.js';

/**
 * Version from the package manifest, two levels up from both src/cli and dist/cli
 */
function readPackageVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  throw new Error('package.json has no version');
}

export const VERSION = readPackageVersion();
export const DEFAULT_OUT_DIR = 'bankmail';

export type RunHandler = (options: RunOptions) => Promise<void>;

/**
 * Adapt a value parser so commander reports its failures as usage errors
 */
function asArgParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value: string) => {
    try {
      return parse(value);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}

/**
 * Build the retrieve-bankmail command
 * Flag values are validated while parsing, so a bad value never reaches the handler
 */
export function createProgram(handler: RunHandler): Command {
  const program = new Command();

  program
    .name('retrieve-bankmail')
    .description('Retrieve bankmail from Bankwest Online Banking')
    .version(VERSION)
    .option('-v, --verbose', 'verbose logging')
    .option('-d, --debug', 'debug logging')
    .option('-s, --show-browser', 'display the browser')
    .option('-l, --limit <count>', 'limit for the amount of mail returned', asArgParser(parseLimit))
    .option(
      '-g, --log-level <level>',
      `manually set the log level (${Object.keys(LOG_LEVELS).join(', ')})`,
      asArgParser(parseLogLevel)
    )
    .option('-o, --out-dir <dir>', 'directory to write messages to', DEFAULT_OUT_DIR)
    .option('-c, --credentials <file>', 'credentials file with PAN and PASSWORD', DEFAULT_CREDENTIALS_FILE)
    .option(
      '--timeout-ms <ms>',
      `navigation and selector timeout in milliseconds (max: ${MAX_TIMEOUT_MS})`,
      asArgParser(parseTimeout)
    )
    .showHelpAfterError('(run with --help for usage)')
    .action(async (options: CliOptions) => {
      await handler(toRunOptions(options));
    });

  return program;
}
