/**
 * Credentials file and environment lookup
 * The file is dotenv-formatted and is only ever read
 */

import { readFile } from 'fs/promises';
import { parse } from 'dotenv';
import { getLogger } from '../utils/logger.js';
import { CredentialsError, describeError } from '../utils/errors.js';

export const CREDENTIAL_KEYS = {
  PAN: 'PAN',
  PASSWORD: 'PASSWORD',
} as const;

export const DEFAULT_CREDENTIALS_FILE = '.env';

/**
 * Whatever the non-interactive sources provided; either field may be missing
 */
export interface CredentialSource {
  pan?: string;
  password?: string;
}

type KeyValues = Record<string, string | undefined>;

function pick(values: KeyValues, key: string): string | undefined {
  const value = values[key];
  return value && value.trim() ? value : undefined;
}

async function readKeyValueFile(path: string): Promise<KeyValues> {
  const logger = getLogger();

  try {
    const content = await readFile(path, 'utf-8');
    logger.debug(`read credentials file ${path}`);
    return parse(content);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug(`no credentials file at ${path}`);
      return {};
    }
    throw CredentialsError.fromUnreadableFile(path, describeError(error));
  }
}

/**
 * Look up PAN and PASSWORD in the credentials file, then the environment
 * A missing file is not an error
 */
export async function loadCredentialSource(
  path: string = DEFAULT_CREDENTIALS_FILE,
  env: KeyValues = process.env
): Promise<CredentialSource> {
  const fileValues = await readKeyValueFile(path);

  return {
    pan: pick(fileValues, CREDENTIAL_KEYS.PAN) ?? pick(env, CREDENTIAL_KEYS.PAN),
    password: pick(fileValues, CREDENTIAL_KEYS.PASSWORD) ?? pick(env, CREDENTIAL_KEYS.PASSWORD),
  };
}
