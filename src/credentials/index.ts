/**
 * Credential resolution: credentials file, then environment, then the terminal
 */

import { getLogger } from '../utils/logger.js';
import { CredentialsError } from '../utils/errors.js';
import type { Credentials } from '../bank/types.js';
import type { CredentialSource } from './source.js';
import type { Prompter } from './prompt.js';

export { loadCredentialSource, CREDENTIAL_KEYS, DEFAULT_CREDENTIALS_FILE } from './source.js';
export type { CredentialSource } from './source.js';
export { createTerminalPrompter } from './prompt.js';
export type { Prompter, TerminalPrompterOptions } from './prompt.js';

export const PROMPTS = {
  PAN: 'Enter your Bankwest PAN: ',
  PASSWORD: 'Enter your Bankwest online banking password: ',
  CONFIRM_PASSWORD: 'Are you happy with the password you entered? [y]es or [n]o: ',
} as const;

/**
 * Ask for the password until the user confirms it
 * An empty answer (or a closed terminal) ends the loop
 */
async function promptPassword(prompter: Prompter): Promise<string> {
  for (;;) {
    const password = await prompter.askSecret(PROMPTS.PASSWORD);
    if (!password) {
      return '';
    }

    const confirm = await prompter.ask(PROMPTS.CONFIRM_PASSWORD);
    if (confirm.trim().toLowerCase().startsWith('y')) {
      return password;
    }
  }
}

/**
 * Fill in whatever the credential source lacks from the terminal
 * The prompter is only created when something has to be asked
 */
export async function resolveCredentials(
  source: CredentialSource,
  createPrompter: () => Prompter
): Promise<Credentials> {
  const logger = getLogger();
  let pan = source.pan?.trim() ?? '';
  let password = source.password ?? '';

  if (pan && password) {
    logger.debug('using credentials from the credentials file or environment');
    return { pan, password };
  }

  const prompter = createPrompter();
  try {
    if (!pan) {
      logger.warn('no PAN available');
      pan = (await prompter.ask(PROMPTS.PAN)).trim();
      if (!pan) {
        throw CredentialsError.fromMissing('PAN');
      }
    }

    if (!password) {
      logger.warn('no password available for the PAN provided');
      password = await promptPassword(prompter);
      if (!password) {
        throw CredentialsError.fromMissing('password');
      }
    }
  } finally {
    prompter.close();
  }

  return { pan, password };
}
