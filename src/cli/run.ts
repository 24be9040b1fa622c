import { configureLogger } from '../utils/logger.js';
import {
  createTerminalPrompter,
  loadCredentialSource,
  resolveCredentials,
} from '../credentials/index.js';
import type { Prompter } from '../credentials/index.js';
import { retrieveBankmail } from '../core/index.js';
import type { MailSessionFactory, RetrievalResult } from '../core/index.js';
import type { RunOptions } from './types.js';

export interface RunDependencies {
  openSession?: MailSessionFactory;
  createPrompter?: () => Prompter;
  env?: Record<string, string | undefined>;
}

/**
 * One run: configure logging, resolve credentials, then retrieve
 */
export async function runRetrieval(
  options: RunOptions,
  deps: RunDependencies = {}
): Promise<RetrievalResult> {
  const logger = configureLogger({ level: options.resolvedLogLevel });
  logger.debug(`setting log level to ${options.resolvedLogLevel}`);

  if (options.limit !== undefined) {
    logger.debug(`limiting retrieval to ${options.limit} messages`);
  }
  if (options.showBrowser) {
    logger.debug('browser will be visible');
  }

  const source = await loadCredentialSource(options.credentialsFile, deps.env ?? process.env);
  const credentials = await resolveCredentials(
    source,
    deps.createPrompter ?? (() => createTerminalPrompter())
  );

  const result = await retrieveBankmail(
    credentials,
    {
      outDir: options.outDir,
      limit: options.limit,
      headless: !options.showBrowser,
      timeoutMs: options.timeoutMs,
    },
    { openSession: deps.openSession }
  );

  logger.info(`Stored ${result.stored.length} of ${result.available} messages in ${options.outDir}`);
  return result;
}
