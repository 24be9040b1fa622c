import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { BankwestClient } from '../bank/bankwest.js';
import { selectMessages } from '../bank/mailbox.js';
import { MailStore } from '../storage/mail-store.js';
import { createBrowserSession } from './session.js';
import type { BankMessage, Credentials, MailClient } from '../bank/types.js';
import type { StoredMessage } from '../storage/types.js';

export interface RetrievalOptions {
  outDir: string;
  /** Maximum number of messages to retrieve; all when unset */
  limit?: number;
  headless?: boolean;
  timeoutMs?: number;
}

export interface RetrievalResult {
  /** Messages listed in the mailbox */
  available: number;
  stored: StoredMessage[];
}

/**
 * An open browser with a client driving it
 */
export interface MailSession {
  client: MailClient;
  close: () => Promise<void>;
}

export type MailSessionFactory = (options: { headless: boolean; timeoutMs?: number }) => Promise<MailSession>;

export interface RetrievalDependencies {
  openSession?: MailSessionFactory;
  store?: MailStore;
}

export const openBankwestSession: MailSessionFactory = async (options) => {
  const session = await createBrowserSession(options);
  return {
    client: new BankwestClient(session.page, { timeoutMs: options.timeoutMs }),
    close: session.close,
  };
};

function logMessage(message: BankMessage): void {
  const logger = getLogger();
  logger.info(`ID: ${message.id}`);
  logger.info(`From: ${message.sender}`);
  logger.info(`Subject: ${message.subject}`);
  logger.info(`Date: ${message.date}`);
  logger.verbose(`Content: ${message.content}`);
}

/**
 * Log in, walk the mailbox and store up to `limit` messages
 * The browser is closed on every path; messages stored before a failure stay on disk
 */
export async function retrieveBankmail(
  credentials: Credentials,
  options: RetrievalOptions,
  deps: RetrievalDependencies = {}
): Promise<RetrievalResult> {
  const logger = getLogger();
  const openSession = deps.openSession ?? openBankwestSession;
  const store = deps.store ?? new MailStore(options.outDir);

  const session = await openSession({
    headless: options.headless ?? true,
    timeoutMs: options.timeoutMs,
  });

  try {
    await session.client.login(credentials);
    await session.client.openMailbox();

    const summaries = await session.client.listMessages();
    const selected = selectMessages(summaries, options.limit);
    logger.debug(`retrieved ${selected.length} of ${summaries.length} messages`);

    for (const [index, summary] of selected.entries()) {
      const message = await session.client.readMessage(summary);
      logMessage(message);
      await store.save(message);
      logger.progress({ phase: 'Messages', current: index + 1, total: selected.length });
    }

    await store.finish('success');
    logger.info('finished getting mail');

    return { available: summaries.length, stored: [...store.savedMessages] };
  } catch (error) {
    await store.finish('failed', describeError(error)).catch((finishError: unknown) => {
      logger.warn(`could not record the failed run: ${describeError(finishError)}`);
    });
    throw error;
  } finally {
    await session.close();
  }
}
