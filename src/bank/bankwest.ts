/**
 * Bankwest Online Banking secure-mail client
 * - Drives an already-open Playwright page through login, the mailbox and each message
 * - Timeouts are whatever the page's default timeout is, unless given here
 * - No retries: every failure surfaces as a LoginError or ScrapeError
 */

import { errors } from 'playwright';
import type { Page } from 'playwright';
import { getLogger } from '../utils/logger.js';
import { LoginError, ScrapeError, describeError } from '../utils/errors.js';
import { BANKWEST_SELECTORS, BANKWEST_URLS, MAIL_ROW_COLUMNS, getMessageUrl } from './urls.js';
import { normalizeMessageBody, toMailSummaries } from './mailbox.js';
import type { BankMessage, Credentials, MailClient, MailSummary, RawMailRow } from './types.js';

export interface BankwestClientOptions {
  /** Navigation and selector timeout in milliseconds */
  timeoutMs?: number;
}

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

function toScrapeError(phase: string, error: unknown): ScrapeError {
  if (isTimeout(error)) {
    return ScrapeError.fromTimeout(phase, describeError(error));
  }
  return ScrapeError.fromNavigationFailure(phase, describeError(error));
}

export class BankwestClient implements MailClient {
  constructor(
    private readonly page: Page,
    private readonly options: BankwestClientOptions = {}
  ) {}

  async login(credentials: Credentials): Promise<void> {
    const logger = getLogger();
    const { timeout } = this.waitOptions();

    logger.verbose(`loading ${BANKWEST_URLS.LOGIN}`);
    try {
      await this.page.goto(BANKWEST_URLS.LOGIN, { timeout, waitUntil: 'domcontentloaded' });
      await this.page.fill(BANKWEST_SELECTORS.PAN_INPUT, credentials.pan, { timeout });
      await this.page.fill(BANKWEST_SELECTORS.PASSWORD_INPUT, credentials.password, { timeout });
      await this.page.click(BANKWEST_SELECTORS.LOGIN_BUTTON, { timeout });
    } catch (error) {
      throw LoginError.fromNavigationFailure(describeError(error));
    }

    logger.verbose('waiting for page to load');
    try {
      await this.page.waitForSelector(BANKWEST_SELECTORS.LOGOUT_BUTTON, { timeout });
    } catch (error) {
      if (isTimeout(error)) {
        throw LoginError.fromRejected();
      }
      throw LoginError.fromNavigationFailure(describeError(error));
    }

    logger.debug('logged in');
  }

  async openMailbox(): Promise<void> {
    const logger = getLogger();
    const { timeout } = this.waitOptions();

    logger.verbose('navigating to mail page');
    try {
      await this.page.goto(BANKWEST_URLS.MAILBOX, { timeout, waitUntil: 'domcontentloaded' });
      logger.verbose(`waiting for mail page ${BANKWEST_URLS.MAILBOX} to load`);
      await this.page.waitForSelector(BANKWEST_SELECTORS.MAILBOX_READY, { timeout });
    } catch (error) {
      throw toScrapeError('mail page', error);
    }
  }

  async listMessages(): Promise<MailSummary[]> {
    const logger = getLogger();

    logger.verbose('getting page content');
    let rows: RawMailRow[];
    try {
      rows = await this.page.$$eval(
        BANKWEST_SELECTORS.MAIL_ROWS,
        (elements, config) =>
          elements.map((row) => {
            const cells = row.querySelectorAll<HTMLElement>(config.cells);
            const subject = row.querySelector<HTMLElement>(config.subject);
            const sender = cells[config.senderColumn]?.querySelector<HTMLElement>('div');
            const idInput = row.querySelector(config.idInput);

            return {
              id: idInput ? idInput.getAttribute('value') : null,
              subject: subject ? subject.innerText : null,
              sender: sender ? sender.innerText : null,
              date: cells[config.dateColumn]?.innerText ?? null,
            };
          }),
        {
          cells: BANKWEST_SELECTORS.ROW_CELLS,
          subject: BANKWEST_SELECTORS.ROW_SUBJECT,
          idInput: BANKWEST_SELECTORS.ROW_ID_INPUT,
          dateColumn: MAIL_ROW_COLUMNS.DATE,
          senderColumn: MAIL_ROW_COLUMNS.SENDER,
        }
      );
    } catch (error) {
      throw toScrapeError('mail page', error);
    }

    const summaries = toMailSummaries(rows);
    logger.debug(`found ${summaries.length} messages in ${rows.length} rows`);
    return summaries;
  }

  async readMessage(summary: MailSummary): Promise<BankMessage> {
    const logger = getLogger();
    const { timeout } = this.waitOptions();
    const url = getMessageUrl(summary.id);

    logger.verbose(`loading message ${summary.id}`);
    let body: string;
    try {
      await this.page.goto(url, { timeout, waitUntil: 'domcontentloaded' });
      logger.verbose('waiting for message to load');
      const element = await this.page.waitForSelector(BANKWEST_SELECTORS.MESSAGE_BODY, { timeout });
      if (!element) {
        throw ScrapeError.fromMissingElement(`message ${summary.id}`, BANKWEST_SELECTORS.MESSAGE_BODY);
      }
      body = await element.innerText();
    } catch (error) {
      if (error instanceof ScrapeError) {
        throw error;
      }
      throw toScrapeError(`message ${summary.id}`, error);
    }

    return { ...summary, content: normalizeMessageBody(body) };
  }

  private waitOptions(): { timeout?: number } {
    return { timeout: this.options.timeoutMs };
  }
}
