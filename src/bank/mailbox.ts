/**
 * Mailbox listing cleanup and selection
 * Works on plain data pulled from the page so it can run without a browser
 */

import { getLogger } from '../utils/logger.js';
import type { MailSummary, RawMailRow } from './types.js';

function clean(text: string | null): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Turn raw listing rows into summaries, in listing order
 * Rows without a message id (headers, pager rows) are skipped,
 * as are repeats of an id already seen
 */
export function toMailSummaries(rows: RawMailRow[]): MailSummary[] {
  const logger = getLogger();
  const seenIds = new Set<string>();
  const summaries: MailSummary[] = [];

  rows.forEach((row, index) => {
    const id = clean(row.id);
    if (!id) {
      logger.debug(`Skipping mailbox row ${index}: no message id`);
      return;
    }
    if (seenIds.has(id)) {
      logger.debug(`Skipping mailbox row ${index}: duplicate message id ${id}`);
      return;
    }
    seenIds.add(id);

    summaries.push({
      id,
      subject: clean(row.subject),
      sender: clean(row.sender),
      date: clean(row.date),
    });
  });

  return summaries;
}

/**
 * First `limit` summaries, or all of them when no limit is set
 */
export function selectMessages<T>(summaries: T[], limit?: number): T[] {
  if (limit === undefined) {
    return [...summaries];
  }
  return summaries.slice(0, limit);
}

/**
 * The message page sometimes leaves literal <br> markup in the body text
 */
export function normalizeMessageBody(text: string): string {
  return text.replace(/<br\s*\/?>/gi, '\n').replace(/\r\n/g, '\n').trimEnd();
}
