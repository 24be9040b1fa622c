/**
 * Bankmail domain types
 */

export interface Credentials {
  /** Personal access number used as the login identifier */
  pan: string;
  password: string;
}

/**
 * One row of the secure-mail listing
 */
export interface MailSummary {
  id: string;
  subject: string;
  sender: string;
  /** Date as displayed by the listing */
  date: string;
}

export interface BankMessage extends MailSummary {
  content: string;
}

/**
 * Raw cell text pulled from a listing row, before cleanup
 */
export interface RawMailRow {
  id: string | null;
  subject: string | null;
  sender: string | null;
  date: string | null;
}

/**
 * Client for one bank's secure-mail area
 */
export interface MailClient {
  login(credentials: Credentials): Promise<void>;
  openMailbox(): Promise<void>;
  listMessages(): Promise<MailSummary[]>;
  readMessage(summary: MailSummary): Promise<BankMessage>;
}
