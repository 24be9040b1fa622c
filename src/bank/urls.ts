export const BANKWEST_URLS = {
  LOGIN: 'https://ibs.bankwest.com.au/Session/PersonalLogin',
  MAILBOX: 'https://ibs.bankwest.com.au/SecureMailWeb/MailPage.aspx?app=cm',
  READ_MESSAGE: 'https://ibs.bankwest.com.au/SecureMailWeb/ReadMailPage.aspx',
} as const;

export const BANKWEST_SELECTORS = {
  PAN_INPUT: 'input[name="PAN"]',
  PASSWORD_INPUT: 'input[name="Password"]',
  LOGIN_BUTTON: 'button[name="button"]',
  LOGOUT_BUTTON: '.logoutButton',
  MAILBOX_READY: '#leftColumn',
  MAIL_ROWS: '.MasterTable_default > tbody > tr',
  ROW_SUBJECT: 'a > div',
  ROW_CELLS: 'td',
  ROW_ID_INPUT: 'td > input',
  MESSAGE_BODY: 'span[id$="lblBody"]',
} as const;

/** Listing columns, zero-based */
export const MAIL_ROW_COLUMNS = {
  DATE: 2,
  SENDER: 4,
} as const;

export function getMessageUrl(messageId: string): string {
  const url = new URL(BANKWEST_URLS.READ_MESSAGE);
  url.searchParams.set('msgid', messageId);
  url.searchParams.set('status', 'R');
  return url.toString();
}
