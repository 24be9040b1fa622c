/**
 * Manifest schema types and versioning
 * Stored at <out-dir>/manifest.json
 */

export const SCHEMA_VERSION = '1.0.0';

/**
 * A message written to disk
 */
export interface StoredMessage {
  id: string;
  subject: string;
  sender: string;
  /** Date as displayed by the bank */
  date: string;
  /** Filename relative to the output directory */
  file: string;
  /** When the message was written (ISO 8601) */
  retrieved_at: string;
}

export type RunStatus = 'running' | 'success' | 'failed';

/**
 * One invocation of the tool
 */
export interface RetrievalRun {
  run_id: string;
  /** Start time (ISO 8601) */
  ts: string;
  /** Ids of messages written during this run */
  retrieved: string[];
  status: RunStatus;
  error_message?: string;
}

export interface MailManifest {
  schemaVersion: string;
  /** Last write (ISO 8601) */
  updated_at: string;
  messages: StoredMessage[];
  runs: RetrievalRun[];
}

/**
 * Type guard: check if value is a valid StoredMessage
 */
export function isValidStoredMessage(value: unknown): value is StoredMessage {
  if (!value || typeof value !== 'object') return false;

  const obj = value as Record<string, unknown>;
  return (
    typeof obj.id === 'string' &&
    typeof obj.subject === 'string' &&
    typeof obj.sender === 'string' &&
    typeof obj.date === 'string' &&
    typeof obj.file === 'string' &&
    typeof obj.retrieved_at === 'string'
  );
}

/**
 * Type guard: check if value is a valid RetrievalRun
 */
export function isValidRetrievalRun(value: unknown): value is RetrievalRun {
  if (!value || typeof value !== 'object') return false;

  const obj = value as Record<string, unknown>;
  const validStatuses: unknown[] = ['running', 'success', 'failed'];

  return (
    typeof obj.run_id === 'string' &&
    typeof obj.ts === 'string' &&
    Array.isArray(obj.retrieved) &&
    obj.retrieved.every((id) => typeof id === 'string') &&
    validStatuses.includes(obj.status) &&
    (obj.error_message === undefined || typeof obj.error_message === 'string')
  );
}

/**
 * Type guard: check if value is a valid MailManifest
 */
export function isValidMailManifest(value: unknown): value is MailManifest {
  if (!value || typeof value !== 'object') return false;

  const obj = value as Record<string, unknown>;
  return (
    typeof obj.schemaVersion === 'string' &&
    typeof obj.updated_at === 'string' &&
    Array.isArray(obj.messages) &&
    obj.messages.every(isValidStoredMessage) &&
    Array.isArray(obj.runs) &&
    obj.runs.every(isValidRetrievalRun)
  );
}
