/**
 * Manifest IO: loading, atomic saving, and run recording
 */

import { mkdir, readFile, writeFile, rename } from 'fs/promises';
import { dirname } from 'path';
import { randomBytes } from 'crypto';
import { getManifestPath } from '../utils/paths.js';
import {
  MailManifest,
  RetrievalRun,
  StoredMessage,
  SCHEMA_VERSION,
  isValidMailManifest,
} from './types.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createManifest(now: Date = new Date()): MailManifest {
  return {
    schemaVersion: SCHEMA_VERSION,
    updated_at: now.toISOString(),
    messages: [],
    runs: [],
  };
}

/**
 * Load the manifest from disk, or start a new one if it is missing
 * An unreadable or malformed manifest is an error: it is never silently replaced
 */
export async function loadManifest(outDir: string): Promise<MailManifest> {
  const manifestPath = getManifestPath(outDir);

  let content: string;
  try {
    content = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return createManifest();
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isValidMailManifest(parsed)) {
    throw new Error(`Invalid manifest structure in ${manifestPath}`);
  }
  return parsed;
}

/**
 * Save manifest atomically: write to temp file, then rename
 */
export async function saveManifestAtomic(outDir: string, manifest: MailManifest): Promise<void> {
  const manifestPath = getManifestPath(outDir);
  const tempPath = `${manifestPath}.tmp`;

  await mkdir(dirname(manifestPath), { recursive: true });
  await writeFile(tempPath, JSON.stringify(manifest, null, 2), 'utf-8');
  await rename(tempPath, manifestPath);
}

/**
 * Generate a unique run ID (timestamp + random suffix)
 */
function generateRunId(): string {
  return `${Date.now()}-${randomBytes(4).toString('hex')}`;
}

/**
 * Record the start of a run; returns its id
 */
export function recordRunStart(manifest: MailManifest, now: Date = new Date()): string {
  const run: RetrievalRun = {
    run_id: generateRunId(),
    ts: now.toISOString(),
    retrieved: [],
    status: 'running',
  };

  manifest.runs.push(run);
  manifest.updated_at = run.ts;
  return run.run_id;
}

function findRun(manifest: MailManifest, runId: string): RetrievalRun {
  const run = manifest.runs.find((r) => r.run_id === runId);
  if (!run) {
    throw new Error(`Run ${runId} not found in manifest`);
  }
  return run;
}

/**
 * Add or replace a stored message and credit it to the run
 */
export function recordMessage(manifest: MailManifest, runId: string, message: StoredMessage): void {
  const run = findRun(manifest, runId);

  const existing = manifest.messages.findIndex((m) => m.id === message.id);
  if (existing >= 0) {
    manifest.messages[existing] = message;
  } else {
    manifest.messages.push(message);
  }

  if (!run.retrieved.includes(message.id)) {
    run.retrieved.push(message.id);
  }
  manifest.updated_at = message.retrieved_at;
}

export function recordRunFinish(
  manifest: MailManifest,
  runId: string,
  status: 'success' | 'failed',
  errorMessage?: string,
  now: Date = new Date()
): void {
  const run = findRun(manifest, runId);
  run.status = status;
  if (errorMessage) {
    run.error_message = errorMessage;
  }
  manifest.updated_at = now.toISOString();
}
