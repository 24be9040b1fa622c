/**
 * Per-message file storage under the output directory
 * - One text file per message, written atomically (.tmp then rename)
 * - manifest.json updated after every message so partial runs stay consistent
 * - Nothing touches the disk until the first message is saved
 */

import { mkdir, writeFile, rename, unlink } from 'fs/promises';
import { getLogger } from '../utils/logger.js';
import { StorageError, describeError } from '../utils/errors.js';
import { generateMessageFilename, getManifestPath, getMessagePath } from '../utils/paths.js';
import {
  loadManifest,
  recordMessage,
  recordRunFinish,
  recordRunStart,
  saveManifestAtomic,
} from './manifest.js';
import type { BankMessage } from '../bank/types.js';
import type { MailManifest, StoredMessage } from './types.js';

/**
 * Render a message as header lines, a blank line, then the body
 */
export function formatMessage(message: BankMessage): string {
  return [
    `ID: ${message.id}`,
    `From: ${message.sender}`,
    `Subject: ${message.subject}`,
    `Date: ${message.date}`,
    '',
    message.content,
    '',
  ].join('\n');
}

async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tmpPath = `${path}.tmp`;
  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, path);
  } catch (error) {
    await unlink(tmpPath).catch((cleanupError: unknown) => {
      getLogger().debug(`could not remove ${tmpPath}: ${describeError(cleanupError)}`);
    });
    throw error;
  }
}

export class MailStore {
  private manifest: MailManifest | null = null;
  private runId: string | null = null;
  private readonly saved: StoredMessage[] = [];

  constructor(
    readonly outDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Messages saved by this store, in order */
  get savedMessages(): readonly StoredMessage[] {
    return this.saved;
  }

  async save(message: BankMessage): Promise<StoredMessage> {
    const logger = getLogger();
    const { manifest, runId } = await this.open();

    const file = generateMessageFilename(message.id, message.subject);
    const path = getMessagePath(this.outDir, file);

    try {
      await writeFileAtomic(path, formatMessage(message));
    } catch (error) {
      throw StorageError.fromWriteFailure(path, describeError(error));
    }

    const stored: StoredMessage = {
      id: message.id,
      subject: message.subject,
      sender: message.sender,
      date: message.date,
      file,
      retrieved_at: this.now().toISOString(),
    };
    recordMessage(manifest, runId, stored);
    await this.persist(manifest);

    this.saved.push(stored);
    logger.debug(`saved message ${message.id} to ${path}`);
    return stored;
  }

  /**
   * Close out the run record; a no-op when nothing was saved
   */
  async finish(status: 'success' | 'failed', errorMessage?: string): Promise<void> {
    if (!this.manifest || !this.runId) {
      return;
    }
    recordRunFinish(this.manifest, this.runId, status, errorMessage, this.now());
    await this.persist(this.manifest);
  }

  private async open(): Promise<{ manifest: MailManifest; runId: string }> {
    if (this.manifest && this.runId) {
      return { manifest: this.manifest, runId: this.runId };
    }

    try {
      await mkdir(this.outDir, { recursive: true });
      const manifest = await loadManifest(this.outDir);
      const runId = recordRunStart(manifest, this.now());
      this.manifest = manifest;
      this.runId = runId;
      return { manifest, runId };
    } catch (error) {
      throw StorageError.fromWriteFailure(getManifestPath(this.outDir), describeError(error));
    }
  }

  private async persist(manifest: MailManifest): Promise<void> {
    try {
      await saveManifestAtomic(this.outDir, manifest);
    } catch (error) {
      throw StorageError.fromWriteFailure(getManifestPath(this.outDir), describeError(error));
    }
  }
}
