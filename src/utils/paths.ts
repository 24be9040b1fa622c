/**
 * Output layout and naming policy for stored messages
 */

import { createHash } from 'crypto';
import { join } from 'path';

/**
 * Canonical output layout, relative to the output directory
 */
export const OUTPUT_LAYOUT = {
  /** Index of every stored message and run */
  MANIFEST_FILE: 'manifest.json',
  /** Extension of per-message files */
  MESSAGE_EXT: '.txt',
} as const;

const MAX_SLUG_LENGTH = 60;

export function getManifestPath(outDir: string): string {
  return join(outDir, OUTPUT_LAYOUT.MANIFEST_FILE);
}

export function getMessagePath(outDir: string, filename: string): string {
  return join(outDir, filename);
}

/**
 * Normalize text to a filename-safe slug
 * - NFKD decomposition, lowercase
 * - whitespace and underscores become hyphens
 * - anything outside a-z, 0-9 and hyphen is dropped
 */
export function normalizeSlug(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[\s_]+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function generateHashSuffix(input: string): string {
  const hash = createHash('sha256').update(input).digest('hex');
  return hash.substring(0, 6);
}

/**
 * Make a message id safe to use as a filename component
 * Ids are opaque to us, so only path-hostile characters are replaced.
 * A replaced id gets a hash of the raw id appended, so `a.b` and `a_b`
 * still land in different files.
 */
export function sanitizeMessageId(id: string): string {
  const trimmed = id.trim();
  const safe = trimmed.replace(/[^A-Za-z0-9_-]/g, '_');
  return safe === trimmed ? safe : `${safe}-${generateHashSuffix(trimmed)}`;
}

/**
 * Deterministic filename for a message: <id>[-<subject-slug>].txt
 */
export function generateMessageFilename(id: string, subject?: string): string {
  const safeId = sanitizeMessageId(id);
  if (!safeId) {
    throw new Error('Message id is empty');
  }

  const slug = normalizeSlug(subject ?? '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '');

  return slug
    ? `${safeId}-${slug}${OUTPUT_LAYOUT.MESSAGE_EXT}`
    : `${safeId}${OUTPUT_LAYOUT.MESSAGE_EXT}`;
}
