import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  createManifest,
  loadManifest,
  recordMessage,
  recordRunFinish,
  recordRunStart,
  saveManifestAtomic,
} from './manifest';
import { SCHEMA_VERSION, isValidMailManifest } from './types';

describe('manifest', () => {
  const start = new Date('2024-05-02T10:00:00.000Z');

  it('should start a new manifest when none exists', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'manifest-test-'));
    try {
      const manifest = await loadManifest(path.join(tempDir, 'missing'));
      expect(manifest.schemaVersion).toBe(SCHEMA_VERSION);
      expect(manifest.messages).toEqual([]);
      expect(manifest.runs).toEqual([]);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('should round-trip through disk', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'manifest-test-'));
    try {
      const manifest = createManifest(start);
      recordRunStart(manifest, start);
      await saveManifestAtomic(tempDir, manifest);

      await expect(loadManifest(tempDir)).resolves.toEqual(manifest);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('should track a run from start to finish', () => {
    const manifest = createManifest(start);
    const runId = recordRunStart(manifest, start);

    expect(runId).toMatch(/^\d+-[0-9a-f]{8}$/);
    expect(manifest.runs).toEqual([{ run_id: runId, ts: '2024-05-02T10:00:00.000Z', retrieved: [], status: 'running' }]);

    recordMessage(manifest, runId, {
      id: '7',
      subject: 'Hi',
      sender: 'Bankwest',
      date: '02/05/2024',
      file: '7-hi.txt',
      retrieved_at: '2024-05-02T10:01:00.000Z',
    });
    recordRunFinish(manifest, runId, 'success', undefined, new Date('2024-05-02T10:02:00.000Z'));

    expect(manifest.runs[0]).toEqual({
      run_id: runId,
      ts: '2024-05-02T10:00:00.000Z',
      retrieved: ['7'],
      status: 'success',
    });
    expect(manifest.updated_at).toBe('2024-05-02T10:02:00.000Z');
    expect(isValidMailManifest(manifest)).toBe(true);
  });

  it('should reject an unknown run id', () => {
    const manifest = createManifest(start);
    expect(() => recordRunFinish(manifest, 'nope', 'failed')).toThrow('Run nope not found in manifest');
  });

  it('should validate manifest structure', () => {
    expect(isValidMailManifest(null)).toBe(false);
    expect(isValidMailManifest({ schemaVersion: '1.0.0', updated_at: 'x', messages: [{}], runs: [] })).toBe(false);
    expect(
      isValidMailManifest({
        schemaVersion: '1.0.0',
        updated_at: 'x',
        messages: [],
        runs: [{ run_id: 'r', ts: 't', retrieved: [], status: 'exploded' }],
      })
    ).toBe(false);
  });
});
