import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileArtifactStore } from '../src/infrastructure/file-artifact-store.js';

describe('infrastructure/file-artifact-store', () => {
  /**
   * Intent:
   * - Final outputs land in the output directory as <jobId>_translated.txt.
   * - Nothing is written or read outside that directory.
   */

  let dir: string;
  let store: FileArtifactStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'doc-relay-out-'));
    store = new FileArtifactStore(path.join(dir, 'outputs'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the final document and reads it back', async () => {
    const ref = await store.save('job-1', 'final', '--- Page 1 ---\n[vi] Hello');

    expect(ref).toBe(path.join(dir, 'outputs', 'job-1_translated.txt'));
    await expect(readFile(ref, 'utf8')).resolves.toBe('--- Page 1 ---\n[vi] Hello');
    await expect(store.load(ref)).resolves.toBe('--- Page 1 ---\n[vi] Hello');
  });

  it('uses a distinct file per artifact kind', async () => {
    const ref = await store.save('job-1', 'extraction', '{"pages":[]}');
    expect(path.basename(ref)).toBe('job-1_extracted.json');
  });

  it('refuses job ids that would escape the directory', async () => {
    await expect(store.save('../job-1', 'final', 'x')).rejects.toThrow(
      'Refusing to write artifact for unsafe job id: ../job-1',
    );
  });

  it('refuses to read outside the directory', async () => {
    await expect(store.load(path.join(dir, 'elsewhere.txt'))).rejects.toThrow(
      `Artifact ${path.join(dir, 'elsewhere.txt')} is outside ${path.join(dir, 'outputs')}`,
    );
  });
});
