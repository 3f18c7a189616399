import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { InfrastructureError, ValidationError } from '@doc-relay/contracts';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExtractorRegistry } from '../src/infrastructure/extractors/extractor-registry.js';
import { PlainTextExtractor } from '../src/infrastructure/extractors/plain-text-extractor.js';

describe('infrastructure/extractors', () => {
  /**
   * Intent:
   * - Plain-text pages are separated by form feeds; a trailing break opens no page.
   * - Unknown extensions are rejected with a validation error listing what is supported.
   */

  let dir: string;
  const extractor = new PlainTextExtractor();

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'doc-relay-extract-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('splits pages on form feeds and reports progress per page', async () => {
    const file = path.join(dir, 'doc.txt');
    await writeFile(file, '\uFEFFFirst page.\fSecond page.\f', 'utf8');
    const onProgress = vi.fn(async () => {});

    await expect(extractor.countPages(file)).resolves.toBe(2);
    await expect(extractor.extract(file, onProgress)).resolves.toEqual([
      'First page.',
      'Second page.',
    ]);
    expect(onProgress.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it('treats a document without breaks as one page', async () => {
    const file = path.join(dir, 'notes.md');
    await writeFile(file, '# Notes\n\nBody', 'utf8');
    await expect(extractor.extract(file)).resolves.toEqual(['# Notes\n\nBody']);
  });

  it('wraps read failures', async () => {
    const missing = path.join(dir, 'missing.txt');
    const error = await extractor.extract(missing).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InfrastructureError);
    expect(error).toHaveProperty('message', `Cannot read source document ${missing}`);
  });

  it('resolves extractors by lower-cased extension', () => {
    const registry = new ExtractorRegistry([extractor]);
    expect(registry.resolve('/docs/REPORT.TXT')).toBe(extractor);
    expect(registry.supportedExtensions()).toEqual(['.txt', '.text', '.md']);
  });

  it('rejects unsupported file types', () => {
    const registry = new ExtractorRegistry([extractor]);

    expect(() => registry.resolve('/docs/report.pdf')).toThrow(
      'Unsupported file type ".pdf". Supported: .txt, .text, .md',
    );
    try {
      registry.resolve('/docs/README');
      expect.unreachable();
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('code', 'unsupported_file_type');
      expect(error).toHaveProperty(
        'message',
        'Unsupported file type "(none)". Supported: .txt, .text, .md',
      );
    }
  });
});
