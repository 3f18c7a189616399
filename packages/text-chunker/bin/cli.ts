#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';

import { Command } from 'commander';

import { planPageChunks, splitPages } from '../src/index.js';

interface TextChunkerCliOptions {
  maxChars: number;
  json?: boolean;
}

const program = new Command()
  .name('text-chunker')
  .description('Split a text document into page-aware, size-bounded chunks')
  .argument('<file>', 'Text file to split (pages separated by form feeds)')
  .option('--max-chars <n>', 'Maximum characters per chunk', (v) => Number.parseInt(v, 10), 3000)
  .option('--json', 'Print chunks as JSON')
  .action(async (file: string, opts: TextChunkerCliOptions) => {
    try {
      const content = await readFile(file, 'utf8');
      const chunks = planPageChunks(splitPages(content), opts.maxChars);

      if (opts.json) {
        console.log(JSON.stringify(chunks, null, 2));
        return;
      }
      for (const chunk of chunks) {
        console.log(`#${chunk.index} page=${chunk.page} chars=${chunk.text.length}`);
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(message);
      process.exit(1);
    }
  });

await program.parseAsync();
