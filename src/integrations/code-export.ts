/**
 * Code Block Export
 *
 * Writes every fenced block of a response to a directory, named after its
 * embedded `filename:` comment or `snippet_N` plus the language extension.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { resolveWithinRoot } from '../actions/executor.js';
import { extensionForLanguage, extractCodeBlocks } from '../actions/unstructured/code-blocks.js';
import { createComponentLogger, type StructuredLogger } from './utilities/logger.js';

export interface ExportedBlock {
  path: string;
  language?: string;
  bytes: number;
}

export async function exportCodeBlocks(
  responseText: string,
  outputDir: string,
  options: { logger?: StructuredLogger } = {}
): Promise<ExportedBlock[]> {
  const log = createComponentLogger('CodeExport', options.logger);
  const exported: ExportedBlock[] = [];

  for (const block of extractCodeBlocks(responseText)) {
    const name = block.embeddedFilename ?? `snippet_${block.index + 1}${extensionForLanguage(block.language)}`;
    const target = resolveWithinRoot(outputDir, name);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, block.content, 'utf-8');
    exported.push({
      path: target,
      ...(block.language !== undefined && { language: block.language }),
      bytes: Buffer.byteLength(block.content, 'utf-8'),
    });
  }

  log.info('Exported code blocks', { count: exported.length, outputDir });
  return exported;
}
