/**
 * File Context
 *
 * Reads files the user attaches with `/add` into message content: text
 * files as delimited blocks, images as base64 image blocks.
 */

import { readFile, stat } from 'node:fs/promises';
import { extname, relative, resolve } from 'node:path';
import { FileOperationError } from '../errors/index.js';
import type { ConversationMessage, ContentBlock, ImageBlock } from '../types.js';
import { createComponentLogger, type StructuredLogger } from './utilities/logger.js';

export const DEFAULT_SIZE_LIMIT = 10 * 1024 * 1024;
const BINARY_SNIFF_BYTES = 8192;

const IMAGE_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export interface FileContext {
  /** Formatted text files, joined by blank lines */
  text: string;
  images: ImageBlock[];
  /** Paths that were read, relative to cwd */
  included: string[];
  skipped: Array<{ path: string; reason: string }>;
}

export interface FileContextOptions {
  cwd?: string;
  sizeLimit?: number;
  logger?: StructuredLogger;
}

export function formatFileContent(path: string, content: string): string {
  return `=== File: ${path} ===\n${content}\n=== End of ${path} ===`;
}

/**
 * A NUL byte in the first 8 KB marks the file as binary.
 */
export function isProbablyBinary(data: Buffer): boolean {
  return data.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

export function isImagePath(path: string): boolean {
  return extname(path).toLowerCase() in IMAGE_TYPES;
}

export async function readFileContext(paths: readonly string[], options: FileContextOptions = {}): Promise<FileContext> {
  const cwd = options.cwd ?? process.cwd();
  const sizeLimit = options.sizeLimit ?? DEFAULT_SIZE_LIMIT;
  const log = createComponentLogger('FileContext', options.logger);

  const sections: string[] = [];
  const result: FileContext = { text: '', images: [], included: [], skipped: [] };

  for (const requested of paths) {
    const absolute = resolve(cwd, requested);
    const display = relative(cwd, absolute) || requested;

    try {
      const info = await stat(absolute);
      if (!info.isFile()) {
        result.skipped.push({ path: display, reason: 'not a file' });
        continue;
      }
      if (info.size > sizeLimit) {
        result.skipped.push({ path: display, reason: `larger than ${sizeLimit} bytes` });
        continue;
      }

      const data = await readFile(absolute);
      const mediaType = IMAGE_TYPES[extname(absolute).toLowerCase()];
      if (mediaType) {
        result.images.push({ type: 'image', mediaType, data: data.toString('base64') });
        result.included.push(display);
        continue;
      }
      if (isProbablyBinary(data)) {
        result.skipped.push({ path: display, reason: 'binary file' });
        continue;
      }

      sections.push(formatFileContent(display, data.toString('utf-8')));
      result.included.push(display);
    } catch (error) {
      const reason =
        error instanceof Error && 'code' in error && error.code === 'ENOENT'
          ? FileOperationError.notFound(display, 'read').message
          : error instanceof Error
            ? error.message
            : String(error);
      log.debug('Skipping file', { path: display, reason });
      result.skipped.push({ path: display, reason });
    }
  }

  result.text = sections.join('\n\n');
  return result;
}

/**
 * Build the user message for `input` with attached context in front.
 */
export function withFileContext(input: string, context: FileContext | undefined): ConversationMessage {
  if (!context || (context.text === '' && context.images.length === 0)) {
    return { role: 'user', content: input };
  }
  const text = context.text ? `${context.text}\n\n${input}` : input;
  if (context.images.length === 0) {
    return { role: 'user', content: text };
  }
  const blocks: ContentBlock[] = [...context.images, { type: 'text', text }];
  return { role: 'user', content: blocks };
}
