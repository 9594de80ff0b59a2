/**
 * Fenced Code Blocks
 *
 * Locates ``` fenced blocks in a response, with their language tag, line
 * span and any embedded `filename:` comment.
 */

import languageExtensions from '../../data/language-extensions.json' with { type: 'json' };

export interface CodeBlock {
  /** Position among all blocks of the response (0-based) */
  index: number;
  language?: string;
  /** Block body; the `filename:` comment line is removed when present */
  content: string;
  /** Line (0-based) of the opening fence */
  startLine: number;
  /** Line (0-based) of the closing fence */
  endLine: number;
  /** Name given by a `# filename: x` / `// file: x` comment inside the block */
  embeddedFilename?: string;
}

const CODE_BLOCK = /```([\w+#.-]*)[^\S\n]*\n([\s\S]*?)```/g;
const FILENAME_COMMENT = /^[^\S\n]*(?:#|\/\/|--)[^\S\n]*(?:filename|file)[^\S\n]*:[^\S\n]*([\w\-./]+)[^\S\n]*(?:\n|$)/im;
const SHELL_LANGUAGES = new Set(['bash', 'sh', 'shell', 'zsh', 'console']);

const LANGUAGE_EXTENSIONS: Record<string, string> = languageExtensions;

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}

export function extractCodeBlocks(text: string): CodeBlock[] {
  const blocks: CodeBlock[] = [];

  for (const match of text.matchAll(CODE_BLOCK)) {
    const start = match.index ?? 0;
    const startLine = countNewlines(text.slice(0, start));
    const endLine = startLine + countNewlines(match[0]);
    const language = match[1] ? match[1].toLowerCase() : undefined;
    let content = match[2] ?? '';
    let embeddedFilename: string | undefined;

    const filenameMatch = FILENAME_COMMENT.exec(content);
    if (filenameMatch?.[1]) {
      embeddedFilename = filenameMatch[1];
      content = content.replace(FILENAME_COMMENT, '');
    }

    blocks.push({
      index: blocks.length,
      ...(language !== undefined && { language }),
      content,
      startLine,
      endLine,
      ...(embeddedFilename !== undefined && { embeddedFilename }),
    });
  }

  return blocks;
}

export function isShellBlock(block: CodeBlock): boolean {
  return block.language !== undefined && SHELL_LANGUAGES.has(block.language);
}

/**
 * File extension for a fence language, `.txt` when unknown.
 */
export function extensionForLanguage(language: string | undefined): string {
  if (!language) {
    return '.txt';
  }
  return LANGUAGE_EXTENSIONS[language.toLowerCase()] ?? '.txt';
}

/**
 * True when the line lies inside (or on the fences of) any block.
 */
export function isInsideBlock(line: number, blocks: readonly CodeBlock[]): boolean {
  return blocks.some((block) => line >= block.startLine && line <= block.endLine);
}
