/**
 * File Extraction Strategies
 *
 * Ordered heuristics that pair a path with a fenced code block when the
 * model answered in prose. Each strategy only sees blocks no earlier
 * strategy claimed, and reports the blocks it claimed in turn.
 */

import fileNames from '../../data/file-names.json' with { type: 'json' };
import { fileAction, type FileAction } from '../types.js';
import { isInsideBlock, isShellBlock, type CodeBlock } from './code-blocks.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ExtractionContext {
  text: string;
  lines: readonly string[];
  blocks: readonly CodeBlock[];
}

export interface StrategyResult {
  actions: FileAction[];
  claimed: ReadonlySet<number>;
}

export interface ExtractionStrategy {
  readonly name: string;
  tryExtract(context: ExtractionContext, claimed: ReadonlySet<number>): StrategyResult;
}

// =============================================================================
// PATH HEURISTICS
// =============================================================================

const KNOWN_EXTENSIONS = new Set(fileNames.extensions);
const EXTENSIONLESS_NAMES = new Set(fileNames.extensionless);
const SCRIPT_EXTENSIONS = new Set(['sh', 'bash', 'zsh', 'fish']);
const DOTFILES = new Set(['env', 'gitignore', 'dockerignore', 'editorconfig', 'prettierrc', 'eslintrc', 'babelrc']);

const PATH_CHARS = /^[\w@+.\-/]+$/;
const EXTENSION = /\.([A-Za-z][A-Za-z0-9]*)$/;

const HEADER_PATTERNS: readonly RegExp[] = [
  /^#{1,6}\s*(.+?)\s*#*$/,
  /^\*\*(.+?)\*\*:?$/,
  /^`([^`]+)`:?$/,
  /^(.+?):?$/,
];

function basename(path: string): string {
  const parts = path.split('/');
  return parts[parts.length - 1] ?? path;
}

/**
 * Reduce a header-ish line to a path, or undefined when it is prose.
 */
export function pathFromHeaderLine(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed) {
    return undefined;
  }

  let candidate: string | undefined;
  for (const pattern of HEADER_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match?.[1]) {
      candidate = match[1];
      break;
    }
  }
  if (!candidate) {
    return undefined;
  }

  candidate = candidate
    .replace(/[`*_"']/g, '')
    .replace(/^(?:file(?:name)?|path)\s*:\s*/i, '')
    .replace(/:$/, '')
    .trim();

  return looksLikePath(candidate) ? candidate : undefined;
}

/**
 * A token with no whitespace that contains a directory separator, ends in
 * a letter-led extension, or is a known extensionless file name.
 */
export function looksLikePath(candidate: string): boolean {
  if (!candidate || candidate.length > 200 || candidate.startsWith('#')) {
    return false;
  }
  if (!PATH_CHARS.test(candidate)) {
    return false;
  }
  if (candidate.split('/').some((segment) => segment === '..')) {
    return false;
  }
  const name = basename(candidate);
  if (EXTENSIONLESS_NAMES.has(name)) {
    return true;
  }
  if (EXTENSION.test(name)) {
    return true;
  }
  return candidate.includes('/') && name.length > 0;
}

/**
 * Shell-tagged blocks are commands unless the target is itself a script.
 */
function canHold(block: CodeBlock, path: string): boolean {
  if (!isShellBlock(block)) {
    return true;
  }
  const ext = EXTENSION.exec(basename(path))?.[1];
  return ext !== undefined && SCRIPT_EXTENSIONS.has(ext.toLowerCase());
}

function toFileAction(path: string, block: CodeBlock, description: string): FileAction {
  return fileAction(path, block.content, {
    description,
    op: 'create',
    ...(block.language !== undefined && { language: block.language }),
  });
}

// =============================================================================
// STRATEGIES
// =============================================================================

/**
 * A heading, bold, backtick or bare line naming a path, followed within
 * `window` lines by an unclaimed block.
 */
export class HeaderProximityStrategy implements ExtractionStrategy {
  readonly name = 'header-proximity';

  constructor(private readonly window = 10) {}

  tryExtract(context: ExtractionContext, claimed: ReadonlySet<number>): StrategyResult {
    const taken = new Set(claimed);
    const actions: FileAction[] = [];

    context.lines.forEach((line, lineIndex) => {
      if (isInsideBlock(lineIndex, context.blocks)) {
        return;
      }
      const path = pathFromHeaderLine(line);
      if (!path) {
        return;
      }

      const next = context.blocks.find((block) => block.startLine > lineIndex);
      if (!next || taken.has(next.index) || next.startLine - lineIndex > this.window) {
        return;
      }
      if (!canHold(next, path)) {
        return;
      }

      actions.push(toFileAction(path, next, `File from heading "${line.trim()}"`));
      taken.add(next.index);
    });

    return { actions, claimed: taken };
  }
}

/**
 * Blocks that name their own file through a `filename:` comment.
 */
export class EmbeddedFilenameStrategy implements ExtractionStrategy {
  readonly name = 'embedded-filename';

  tryExtract(context: ExtractionContext, claimed: ReadonlySet<number>): StrategyResult {
    const taken = new Set(claimed);
    const actions: FileAction[] = [];

    for (const block of context.blocks) {
      if (taken.has(block.index) || !block.embeddedFilename) {
        continue;
      }
      actions.push(toFileAction(block.embeddedFilename, block, 'File named inside code block'));
      taken.add(block.index);
    }

    return { actions, claimed: taken };
  }
}

/**
 * Last resort: any `name.ext` token with a known extension, paired with the
 * next unclaimed block after the line it appears on.
 */
export class FilenameMentionStrategy implements ExtractionStrategy {
  readonly name = 'filename-mention';

  private static readonly MENTION = /(?<![\w@+.\-/])((?:[\w@+\-]+\/)*[\w@+\-.]*\.([A-Za-z][A-Za-z0-9]*))(?![\w\-/])/g;

  tryExtract(context: ExtractionContext, claimed: ReadonlySet<number>): StrategyResult {
    const taken = new Set(claimed);
    const actions: FileAction[] = [];
    const paired = new Set<string>();

    context.lines.forEach((line, lineIndex) => {
      if (isInsideBlock(lineIndex, context.blocks)) {
        return;
      }
      for (const match of line.matchAll(FilenameMentionStrategy.MENTION)) {
        const path = match[1];
        const ext = match[2];
        if (!path || !ext || !KNOWN_EXTENSIONS.has(ext.toLowerCase()) || paired.has(path)) {
          continue;
        }
        // ".py" alone names a file type, not a file
        if (path === `.${ext}` && !DOTFILES.has(ext.toLowerCase())) {
          continue;
        }
        const block = context.blocks.find(
          (candidate) => candidate.startLine > lineIndex && !taken.has(candidate.index) && canHold(candidate, path)
        );
        if (!block) {
          continue;
        }
        actions.push(toFileAction(path, block, `File mentioned as ${path}`));
        taken.add(block.index);
        paired.add(path);
      }
    });

    return { actions, claimed: taken };
  }
}

/**
 * The default chain, in priority order.
 */
export function createDefaultStrategies(): ExtractionStrategy[] {
  return [new HeaderProximityStrategy(), new EmbeddedFilenameStrategy(), new FilenameMentionStrategy()];
}
