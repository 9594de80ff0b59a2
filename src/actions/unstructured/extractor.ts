/**
 * Unstructured Action Extractor
 *
 * Fallback for responses that describe files and commands in prose and
 * fenced blocks instead of `<actions>` markup. File pairing runs through an
 * ordered strategy chain; shell blocks nobody claimed are split into
 * individual commands.
 */

import { createComponentLogger, type StructuredLogger } from '../../integrations/utilities/logger.js';
import { commandAction, orderActions, type Action, type CommandAction, type FileAction } from '../types.js';
import { extractCodeBlocks, isShellBlock, type CodeBlock } from './code-blocks.js';
import { createDefaultStrategies, type ExtractionContext, type ExtractionStrategy } from './strategies.js';

// =============================================================================
// DETECTION
// =============================================================================

const ACTION_INDICATORS: readonly RegExp[] = [
  /create.*file/i,
  /creating.*\.json/i,
  /create.*\.(?:ts|js|py)\b/i,
  /package\.json.*:/i,
  /tsconfig\.json.*:/i,
  /```(?:bash|sh|shell|zsh)/i,
  /run.*command/i,
  /execute.*:/i,
  /mkdir\s+-p/i,
  /npm\s+(?:init|install|i)\b/i,
  /npx\s+\S+/i,
];

/** Verbs a shell line must contain to become a command */
export const COMMAND_VERBS: readonly string[] = ['mkdir', 'touch', 'cp', 'mv', 'cd', 'npm', 'npx', 'cdk', 'node'];

const VERB_PATTERN = new RegExp(`(?:^|[\\s;&|(])(?:${COMMAND_VERBS.join('|')})(?=$|[\\s;&|)])`);
const PROMPT_PREFIX = /^(?:\$|>|PS>)\s+/;

// =============================================================================
// EXTRACTOR
// =============================================================================

export interface UnstructuredExtraction {
  files: FileAction[];
  commands: CommandAction[];
}

export interface UnstructuredActionExtractorOptions {
  strategies?: ExtractionStrategy[];
  logger?: StructuredLogger;
}

export class UnstructuredActionExtractor {
  private readonly strategies: ExtractionStrategy[];
  private readonly logger: StructuredLogger;

  constructor(options: UnstructuredActionExtractorOptions = {}) {
    this.strategies = options.strategies ?? createDefaultStrategies();
    this.logger = createComponentLogger('UnstructuredActionExtractor', options.logger);
  }

  /**
   * Cheap check for whether a response probably wanted to act.
   */
  detectLikely(responseText: string): boolean {
    return ACTION_INDICATORS.some((pattern) => pattern.test(responseText));
  }

  extract(responseText: string): UnstructuredExtraction {
    const blocks = extractCodeBlocks(responseText);
    const context: ExtractionContext = {
      text: responseText,
      lines: responseText.split('\n'),
      blocks,
    };

    const files: FileAction[] = [];
    let claimed: ReadonlySet<number> = new Set<number>();

    for (const strategy of this.strategies) {
      const result = strategy.tryExtract(context, claimed);
      if (result.actions.length > 0) {
        this.logger.debug('Strategy produced file actions', {
          strategy: strategy.name,
          count: result.actions.length,
        });
      }
      files.push(...result.actions);
      claimed = result.claimed;
    }

    const commands = blocks
      .filter((block) => isShellBlock(block) && !claimed.has(block.index))
      .flatMap((block) => splitShellBlock(block));

    return { files, commands };
  }

  /**
   * Actions in queue order plus whether anything was found at all.
   */
  extractActions(responseText: string): { actions: Action[]; foundAny: boolean } {
    const { files, commands } = this.extract(responseText);
    const actions = orderActions([...commands, ...files]);
    return { actions, foundAny: actions.length > 0 };
  }
}

/**
 * One command per meaningful line: comments, blank lines and lines without
 * a recognized verb are dropped, a leading `$ ` prompt is removed.
 */
export function splitShellBlock(block: CodeBlock): CommandAction[] {
  const commands: CommandAction[] = [];

  for (const rawLine of block.content.split('\n')) {
    const line = rawLine.trim().replace(PROMPT_PREFIX, '');
    if (!line || line.startsWith('#')) {
      continue;
    }
    if (!VERB_PATTERN.test(line)) {
      continue;
    }
    commands.push(commandAction(line, 'Shell command from response'));
  }

  return commands;
}

/**
 * Convenience wrapper returning `[actions, foundAny]`.
 */
export function extractUnstructured(
  text: string,
  options?: UnstructuredActionExtractorOptions
): [Action[], boolean] {
  const { actions, foundAny } = new UnstructuredActionExtractor(options).extractActions(text);
  return [actions, foundAny];
}
