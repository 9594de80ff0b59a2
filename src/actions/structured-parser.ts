/**
 * Structured Action Parser
 *
 * Extracts typed actions from `<actions>` blocks in a model response.
 * Each block is located with a non-greedy match and read on its own, so a
 * malformed block costs only its own actions. Every matched block is
 * replaced in the remaining text by a placeholder, parsed or not.
 */

import { ActionParseError, formatErrorForLog } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { childElement, parseMarkup, type MarkupElement } from './markup.js';
import { commandAction, fileAction, type Action, type FileOperation } from './types.js';

export const ACTIONS_PLACEHOLDER = '[Actions hidden - see action queue below]';

const ACTIONS_BLOCK = /<actions>([\s\S]*?)<\/actions>/g;

export interface StructuredParseResult {
  actions: Action[];
  remainingText: string;
  /** Number of `<actions>` blocks matched */
  blockCount: number;
  /** Indexes (0-based) of blocks that were skipped as malformed */
  failedBlocks: number[];
}

export interface StructuredActionParserOptions {
  logger?: StructuredLogger;
}

const FILE_OPERATIONS: readonly FileOperation[] = ['create', 'modify', 'delete'];

function isFileOperation(value: string): value is FileOperation {
  return FILE_OPERATIONS.some((op) => op === value);
}

export class StructuredActionParser {
  private readonly logger: StructuredLogger;

  constructor(options: StructuredActionParserOptions = {}) {
    this.logger = createComponentLogger('StructuredActionParser', options.logger);
  }

  /**
   * Returns the actions of every well-formed block, in document order.
   * With no blocks at all the text comes back untouched.
   */
  extract(responseText: string): StructuredParseResult {
    const matches = [...responseText.matchAll(ACTIONS_BLOCK)];
    if (matches.length === 0) {
      return { actions: [], remainingText: responseText, blockCount: 0, failedBlocks: [] };
    }

    const actions: Action[] = [];
    const failedBlocks: number[] = [];

    matches.forEach((match, index) => {
      try {
        actions.push(...this.parseBlock(match[1] ?? '', index));
      } catch (error) {
        if (!(error instanceof ActionParseError)) {
          throw error;
        }
        failedBlocks.push(index);
        this.logger.warn('Skipping malformed actions block', {
          block: index,
          error: formatErrorForLog(error),
        });
      }
    });

    const remainingText = responseText.replace(ACTIONS_BLOCK, ACTIONS_PLACEHOLDER).trim();

    this.logger.debug('Structured extraction finished', {
      blocks: matches.length,
      actions: actions.length,
      failed: failedBlocks.length,
    });

    return { actions, remainingText, blockCount: matches.length, failedBlocks };
  }

  /**
   * Parse one block body. Structural problems throw ActionParseError;
   * an action missing a required child is dropped on its own.
   */
  private parseBlock(body: string, blockIndex: number): Action[] {
    const actions: Action[] = [];

    for (const element of parseMarkup(body)) {
      if (element.name !== 'action') {
        continue;
      }
      const action = this.toAction(element);
      if (action) {
        actions.push(action);
      } else {
        this.logger.warn('Dropping incomplete action', {
          block: blockIndex,
          type: element.attributes.type ?? '(none)',
        });
      }
    }

    return actions;
  }

  private toAction(element: MarkupElement): Action | undefined {
    const type = element.attributes.type;
    const description = childElement(element, 'description')?.text.trim() ?? '';

    if (type === 'command') {
      const command = childElement(element, 'command')?.text.trim();
      return command ? commandAction(command, description) : undefined;
    }

    if (type === 'file' || type === 'delete') {
      const path = childElement(element, 'path')?.text.trim();
      if (!path) {
        return undefined;
      }

      const requestedOp = type === 'delete' ? 'delete' : (element.attributes.op ?? 'create');
      if (!isFileOperation(requestedOp)) {
        return undefined;
      }

      const contentElement = childElement(element, 'content');
      if (requestedOp !== 'delete' && !contentElement) {
        return undefined;
      }

      return fileAction(path, contentElement?.text.trim() ?? '', { description, op: requestedOp });
    }

    return undefined;
  }
}

/**
 * Convenience wrapper: parse and return `[actions, cleanedText]`.
 */
export function parseActions(text: string, options?: StructuredActionParserOptions): [Action[], string] {
  const { actions, remainingText } = new StructuredActionParser(options).extract(text);
  return [actions, remainingText];
}
