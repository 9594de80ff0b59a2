/**
 * Action Confirmation
 *
 * Single-step approval before an action runs. "Always" approves every
 * later action of the same kind for the rest of the session.
 */

import { createTwoFilesPatch } from 'diff';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import type { ActionKind, QueueItem } from './types.js';

export type ConfirmationChoice = 'yes' | 'always' | 'no';

export interface ConfirmationRequest {
  item: QueueItem;
  preview: string;
}

/**
 * Whatever asks the human. The REPL implements this over readline.
 */
export interface ConfirmationPrompter {
  ask(request: ConfirmationRequest): Promise<ConfirmationChoice>;
}

export const CONFIRMATION_CHOICES: ReadonlyArray<{ key: string; label: string; choice: ConfirmationChoice }> = [
  { key: '1', label: 'Yes', choice: 'yes' },
  { key: '2', label: "Yes, and don't ask again this session", choice: 'always' },
  { key: '3', label: 'No', choice: 'no' },
];

/**
 * Map a typed answer to a choice. Empty input means yes.
 */
export function parseConfirmationAnswer(answer: string): ConfirmationChoice | undefined {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '' || normalized === 'y' || normalized === 'yes') return 'yes';
  if (normalized === 'a' || normalized === 'always') return 'always';
  if (normalized === 'n' || normalized === 'no') return 'no';
  return CONFIRMATION_CHOICES.find((option) => option.key === normalized)?.choice;
}

// =============================================================================
// PREVIEW
// =============================================================================

export const PREVIEW_MAX_LINES = 20;
const PREVIEW_HEAD = 10;
const PREVIEW_TAIL = 5;

/**
 * Up to 20 lines verbatim; longer text keeps the first 10 and last 5.
 */
export function truncatePreview(content: string): string {
  const lines = content.split('\n');
  if (lines.length <= PREVIEW_MAX_LINES) {
    return content;
  }
  const hidden = lines.length - PREVIEW_HEAD - PREVIEW_TAIL;
  return [
    ...lines.slice(0, PREVIEW_HEAD),
    `... (${hidden} lines hidden) ...`,
    ...lines.slice(-PREVIEW_TAIL),
  ].join('\n');
}

/**
 * What the user sees before approving. For a file that already exists the
 * preview is a unified diff against the current content.
 */
export function buildPreview(item: QueueItem, existingContent?: string): string {
  const { action } = item;
  if (action.kind === 'command') {
    return `$ ${action.command}`;
  }
  if (action.op === 'delete') {
    return `delete ${action.path}`;
  }
  if (existingContent !== undefined) {
    if (existingContent === action.content) {
      return `${action.path} is unchanged`;
    }
    return truncatePreview(
      createTwoFilesPatch(action.path, action.path, existingContent, action.content, 'current', 'proposed')
    );
  }
  return truncatePreview(action.content);
}

// =============================================================================
// POLICY
// =============================================================================

export interface ConfirmationPolicyOptions {
  prompter?: ConfirmationPrompter;
  /** Approve everything without asking */
  autoConfirm?: boolean;
  logger?: StructuredLogger;
}

export class ConfirmationPolicy {
  private readonly prompter?: ConfirmationPrompter;
  private readonly autoConfirm: boolean;
  private readonly remembered = new Set<ActionKind>();
  private readonly logger: StructuredLogger;

  constructor(options: ConfirmationPolicyOptions = {}) {
    this.prompter = options.prompter;
    this.autoConfirm = options.autoConfirm ?? false;
    this.logger = createComponentLogger('ConfirmationPolicy', options.logger);
  }

  /**
   * Resolve to true when the item may run. Without a prompter and without
   * auto-confirm nothing is approved.
   */
  async confirm(item: QueueItem, preview: string): Promise<boolean> {
    if (this.autoConfirm || this.remembered.has(item.action.kind)) {
      return true;
    }
    if (!this.prompter) {
      this.logger.warn('No confirmation prompter configured; declining', { id: item.id });
      return false;
    }

    const choice = await this.prompter.ask({ item, preview });
    if (choice === 'always') {
      this.remembered.add(item.action.kind);
      this.logger.info('Approval remembered for session', { kind: item.action.kind });
    }
    return choice !== 'no';
  }

  isRemembered(kind: ActionKind): boolean {
    return this.remembered.has(kind);
  }

  reset(): void {
    this.remembered.clear();
  }
}
