/**
 * Action Types
 *
 * Typed instructions derived from model output, and the queue items that
 * wrap them. Actions are frozen once built; queue items are only mutated by
 * the queue's transitions.
 */

import type { AgentError } from '../errors/index.js';

// =============================================================================
// ACTIONS
// =============================================================================

export type FileOperation = 'create' | 'modify' | 'delete';

export interface CommandAction {
  readonly kind: 'command';
  readonly description: string;
  readonly command: string;
}

export interface FileAction {
  readonly kind: 'file';
  readonly description: string;
  /** Path relative to the execution root */
  readonly path: string;
  readonly content: string;
  readonly op: FileOperation;
  /** Fence language when the content came from a code block */
  readonly language?: string;
}

export type Action = CommandAction | FileAction;

export type ActionKind = Action['kind'];

export function commandAction(command: string, description = ''): CommandAction {
  const action: CommandAction = { kind: 'command', description, command };
  return Object.freeze(action);
}

export function fileAction(
  path: string,
  content: string,
  options: { description?: string; op?: FileOperation; language?: string } = {}
): FileAction {
  const action: FileAction = {
    kind: 'file',
    description: options.description ?? '',
    path,
    content,
    op: options.op ?? 'create',
    ...(options.language !== undefined && { language: options.language }),
  };
  return Object.freeze(action);
}

/**
 * Commands first, then files, each group in source order. Commands usually
 * create the directories the file writes land in.
 */
export function orderActions(actions: readonly Action[]): Action[] {
  return [
    ...actions.filter((a) => a.kind === 'command'),
    ...actions.filter((a) => a.kind === 'file'),
  ];
}

/**
 * One-line label used in the queue display.
 */
export function describeAction(action: Action): string {
  if (action.kind === 'command') {
    return action.description ? `${action.description}: ${action.command}` : `Run: ${action.command}`;
  }
  const verb = action.op === 'create' ? 'Create' : action.op === 'modify' ? 'Modify' : 'Delete';
  return action.description ? `${verb} ${action.path} (${action.description})` : `${verb} ${action.path}`;
}

// =============================================================================
// QUEUE ITEMS
// =============================================================================

export type Priority = 'low' | 'medium' | 'high';

export type QueueItemStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export interface QueueItem {
  readonly id: string;
  readonly displayText: string;
  readonly priority: Priority;
  status: QueueItemStatus;
  readonly action: Action;
  result?: string;
  error?: string;
}

// =============================================================================
// EXECUTION
// =============================================================================

/**
 * Result of running one queue item. `error` is set exactly when `success`
 * is false.
 */
export interface ExecutionOutcome {
  success: boolean;
  /** Captured output or a short summary of what was written */
  output: string;
  error?: AgentError;
  durationMs: number;
}

/**
 * Anything that can run a queue item. The queue only depends on this.
 */
export interface ItemRunner {
  run(item: QueueItem): Promise<ExecutionOutcome>;
}
