/**
 * Queue Display
 *
 * Renders the action queue for the terminal: progress bar, one numbered
 * line per item, previews under pending items, errors under failed ones.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { QueueItem, QueueItemStatus } from './types.js';

export const PROGRESS_WIDTH = 20;

const ICONS: Record<QueueItemStatus, string> = {
  pending: '●',
  in_progress: '►',
  completed: '✓',
  failed: '✗',
};

export interface RenderOptions {
  /** Defaults to the global chalk instance */
  chalk?: ChalkInstance;
  /** Show "Will execute" / "Will write" lines under pending items */
  showPreview?: boolean;
}

export function progressBar(done: number, total: number, width = PROGRESS_WIDTH): string {
  const filled = total > 0 ? Math.floor((done / total) * width) : 0;
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function colorFor(c: ChalkInstance, status: QueueItemStatus): ChalkInstance {
  switch (status) {
    case 'pending':
      return c.white;
    case 'in_progress':
      return c.yellow;
    case 'completed':
      return c.green;
    case 'failed':
      return c.red;
  }
}

function lineCount(content: string): number {
  return content.trim().split('\n').length;
}

function previewLine(item: QueueItem): string {
  const { action } = item;
  if (action.kind === 'command') {
    return `Will execute: $ ${action.command}`;
  }
  return `Will write ${lineCount(action.content)} lines of ${action.language ?? 'text'}`;
}

function nextHint(c: ChalkInstance, item: QueueItem, position: number): string[] {
  const { action } = item;
  const lines = [c.bold.cyan('Next action ready:')];
  if (action.kind === 'command') {
    lines.push(`  ${c.yellow('→ Execute command:')} ${action.command}`);
    if (action.description) lines.push(c.dim(`    ${action.description}`));
  } else {
    const verb = action.op.charAt(0).toUpperCase() + action.op.slice(1);
    lines.push(`  ${c.green(`→ ${verb} file:`)} ${action.path}`);
  }
  lines.push('');
  lines.push(c.bold(`Press Enter to review and execute action #${position}`));
  lines.push(c.dim('Or type a command (e.g. /skip, /run-all, /help)'));
  return lines;
}

/**
 * Render the queue as printable lines.
 */
export function renderQueue(items: readonly QueueItem[], options: RenderOptions = {}): string[] {
  if (items.length === 0) {
    return [];
  }
  const c = options.chalk ?? chalk;
  const showPreview = options.showPreview ?? true;

  const completed = items.filter((item) => item.status === 'completed').length;
  const failed = items.filter((item) => item.status === 'failed').length;
  const running = items.filter((item) => item.status === 'in_progress').length;

  const lines: string[] = [c.bold.blue('Action Queue'), ''];
  lines.push(`Progress: [${progressBar(completed, items.length)}] ${completed}/${items.length} completed`);
  if (running > 0) lines.push(c.yellow(`${running} in progress`));
  if (failed > 0) lines.push(c.red(`${failed} failed`));

  items.forEach((item, index) => {
    const color = colorFor(c, item.status);
    const label = item.status === 'completed' ? c.strikethrough(item.displayText) : item.displayText;
    lines.push(color(`${index + 1}. ${ICONS[item.status]} ${label}`));

    if (showPreview && item.status === 'pending') {
      lines.push(c.dim(`   └─ ${previewLine(item)}`));
    }
    if (item.status === 'failed' && item.error) {
      lines.push(c.red(`   └─ Error: ${item.error}`));
    }
  });

  const nextIndex = items.findIndex((item) => item.status === 'pending');
  const next = items[nextIndex];
  if (next) {
    lines.push('');
    lines.push(...nextHint(c, next, nextIndex + 1));
  }

  return lines;
}

/**
 * Short one-line status for prompts and logs.
 */
export function summarizeQueue(items: readonly QueueItem[]): string {
  if (items.length === 0) {
    return 'No actions queued';
  }
  const pending = items.filter((item) => item.status === 'pending').length;
  const completed = items.filter((item) => item.status === 'completed').length;
  const failed = items.filter((item) => item.status === 'failed').length;
  return `${items.length} actions: ${completed} completed, ${failed} failed, ${pending} pending`;
}
