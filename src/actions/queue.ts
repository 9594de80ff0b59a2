/**
 * Action Queue
 *
 * Finite state machine over the actions extracted from one response.
 *
 *   pending ──start──► in_progress ──finish──► completed | failed
 *   pending ──skip───► completed ("Skipped by user")
 *
 * completed and failed are terminal, and at most one item is in_progress
 * at a time. A new response with actions replaces the whole queue.
 */

import { InvalidTransitionError, formatError, wrapError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import {
  describeAction,
  orderActions,
  type Action,
  type ExecutionOutcome,
  type ItemRunner,
  type Priority,
  type QueueItem,
} from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export const SKIPPED_RESULT = 'Skipped by user';

export type QueueEvent =
  | { type: 'item.started'; item: QueueItem }
  | { type: 'item.completed'; item: QueueItem; outcome: ExecutionOutcome }
  | { type: 'item.failed'; item: QueueItem; outcome: ExecutionOutcome }
  | { type: 'item.skipped'; item: QueueItem }
  | { type: 'queue.drained'; counts: QueueCounts };

export type QueueEventListener = (event: QueueEvent) => void;

export interface QueueCounts {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
}

/** Decision taken before each item during `runAll` */
export type StepDecision = 'run' | 'skip' | 'stop';

export interface RunAllOptions {
  /** Consulted before every item; 'stop' cancels the rest of the run */
  beforeEach?: (item: QueueItem) => StepDecision | Promise<StepDecision>;
  signal?: AbortSignal;
}

export interface RunAllSummary {
  executed: number;
  completed: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
}

export type LookupResult = { ok: true; item: QueueItem } | { ok: false; error: string };

export interface ActionQueueOptions {
  logger?: StructuredLogger;
  priorityOf?: (action: Action) => Priority;
}

// =============================================================================
// QUEUE
// =============================================================================

export class ActionQueue {
  private readonly items: QueueItem[];
  private readonly listeners: QueueEventListener[] = [];
  private readonly logger: StructuredLogger;

  constructor(actions: readonly Action[], options: ActionQueueOptions = {}) {
    this.logger = createComponentLogger('ActionQueue', options.logger);
    const priorityOf: (action: Action) => Priority = options.priorityOf ?? (() => 'medium');
    this.items = orderActions(actions).map((action, index): QueueItem => ({
      id: `action-${index + 1}`,
      displayText: describeAction(action),
      priority: priorityOf(action),
      status: 'pending',
      action,
    }));
  }

  /**
   * Build a queue from parsed actions (commands are moved ahead of files).
   */
  static fromActions(actions: readonly Action[], options?: ActionQueueOptions): ActionQueue {
    return new ActionQueue(actions, options);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  list(): readonly QueueItem[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  counts(): QueueCounts {
    const counts: QueueCounts = { total: this.items.length, pending: 0, inProgress: 0, completed: 0, failed: 0 };
    for (const item of this.items) {
      if (item.status === 'pending') counts.pending++;
      else if (item.status === 'in_progress') counts.inProgress++;
      else if (item.status === 'completed') counts.completed++;
      else counts.failed++;
    }
    return counts;
  }

  hasPending(): boolean {
    return this.items.some((item) => item.status === 'pending');
  }

  /**
   * First pending item in queue order.
   */
  next(): QueueItem | undefined {
    return this.items.find((item) => item.status === 'pending');
  }

  /**
   * 1-based lookup of a pending item. Bad input is reported, not thrown.
   */
  byIndex(input: number | string): LookupResult {
    const raw = typeof input === 'number' ? String(input) : input.trim();
    if (!/^\d+$/.test(raw)) {
      return { ok: false, error: `Not a number: "${raw}"` };
    }
    const index = Number.parseInt(raw, 10);
    const item = this.items[index - 1];
    if (index < 1 || !item) {
      return { ok: false, error: `No action #${index} (queue has ${this.items.length})` };
    }
    if (item.status !== 'pending') {
      return { ok: false, error: `Action #${index} is already ${item.status.replace('_', ' ')}` };
    }
    return { ok: true, item };
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  /**
   * pending → completed without running anything.
   */
  skip(item: QueueItem): void {
    this.assertOwned(item);
    if (item.status !== 'pending') {
      throw new InvalidTransitionError(item.id, item.status, 'completed', 'only pending actions can be skipped');
    }
    item.status = 'completed';
    item.result = SKIPPED_RESULT;
    this.logger.debug('Action skipped', { id: item.id });
    this.emit({ type: 'item.skipped', item });
  }

  /**
   * pending → in_progress.
   */
  start(item: QueueItem): void {
    this.assertOwned(item);
    if (item.status !== 'pending') {
      throw new InvalidTransitionError(item.id, item.status, 'in_progress');
    }
    const running = this.items.find((other) => other.status === 'in_progress');
    if (running) {
      throw new InvalidTransitionError(item.id, item.status, 'in_progress', `${running.id} is still running`);
    }
    item.status = 'in_progress';
    this.emit({ type: 'item.started', item });
  }

  /**
   * in_progress → completed | failed, from the runner's outcome.
   */
  finish(item: QueueItem, outcome: ExecutionOutcome): void {
    this.assertOwned(item);
    if (item.status !== 'in_progress') {
      throw new InvalidTransitionError(item.id, item.status, outcome.success ? 'completed' : 'failed');
    }
    item.result = outcome.output;
    if (outcome.success) {
      item.status = 'completed';
      this.emit({ type: 'item.completed', item, outcome });
    } else {
      item.status = 'failed';
      item.error = outcome.error ? formatError(outcome.error) : 'Action failed';
      this.emit({ type: 'item.failed', item, outcome });
    }
  }

  /**
   * Run one pending item to a terminal state. A runner that throws still
   * leaves the item failed; nothing propagates.
   */
  async execute(item: QueueItem, runner: ItemRunner): Promise<ExecutionOutcome> {
    this.start(item);
    const startedAt = Date.now();
    let outcome: ExecutionOutcome;
    try {
      outcome = await runner.run(item);
    } catch (error) {
      const wrapped = wrapError(error, { itemId: item.id });
      this.logger.error('Runner threw while executing action', { id: item.id, error: wrapped.toLogString() });
      outcome = { success: false, output: '', error: wrapped, durationMs: Date.now() - startedAt };
    }
    this.finish(item, outcome);
    return outcome;
  }

  /**
   * Run the next pending item, if any.
   */
  async executeNext(runner: ItemRunner): Promise<{ item: QueueItem; outcome: ExecutionOutcome } | undefined> {
    const item = this.next();
    if (!item) {
      return undefined;
    }
    const outcome = await this.execute(item, runner);
    return { item, outcome };
  }

  /**
   * Drain the queue. Failures are recorded and the run continues; only a
   * 'stop' decision or an aborted signal ends it early.
   */
  async runAll(runner: ItemRunner, options: RunAllOptions = {}): Promise<RunAllSummary> {
    const summary: RunAllSummary = { executed: 0, completed: 0, failed: 0, skipped: 0, cancelled: false };

    for (let item = this.next(); item; item = this.next()) {
      if (options.signal?.aborted) {
        summary.cancelled = true;
        break;
      }

      const decision = options.beforeEach ? await options.beforeEach(item) : 'run';
      if (decision === 'stop') {
        summary.cancelled = true;
        break;
      }
      if (decision === 'skip') {
        this.skip(item);
        summary.skipped++;
        continue;
      }

      const outcome = await this.execute(item, runner);
      summary.executed++;
      if (outcome.success) summary.completed++;
      else summary.failed++;
    }

    if (!this.hasPending()) {
      this.emit({ type: 'queue.drained', counts: this.counts() });
    }
    this.logger.info('Run-all finished', { ...summary });
    return summary;
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Subscribe to queue events. Returns an unsubscribe function.
   */
  on(listener: QueueEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  private emit(event: QueueEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn('Queue listener threw', { event: event.type, error: formatError(error) });
      }
    }
  }

  private assertOwned(item: QueueItem): void {
    if (!this.items.includes(item)) {
      throw new InvalidTransitionError(item.id, item.status, item.status, 'item belongs to another queue');
    }
  }
}
