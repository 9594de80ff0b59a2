/**
 * Orchestrator
 *
 * Glue between the conversation and the action pipeline. Outbound, the
 * history passes through the budget manager (which may compact it) before
 * reaching the provider. Inbound, the response goes through the structured
 * parser, an optional reformat request, then the unstructured extractor;
 * whatever actions come out replace the current queue.
 */

import { ActionExecutor } from './actions/executor.js';
import { ConfirmationPolicy, type ConfirmationPrompter } from './actions/confirmation.js';
import {
  REFORMAT_SYSTEM_PROMPT,
  baseSystemPrompt,
  buildReformatPrompt,
  enhanceSystemPrompt,
  suggestStructuredFormat,
} from './actions/prompt.js';
import { ActionQueue, type QueueEventListener, type RunAllSummary } from './actions/queue.js';
import { StructuredActionParser } from './actions/structured-parser.js';
import type { Action, ExecutionOutcome, QueueItem } from './actions/types.js';
import { UnstructuredActionExtractor } from './actions/unstructured/extractor.js';
import { ContextBudgetManager, type ContextStats } from './context/budget-manager.js';
import type { ResolvedSettings } from './defaults.js';
import { formatError } from './errors/index.js';
import { readFileContext, withFileContext, type FileContext } from './integrations/file-context.js';
import { createComponentLogger, type StructuredLogger } from './integrations/utilities/logger.js';
import type { LLMProvider } from './providers/types.js';
import type { ConversationMessage } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export type ActionSource = 'structured' | 'reprocessed' | 'unstructured' | 'none';

export interface ProcessedResponse {
  actions: Action[];
  source: ActionSource;
  /** Response text with action blocks replaced by a placeholder */
  displayText: string;
  /** Shown when the response looked actionable but nothing was found */
  hint?: string;
}

export interface TurnResult extends ProcessedResponse {
  response: string;
  stats: ContextStats;
  compacted: boolean;
}

export type StepResult =
  | { status: 'empty' }
  | { status: 'error'; error: string }
  | { status: 'skipped'; item: QueueItem }
  | { status: 'executed'; item: QueueItem; outcome: ExecutionOutcome };

export interface OrchestratorOptions {
  provider: LLMProvider;
  settings: ResolvedSettings;
  prompter?: ConfirmationPrompter;
  /** Replaces the default base system prompt */
  systemPrompt?: string;
  logger?: StructuredLogger;
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class Orchestrator {
  readonly executor: ActionExecutor;
  readonly budget: ContextBudgetManager;
  private readonly provider: LLMProvider;
  private readonly settings: ResolvedSettings;
  private readonly systemPrompt: string;
  private readonly parser: StructuredActionParser;
  private readonly extractor: UnstructuredActionExtractor;
  private readonly logger: StructuredLogger;
  private readonly queueListeners: QueueEventListener[] = [];

  private history: ConversationMessage[] = [];
  private queue?: ActionQueue;
  private pendingContext?: FileContext;
  private lastResponse?: string;
  private model?: string;

  constructor(options: OrchestratorOptions) {
    this.provider = options.provider;
    this.settings = options.settings;
    this.model = options.settings.model;
    this.logger = createComponentLogger('Orchestrator', options.logger);

    const base = options.systemPrompt ?? baseSystemPrompt();
    this.systemPrompt = this.settings.actions.structuredPrompt ? enhanceSystemPrompt(base) : base;

    this.parser = new StructuredActionParser({ logger: this.logger });
    this.extractor = new UnstructuredActionExtractor({ logger: this.logger });
    const { maxTokens, compactThresholdPercent, warnThresholdPercent, keepRecent } = this.settings.context;
    this.budget = new ContextBudgetManager({
      maxTokens,
      compactThresholdPercent,
      warnThresholdPercent,
      keepRecent,
      logger: this.logger,
    });
    this.executor = new ActionExecutor({
      rootDir: this.settings.rootDir,
      commandTimeoutMs: this.settings.execution.commandTimeoutMs,
      shell: this.settings.execution.shell,
      confirmation: new ConfirmationPolicy({
        autoConfirm: this.settings.execution.autoConfirm,
        logger: this.logger,
        ...(options.prompter && { prompter: options.prompter }),
      }),
      logger: this.logger,
    });
  }

  // ---------------------------------------------------------------------------
  // Conversation
  // ---------------------------------------------------------------------------

  getHistory(): readonly ConversationMessage[] {
    return this.history;
  }

  getLastResponse(): string | undefined {
    return this.lastResponse;
  }

  getModel(): string {
    return this.model ?? this.provider.defaultModel;
  }

  setModel(model: string): void {
    this.model = model;
    this.logger.info('Model changed', { model });
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  clearHistory(): void {
    this.history = [];
    this.lastResponse = undefined;
    this.pendingContext = undefined;
  }

  /**
   * Read files to prepend to the next user message.
   */
  async attachFiles(paths: readonly string[]): Promise<FileContext> {
    const context = await readFileContext(paths, { cwd: this.settings.rootDir, logger: this.logger });
    const previous = this.pendingContext;
    this.pendingContext = previous
      ? {
          text: [previous.text, context.text].filter(Boolean).join('\n\n'),
          images: [...previous.images, ...context.images],
          included: [...previous.included, ...context.included],
          skipped: [...previous.skipped, ...context.skipped],
        }
      : context;
    return context;
  }

  contextStats(): ContextStats {
    return this.budget.stats(this.history);
  }

  /**
   * Compact the history now, regardless of thresholds.
   */
  compactNow(): { before: ContextStats; after: ContextStats } {
    const before = this.budget.stats(this.history);
    this.history = this.budget.compact(this.history);
    return { before, after: this.budget.stats(this.history) };
  }

  /**
   * One round trip: add the user message, fit the history to the budget,
   * ask the provider, then turn the answer into queued actions. A provider
   * failure removes the user message again and propagates.
   */
  async sendTurn(input: string, options: { signal?: AbortSignal } = {}): Promise<TurnResult> {
    const message = withFileContext(input, this.pendingContext);
    this.pendingContext = undefined;
    this.history.push(message);

    const prepared = this.budget.prepare(this.history, { autoCompact: this.settings.context.autoCompact });
    if (prepared.compacted) {
      this.history = prepared.messages;
    }

    let response: string;
    try {
      response = await this.provider.sendMessage(prepared.messages, this.systemPrompt, {
        model: this.getModel(),
        maxTokens: this.settings.responseMaxTokens,
        temperature: this.settings.temperature,
        ...(options.signal && { signal: options.signal }),
      });
    } catch (error) {
      const index = this.history.lastIndexOf(message);
      if (index !== -1) this.history.splice(index, 1);
      throw error;
    }

    this.history.push({ role: 'assistant', content: response });
    this.lastResponse = response;

    const processed = await this.handleResponse(response, options);
    return {
      ...processed,
      response,
      stats: this.budget.stats(this.history),
      compacted: prepared.compacted,
    };
  }

  /**
   * Parser chain for one response. Replaces the queue when anything is
   * found; otherwise the current queue stays.
   */
  async handleResponse(text: string, options: { signal?: AbortSignal } = {}): Promise<ProcessedResponse> {
    const structured = this.parser.extract(text);
    const displayText = structured.blockCount > 0 ? structured.remainingText : text;

    if (structured.actions.length > 0) {
      this.replaceQueue(structured.actions);
      return { actions: structured.actions, source: 'structured', displayText };
    }

    const likely = this.extractor.detectLikely(text);
    if (likely && this.settings.actions.reprocessUnstructured) {
      const reprocessed = await this.reprocess(text, options.signal);
      if (reprocessed.length > 0) {
        this.replaceQueue(reprocessed);
        return { actions: reprocessed, source: 'reprocessed', displayText };
      }
    }

    const { actions, foundAny } = this.extractor.extractActions(text);
    if (foundAny) {
      this.replaceQueue(actions);
      return { actions, source: 'unstructured', displayText };
    }

    return {
      actions: [],
      source: 'none',
      displayText,
      ...(likely && { hint: suggestStructuredFormat() }),
    };
  }

  private async reprocess(text: string, signal?: AbortSignal): Promise<Action[]> {
    try {
      const answer = await this.provider.sendMessage(
        [{ role: 'user', content: buildReformatPrompt(text) }],
        REFORMAT_SYSTEM_PROMPT,
        {
          model: this.getModel(),
          maxTokens: this.settings.responseMaxTokens,
          temperature: 0,
          ...(signal && { signal }),
        }
      );
      const { actions } = this.parser.extract(answer);
      this.logger.info('Reformat request finished', { actions: actions.length });
      return actions;
    } catch (error) {
      this.logger.warn('Reformat request failed', { error: formatError(error) });
      return [];
    }
  }

  // ---------------------------------------------------------------------------
  // Queue
  // ---------------------------------------------------------------------------

  getQueue(): ActionQueue | undefined {
    return this.queue;
  }

  /**
   * Subscribe to events of the current and every future queue.
   */
  onQueueEvent(listener: QueueEventListener): () => void {
    this.queueListeners.push(listener);
    const unsubscribeCurrent = this.queue?.on(listener);
    return () => {
      unsubscribeCurrent?.();
      const index = this.queueListeners.indexOf(listener);
      if (index !== -1) this.queueListeners.splice(index, 1);
    };
  }

  clearQueue(): void {
    this.queue = undefined;
  }

  private replaceQueue(actions: readonly Action[]): void {
    this.queue = ActionQueue.fromActions(actions, { logger: this.logger });
    for (const listener of this.queueListeners) {
      this.queue.on(listener);
    }
    this.logger.debug('Queue replaced', { size: this.queue.size });
  }

  /**
   * Confirm and run the next pending item; a declined item is skipped.
   */
  async runNext(): Promise<StepResult> {
    const item = this.queue?.next();
    if (!item) {
      return { status: 'empty' };
    }
    return this.step(item);
  }

  /**
   * Confirm and run the pending item at a 1-based position.
   */
  async runIndex(index: number | string): Promise<StepResult> {
    if (!this.queue) {
      return { status: 'empty' };
    }
    const lookup = this.queue.byIndex(index);
    if (!lookup.ok) {
      return { status: 'error', error: lookup.error };
    }
    return this.step(lookup.item);
  }

  /**
   * Skip the next pending item, or the one at `index`.
   */
  skip(index?: number | string): StepResult {
    if (!this.queue) {
      return { status: 'empty' };
    }
    let item: QueueItem | undefined;
    if (index === undefined) {
      item = this.queue.next();
    } else {
      const lookup = this.queue.byIndex(index);
      if (!lookup.ok) {
        return { status: 'error', error: lookup.error };
      }
      item = lookup.item;
    }
    if (!item) {
      return { status: 'empty' };
    }
    this.queue.skip(item);
    return { status: 'skipped', item };
  }

  /**
   * Run every pending item, asking before each one.
   */
  async runAll(options: { signal?: AbortSignal } = {}): Promise<RunAllSummary | undefined> {
    if (!this.queue) {
      return undefined;
    }
    return this.queue.runAll(this.executor, {
      beforeEach: async (item) => ((await this.executor.confirm(item)) ? 'run' : 'skip'),
      ...(options.signal && { signal: options.signal }),
    });
  }

  private async step(item: QueueItem): Promise<StepResult> {
    const queue = this.queue;
    if (!queue) {
      return { status: 'empty' };
    }
    if (!(await this.executor.confirm(item))) {
      queue.skip(item);
      return { status: 'skipped', item };
    }
    const outcome = await queue.execute(item, this.executor);
    return { status: 'executed', item, outcome };
  }
}
