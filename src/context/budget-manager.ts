/**
 * Context Budget Manager
 *
 * Measures a conversation against the token budget of one outbound
 * request and compacts older turns into a single summary message when the
 * budget runs low. The caller's message list is never mutated; compaction
 * returns a new list that reuses the kept message objects as they are.
 */

import { z } from 'zod';
import { PreconditionError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { contentToText, type ConversationMessage } from '../types.js';
import { HeuristicTokenCounter, type TokenCounter } from './token-counter.js';

// =============================================================================
// CONSTANTS & TYPES
// =============================================================================

export const DEFAULT_MAX_TOKENS = 128_000;
export const DEFAULT_COMPACT_THRESHOLD_PERCENT = 80;
export const DEFAULT_WARN_THRESHOLD_PERCENT = 70;
export const DEFAULT_KEEP_RECENT = 10;

/** Role and formatting overhead added for every message */
export const MESSAGE_OVERHEAD_TOKENS = 4;
/** Images are estimated, not tokenized */
export const IMAGE_TOKENS = 1000;
export const FILE_ESTIMATE_TOKENS = 500;

const SUMMARY_LINE_CHARS = 500;
const SUMMARY_VISIBLE_LINES = 5;

export interface ContextStats {
  totalTokens: number;
  maxTokens: number;
  remainingTokens: number;
  usagePercentage: number;
  messageCount: number;
  shouldCompact: boolean;
  shouldWarn: boolean;
}

export type CompactionEvent =
  | { type: 'compaction.start'; messageCount: number; tokens: number }
  | {
      type: 'compaction.complete';
      tokensBefore: number;
      tokensAfter: number;
      messagesBefore: number;
      messagesAfter: number;
      summarized: number;
    };

export type CompactionListener = (event: CompactionEvent) => void;

export interface ContextBudgetManagerOptions {
  maxTokens?: number;
  compactThresholdPercent?: number;
  warnThresholdPercent?: number;
  keepRecent?: number;
  counter?: TokenCounter;
  logger?: StructuredLogger;
}

export interface PreparedContext {
  messages: ConversationMessage[];
  stats: ContextStats;
  compacted: boolean;
}

const ContentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), mediaType: z.string(), data: z.string() }),
]);

const MessageListSchema = z.array(
  z.object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.union([z.string(), z.array(ContentBlockSchema)]),
  })
);

function assertPercent(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > 100) {
    throw new PreconditionError(`${name} must be within (0, 100], got ${value}`, { [name]: value });
  }
}

function assertKeepRecent(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new PreconditionError(`keepRecent must be a non-negative integer, got ${value}`, { keepRecent: value });
  }
}

// =============================================================================
// MANAGER
// =============================================================================

export class ContextBudgetManager {
  readonly maxTokens: number;
  readonly compactThresholdPercent: number;
  readonly warnThresholdPercent: number;
  readonly keepRecent: number;
  private readonly counter: TokenCounter;
  private readonly logger: StructuredLogger;
  private readonly listeners: CompactionListener[] = [];

  constructor(options: ContextBudgetManagerOptions = {}) {
    const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    if (!Number.isFinite(maxTokens) || maxTokens <= 0) {
      throw new PreconditionError(`maxTokens must be positive, got ${maxTokens}`, { maxTokens });
    }
    this.maxTokens = maxTokens;
    this.compactThresholdPercent = options.compactThresholdPercent ?? DEFAULT_COMPACT_THRESHOLD_PERCENT;
    this.warnThresholdPercent = options.warnThresholdPercent ?? DEFAULT_WARN_THRESHOLD_PERCENT;
    this.keepRecent = options.keepRecent ?? DEFAULT_KEEP_RECENT;
    assertPercent('compactThresholdPercent', this.compactThresholdPercent);
    assertPercent('warnThresholdPercent', this.warnThresholdPercent);
    assertKeepRecent(this.keepRecent);

    this.counter = options.counter ?? new HeuristicTokenCounter();
    this.logger = createComponentLogger('ContextBudgetManager', options.logger);
  }

  // ---------------------------------------------------------------------------
  // Counting
  // ---------------------------------------------------------------------------

  countTokens(text: string): number {
    return this.counter.count(text);
  }

  countMessages(messages: readonly ConversationMessage[]): number {
    this.validate(messages);
    let total = 0;
    for (const message of messages) {
      total += MESSAGE_OVERHEAD_TOKENS;
      if (typeof message.content === 'string') {
        total += this.countTokens(message.content);
        continue;
      }
      for (const block of message.content) {
        total += block.type === 'text' ? this.countTokens(block.text) : IMAGE_TOKENS;
      }
    }
    return total;
  }

  /**
   * Usage of the budget by `messages`. `maxTokens` overrides the
   * configured budget for this call only.
   */
  stats(messages: readonly ConversationMessage[], maxTokens: number = this.maxTokens): ContextStats {
    if (!Number.isFinite(maxTokens) || maxTokens <= 0) {
      throw new PreconditionError(`maxTokens must be positive, got ${maxTokens}`, { maxTokens });
    }
    const totalTokens = this.countMessages(messages);
    const usagePercentage = (totalTokens / maxTokens) * 100;
    return {
      totalTokens,
      maxTokens,
      remainingTokens: Math.max(0, maxTokens - totalTokens),
      usagePercentage,
      messageCount: messages.length,
      shouldCompact: usagePercentage >= this.compactThresholdPercent,
      shouldWarn: usagePercentage >= this.warnThresholdPercent,
    };
  }

  /**
   * Rough cost of content that has not been added yet.
   */
  estimateTokensForContent(content: { text?: string; images?: number; files?: number }): number {
    const text = content.text ? this.countTokens(content.text) : 0;
    return text + (content.images ?? 0) * IMAGE_TOKENS + (content.files ?? 0) * FILE_ESTIMATE_TOKENS;
  }

  // ---------------------------------------------------------------------------
  // Compaction
  // ---------------------------------------------------------------------------

  /**
   * System messages before the recent window stay at the front, the other
   * older messages collapse into one summary, the last `keepRecent`
   * messages follow unchanged. A no-op copy when there is nothing older to
   * summarize.
   */
  compact(messages: readonly ConversationMessage[], keepRecent: number = this.keepRecent): ConversationMessage[] {
    assertKeepRecent(keepRecent);
    this.validate(messages);

    if (messages.length <= keepRecent) {
      return [...messages];
    }

    const tailStart = messages.length - keepRecent;
    const older = messages.slice(0, tailStart);
    const recent = messages.slice(tailStart);
    const systemKept = older.filter((message) => message.role === 'system');
    const summarized = older.filter((message) => message.role !== 'system');

    if (summarized.length === 0) {
      return [...messages];
    }

    const tokensBefore = this.countMessages(messages);
    this.emit({ type: 'compaction.start', messageCount: messages.length, tokens: tokensBefore });
    this.logger.info('Compacting conversation', { messages: messages.length, tokens: tokensBefore });

    let result = [...systemKept, this.summarize(summarized), ...recent];
    if (this.countMessages(result) >= tokensBefore) {
      // tiny turns can cost less than their summary
      result = [...systemKept, ...recent];
    }

    const tokensAfter = this.countMessages(result);
    this.emit({
      type: 'compaction.complete',
      tokensBefore,
      tokensAfter,
      messagesBefore: messages.length,
      messagesAfter: result.length,
      summarized: summarized.length,
    });
    this.logger.info('Compaction complete', {
      tokensBefore,
      tokensAfter,
      messagesBefore: messages.length,
      messagesAfter: result.length,
    });
    return result;
  }

  /**
   * Stats for the outbound list, compacting first when auto-compact is on
   * and the compact threshold has been reached.
   */
  prepare(messages: readonly ConversationMessage[], options: { autoCompact?: boolean } = {}): PreparedContext {
    const stats = this.stats(messages);
    if (!(options.autoCompact ?? true) || !stats.shouldCompact) {
      if (stats.shouldWarn) {
        this.logger.warn('Context usage high', { usage: stats.usagePercentage.toFixed(1) });
      }
      return { messages: [...messages], stats, compacted: false };
    }

    const compacted = this.compact(messages);
    const changed = compacted.length !== messages.length || compacted.some((message, i) => message !== messages[i]);
    return { messages: compacted, stats: this.stats(compacted), compacted: changed };
  }

  private summarize(messages: readonly ConversationMessage[]): ConversationMessage {
    const lines = messages.map((message) => {
      const text = contentToText(message.content);
      const truncated = text.length > SUMMARY_LINE_CHARS ? `${text.slice(0, SUMMARY_LINE_CHARS)}...` : text;
      return `${message.role}: ${truncated}`;
    });

    let summary = `[Previous conversation summary - ${messages.length} messages]\n`;
    summary += lines.slice(0, SUMMARY_VISIBLE_LINES).join('\n');
    if (lines.length > SUMMARY_VISIBLE_LINES) {
      summary += `\n... and ${lines.length - SUMMARY_VISIBLE_LINES} more messages`;
    }
    return { role: 'system', content: summary };
  }

  // ---------------------------------------------------------------------------
  // Display
  // ---------------------------------------------------------------------------

  formatStatus(stats: ContextStats): string {
    return (
      `${stats.totalTokens.toLocaleString('en-US')}/${stats.maxTokens.toLocaleString('en-US')} tokens ` +
      `(${stats.usagePercentage.toFixed(1)}% used, ${stats.remainingTokens.toLocaleString('en-US')} remaining)`
    );
  }

  autoCompactStatus(enabled: boolean, stats: ContextStats): string {
    if (!enabled) {
      return 'Auto-compact: Disabled';
    }
    if (stats.shouldCompact) {
      return `Auto-compact: Ready to trigger (>${this.compactThresholdPercent.toFixed(0)}% full)`;
    }
    const threshold = Math.floor((stats.maxTokens * this.compactThresholdPercent) / 100);
    return `Auto-compact: Enabled (triggers in ~${(threshold - stats.totalTokens).toLocaleString('en-US')} tokens)`;
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  on(listener: CompactionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  private emit(event: CompactionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn('Compaction listener threw', {
          event: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private validate(messages: readonly ConversationMessage[]): void {
    const result = MessageListSchema.safeParse(messages);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? issue.path.join('.') : '';
      throw new PreconditionError(`Invalid message list${where ? ` at ${where}` : ''}: ${issue?.message ?? 'unknown'}`, {
        issues: result.error.issues.length,
      });
    }
  }
}
