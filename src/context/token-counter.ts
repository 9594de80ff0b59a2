/**
 * Token Counting
 *
 * Two interchangeable counters behind one interface. The heuristic one is
 * an approximation (a quarter token per character) and callers must not
 * treat it as exact. The encoder-backed one wraps any tokenizer and falls
 * back to the heuristic the first time the tokenizer fails.
 */

import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';

export const TOKENS_PER_CHAR = 0.25;

export interface TokenCounter {
  readonly name: string;
  count(text: string): number;
}

/**
 * Character-count estimate, `floor(length * 0.25)`.
 */
export class HeuristicTokenCounter implements TokenCounter {
  readonly name = 'heuristic';

  count(text: string): number {
    return Math.floor(text.length * TOKENS_PER_CHAR);
  }
}

/** Any tokenizer that turns text into a token sequence */
export type Encoder = (text: string) => ArrayLike<number>;

export interface EncoderTokenCounterOptions {
  name?: string;
  logger?: StructuredLogger;
}

export class EncoderTokenCounter implements TokenCounter {
  readonly name: string;
  private readonly fallback = new HeuristicTokenCounter();
  private readonly logger: StructuredLogger;
  private degraded = false;

  constructor(
    private readonly encode: Encoder,
    options: EncoderTokenCounterOptions = {}
  ) {
    this.name = options.name ?? 'encoder';
    this.logger = createComponentLogger('TokenCounter', options.logger);
  }

  /** True once the encoder has failed and counting is heuristic */
  get isDegraded(): boolean {
    return this.degraded;
  }

  count(text: string): number {
    if (this.degraded) {
      return this.fallback.count(text);
    }
    try {
      return this.encode(text).length;
    } catch (error) {
      this.degraded = true;
      this.logger.warn('Tokenizer failed, falling back to character estimate', {
        counter: this.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback.count(text);
    }
  }
}

/**
 * Encoder-backed counter when an encoder is supplied, heuristic otherwise.
 */
export function createTokenCounter(encode?: Encoder, options?: EncoderTokenCounterOptions): TokenCounter {
  return encode ? new EncoderTokenCounter(encode, options) : new HeuristicTokenCounter();
}
