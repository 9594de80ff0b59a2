/**
 * Anthropic Provider Adapter
 *
 * Messages API over fetch. Image blocks are sent as base64 sources; the
 * system prompt travels in the top-level `system` field.
 */

import { z } from 'zod';
import { ProviderError } from '../../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../../integrations/utilities/logger.js';
import { contentToText, type ConversationMessage } from '../../types.js';
import { hasEnv, registerProvider, requireEnv } from '../provider.js';
import { isResilientFetchError, resilientFetch, type NetworkConfig } from '../resilient-fetch.js';
import type { AnthropicConfig, FetchLike, LLMProvider, SendOptions } from '../types.js';

// =============================================================================
// ANTHROPIC API TYPES
// =============================================================================

type AnthropicContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string | AnthropicContentBlock[];
}

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

// =============================================================================
// ANTHROPIC PROVIDER
// =============================================================================

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel = 'claude-sonnet-4-20250514';

  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly networkConfig: NetworkConfig;
  private readonly fetchImpl?: FetchLike;
  private readonly logger: StructuredLogger;

  constructor(config: AnthropicConfig = {}) {
    this.apiKey = config.apiKey ?? requireEnv('ANTHROPIC_API_KEY', 'anthropic');
    this.model = config.model ?? this.defaultModel;
    this.baseUrl = config.baseUrl ?? 'https://api.anthropic.com';
    this.networkConfig = config.network ?? {
      timeout: 120000,
      maxRetries: 3,
      baseRetryDelay: 1000,
    };
    this.fetchImpl = config.fetchImpl;
    this.logger = createComponentLogger('AnthropicProvider', config.logger);
  }

  isConfigured(): boolean {
    return this.apiKey.trim() !== '';
  }

  async sendMessage(messages: ConversationMessage[], systemPrompt: string, options: SendOptions = {}): Promise<string> {
    // system messages in the history (compaction summaries) join the system prompt
    const systemParts = [
      systemPrompt,
      ...messages.filter((m) => m.role === 'system').map((m) => contentToText(m.content)),
    ].filter((part) => part.trim() !== '');

    const body = {
      model: options.model ?? this.model,
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature ?? 0.7,
      ...(systemParts.length > 0 && { system: systemParts.join('\n\n') }),
      messages: toAnthropicMessages(messages),
    };

    let response: Response;
    try {
      ({ response } = await resilientFetch({
        url: `${this.baseUrl}/v1/messages`,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.apiKey,
            'anthropic-version': '2023-06-01',
          },
          body: JSON.stringify(body),
        },
        providerName: this.name,
        networkConfig: this.networkConfig,
        ...(options.signal && { signal: options.signal }),
        ...(this.fetchImpl && { fetchImpl: this.fetchImpl }),
        onRetry: (attempt, delay, error) => {
          this.logger.warn('Retrying request', { attempt, delayMs: Math.round(delay), error: error.message });
        },
      }));
    } catch (error) {
      throw this.toProviderError(error);
    }

    if (!response.ok) {
      throw ProviderError.fromStatus(this.name, response.status, await response.text());
    }

    const parsed = AnthropicResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Unexpected response shape from Anthropic', this.name, 'UNKNOWN', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const { data } = parsed;
    if (data.usage) {
      this.logger.debug('Request complete', {
        inputTokens: data.usage.input_tokens,
        outputTokens: data.usage.output_tokens,
        stopReason: data.stop_reason,
      });
    }

    return data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
  }

  private toProviderError(error: unknown): ProviderError {
    if (error instanceof ProviderError) return error;
    if (isResilientFetchError(error)) {
      if (error.status !== undefined) {
        return ProviderError.fromStatus(this.name, error.status, error.message);
      }
      return new ProviderError(
        `Anthropic request failed: ${error.message}`,
        this.name,
        'NETWORK_ERROR',
        { attempts: error.attempts, timeout: error.isTimeout, cancelled: error.isCancelled },
        error
      );
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return new ProviderError(`Anthropic request failed: ${cause.message}`, this.name, 'NETWORK_ERROR', {}, cause);
  }
}

/** Stands in for the turns a compaction summary replaced. */
export const HISTORY_PLACEHOLDER = '(Earlier conversation is summarised in the system prompt.)';

/**
 * Drop system messages and merge consecutive same-role turns, which the
 * Messages API rejects. The list must also open with a user turn; a
 * compacted history that starts on an assistant turn gets a placeholder.
 */
export function toAnthropicMessages(messages: readonly ConversationMessage[]): AnthropicMessage[] {
  const result: AnthropicMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system') continue;

    const blocks: AnthropicContentBlock[] =
      typeof message.content === 'string'
        ? [{ type: 'text', text: message.content }]
        : message.content.map((block): AnthropicContentBlock =>
            block.type === 'text'
              ? { type: 'text', text: block.text }
              : { type: 'image', source: { type: 'base64', media_type: block.mediaType, data: block.data } }
          );

    const previous = result[result.length - 1];
    if (previous && previous.role === message.role) {
      const existing: AnthropicContentBlock[] =
        typeof previous.content === 'string' ? [{ type: 'text', text: previous.content }] : previous.content;
      previous.content = [...existing, ...blocks];
      continue;
    }

    const [first] = blocks;
    const onlyText = blocks.length === 1 && first?.type === 'text' ? first.text : undefined;
    if (result.length === 0 && message.role === 'assistant') {
      result.push({ role: 'user', content: HISTORY_PLACEHOLDER });
    }
    result.push({ role: message.role, content: onlyText ?? blocks });
  }

  return result;
}

// =============================================================================
// REGISTRATION
// =============================================================================

registerProvider('anthropic', {
  priority: 1,
  detect: () => hasEnv('ANTHROPIC_API_KEY'),
  create: (options) => new AnthropicProvider({ ...options }),
});
