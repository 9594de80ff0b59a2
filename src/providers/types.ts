/**
 * Provider Types
 *
 * The one call the orchestrator makes to a model: a message list and a
 * system prompt in, response text out.
 */

import type { StructuredLogger } from '../integrations/utilities/logger.js';
import type { ConversationMessage } from '../types.js';
import type { NetworkConfig } from './resilient-fetch.js';

/**
 * Options for a single request.
 */
export interface SendOptions {
  /** Model override (uses the provider's configured model if not specified) */
  model?: string;

  /** Maximum tokens to generate */
  maxTokens?: number;

  /** Temperature for randomness (0-2) */
  temperature?: number;

  signal?: AbortSignal;
}

export interface LLMProvider {
  /** Provider name for logging/debugging */
  readonly name: string;

  /** Model used when a request names none */
  readonly defaultModel: string;

  /**
   * Send the conversation and return the assistant's text. Failures are
   * thrown as ProviderError.
   */
  sendMessage(messages: ConversationMessage[], systemPrompt: string, options?: SendOptions): Promise<string>;

  isConfigured(): boolean;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AnthropicConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  network?: NetworkConfig;
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
}

export interface ProviderCreateOptions {
  model?: string;
  logger?: StructuredLogger;
}
