import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProviderError } from '../../src/errors/index.js';
import { createSilentLogger } from '../../src/integrations/utilities/logger.js';
import { AnthropicProvider, HISTORY_PLACEHOLDER, toAnthropicMessages } from '../../src/providers/adapters/anthropic.js';
import type { FetchLike } from '../../src/providers/types.js';

function provider(fetchImpl: FetchLike): AnthropicProvider {
  return new AnthropicProvider({
    apiKey: 'test-key',
    fetchImpl,
    network: { maxRetries: 1, timeout: 1000 },
    logger: createSilentLogger(),
  });
}

const reply = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

describe('AnthropicProvider', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should post the conversation to the Messages API', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => reply({ content: [{ type: 'text', text: 'hi' }] }));

    await provider(fetchImpl).sendMessage(
      [
        { role: 'system', content: 'summary of earlier turns' },
        { role: 'user', content: 'hello' },
      ],
      'Be brief.',
      { model: 'test-model', maxTokens: 100, temperature: 0 }
    );

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    const headers = new Headers(init?.headers);
    expect(headers.get('x-api-key')).toBe('test-key');
    expect(headers.get('anthropic-version')).toBe('2023-06-01');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      max_tokens: 100,
      temperature: 0,
      system: 'Be brief.\n\nsummary of earlier turns',
      messages: [{ role: 'user', content: 'hello' }],
    });
  });

  it('should flatten block-form system messages line by line', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => reply({ content: [{ type: 'text', text: 'ok' }] }));

    await provider(fetchImpl).sendMessage(
      [
        {
          role: 'system',
          content: [
            { type: 'text', text: 'first note' },
            { type: 'text', text: 'second note' },
          ],
        },
        { role: 'user', content: 'hello' },
      ],
      'Be brief.'
    );

    const [, init] = fetchImpl.mock.calls[0] ?? [];
    expect(JSON.parse(String(init?.body)).system).toBe('Be brief.\n\nfirst note\nsecond note');
  });

  it('should join the text blocks of the reply', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () =>
      reply({
        content: [
          { type: 'text', text: 'Hello' },
          { type: 'tool_use', id: 'call-1' },
          { type: 'text', text: ' there' },
        ],
        stop_reason: 'end_turn',
        usage: { input_tokens: 10, output_tokens: 2 },
      })
    );

    expect(await provider(fetchImpl).sendMessage([{ role: 'user', content: 'hi' }], '')).toBe('Hello there');
  });

  it('should map HTTP errors onto provider error codes', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('bad key', { status: 401 }));

    const error = await provider(fetchImpl)
      .sendMessage([{ role: 'user', content: 'hi' }], '')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'anthropic API error (401): bad key',
      code: 'AUTHENTICATION_FAILED',
      statusCode: 401,
    });
  });

  it('should report server errors once retries run out', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('', { status: 500 }));

    const error = await provider(fetchImpl)
      .sendMessage([{ role: 'user', content: 'hi' }], '')
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ code: 'SERVER_ERROR', statusCode: 500 });
  });

  it('should report network failures', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(provider(fetchImpl).sendMessage([{ role: 'user', content: 'hi' }], '')).rejects.toThrow(
      'Anthropic request failed: anthropic network error after 1 attempts: fetch failed'
    );
  });

  it('should reject replies of the wrong shape', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => reply({ unexpected: true }));

    await expect(provider(fetchImpl).sendMessage([{ role: 'user', content: 'hi' }], '')).rejects.toThrow(
      'Unexpected response shape from Anthropic'
    );
  });

  it('should need an API key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    expect(() => new AnthropicProvider()).toThrow('Missing required environment variable: ANTHROPIC_API_KEY');
  });
});

describe('toAnthropicMessages', () => {
  it('should merge consecutive turns of the same role', () => {
    expect(
      toAnthropicMessages([
        { role: 'user', content: 'one' },
        { role: 'system', content: 'dropped' },
        { role: 'user', content: 'two' },
        { role: 'assistant', content: 'three' },
      ])
    ).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'one' },
          { type: 'text', text: 'two' },
        ],
      },
      { role: 'assistant', content: 'three' },
    ]);
  });

  it('should open a compacted history with a user turn', () => {
    expect(
      toAnthropicMessages([
        { role: 'system', content: 'summary' },
        { role: 'assistant', content: 'earlier answer' },
        { role: 'user', content: 'next question' },
      ])
    ).toEqual([
      { role: 'user', content: HISTORY_PLACEHOLDER },
      { role: 'assistant', content: 'earlier answer' },
      { role: 'user', content: 'next question' },
    ]);
  });

  it('should convert images to base64 sources', () => {
    expect(
      toAnthropicMessages([
        {
          role: 'user',
          content: [
            { type: 'image', mediaType: 'image/png', data: 'AAAA' },
            { type: 'text', text: 'what is this?' },
          ],
        },
      ])
    ).toEqual([
      {
        role: 'user',
        content: [
          { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'AAAA' } },
          { type: 'text', text: 'what is this?' },
        ],
      },
    ]);
  });
});
