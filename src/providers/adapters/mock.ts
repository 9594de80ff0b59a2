/**
 * Mock Provider
 *
 * Scripted responses for tests and offline demos. Queued responses are
 * returned first, in order; after that the last user message is matched
 * against a few demo scenarios.
 */

import { contentToText, type ConversationMessage } from '../../types.js';
import { registerProvider } from '../provider.js';
import type { LLMProvider, ProviderCreateOptions, SendOptions } from '../types.js';

// =============================================================================
// MOCK RESPONSE PATTERNS
// =============================================================================

interface MockScenario {
  trigger: RegExp;
  response: string;
}

const SCENARIOS: MockScenario[] = [
  {
    trigger: /hello\s*world/i,
    response: `I'll create a hello world script.

<actions>
<action type="command">
<description>Create the source directory</description>
<command>mkdir -p src</command>
</action>
<action type="file">
<description>Hello world entry point</description>
<path>src/hello.ts</path>
<content><![CDATA[console.log('Hello, World!');
]]></content>
</action>
</actions>

Run it with \`npx tsx src/hello.ts\`.`,
  },
  {
    trigger: /list|show.*files/i,
    response: `<actions>
<action type="command">
<description>List files</description>
<command>ls -la</command>
</action>
</actions>`,
  },
];

export interface RecordedCall {
  messages: ConversationMessage[];
  systemPrompt: string;
  options?: SendOptions;
}

export interface MockProviderOptions extends ProviderCreateOptions {
  /** Returned in order before any scenario matching; an Error is thrown instead */
  responses?: Array<string | Error>;
}

// =============================================================================
// MOCK PROVIDER
// =============================================================================

export class MockProvider implements LLMProvider {
  readonly name = 'mock';
  readonly defaultModel = 'mock-model';

  private readonly queued: Array<string | Error>;
  private readonly calls: RecordedCall[] = [];

  constructor(options: MockProviderOptions = {}) {
    this.queued = [...(options.responses ?? [])];
  }

  isConfigured(): boolean {
    return true;
  }

  async sendMessage(messages: ConversationMessage[], systemPrompt: string, options?: SendOptions): Promise<string> {
    this.calls.push({ messages: [...messages], systemPrompt, ...(options && { options }) });

    const next = this.queued.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next !== undefined) {
      return next;
    }

    const lastUser = [...messages].reverse().find((m) => m.role === 'user');
    const content = lastUser ? contentToText(lastUser.content) : '';
    const scenario = SCENARIOS.find((s) => s.trigger.test(content));
    if (scenario) {
      return scenario.response;
    }

    return `I understand. The task appears to be: ${content.slice(0, 50)}

Is there anything specific you'd like me to clarify?`;
  }

  /**
   * Append scripted responses.
   */
  enqueue(...responses: Array<string | Error>): void {
    this.queued.push(...responses);
  }

  getCalls(): readonly RecordedCall[] {
    return this.calls;
  }

  getCallCount(): number {
    return this.calls.length;
  }

  reset(): void {
    this.queued.length = 0;
    this.calls.length = 0;
  }
}

// =============================================================================
// REGISTRATION
// =============================================================================

registerProvider('mock', {
  priority: 100, // only used when nothing else is configured
  detect: () => true,
  create: (options) => new MockProvider(options),
});
