import { describe, expect, it } from 'vitest';
import {
  REFORMAT_EXCERPT_CHARS,
  STRUCTURED_ACTION_PROMPT,
  baseSystemPrompt,
  buildReformatPrompt,
  enhanceSystemPrompt,
} from '../../src/actions/prompt.js';
import { parseActions } from '../../src/actions/structured-parser.js';
import { createSilentLogger } from '../../src/integrations/utilities/logger.js';

describe('system prompts', () => {
  it('should include the date in the base prompt', () => {
    expect(baseSystemPrompt(new Date(2026, 0, 5))).toContain("Today's date is January 5, 2026.");
  });

  it('should append the action contract', () => {
    expect(enhanceSystemPrompt('Base.')).toBe(`Base.\n\n${STRUCTURED_ACTION_PROMPT}`);
  });

  it('should carry an example the parser accepts', () => {
    const [actions] = parseActions(STRUCTURED_ACTION_PROMPT, { logger: createSilentLogger() });

    expect(actions).toEqual([
      { kind: 'command', description: 'Create directory structure', command: 'mkdir -p web/src web/public' },
      {
        kind: 'file',
        description: 'Create package.json',
        path: 'web/package.json',
        content: '{\n  "name": "web",\n  "version": "0.1.0"\n}',
        op: 'create',
      },
    ]);
  });
});

describe('buildReformatPrompt', () => {
  it('should quote the original answer', () => {
    expect(buildReformatPrompt('make a file')).toContain('---\nmake a file\n---');
  });

  it('should cut long answers short', () => {
    const prompt = buildReformatPrompt(`${'a'.repeat(REFORMAT_EXCERPT_CHARS)}TAIL`);
    expect(prompt).toContain('a'.repeat(REFORMAT_EXCERPT_CHARS));
    expect(prompt).not.toContain('TAIL');
  });
});
