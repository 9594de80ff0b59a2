/**
 * Structured action parser tests.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ACTION_MARKUP_EXAMPLE } from '../../src/actions/prompt.js';
import {
  ACTIONS_PLACEHOLDER,
  StructuredActionParser,
  parseActions,
} from '../../src/actions/structured-parser.js';
import { FileSink, MemorySink, StructuredLogger, createSilentLogger } from '../../src/integrations/utilities/logger.js';

const command = (cmd: string, description = ''): string =>
  `<action type="command"><description>${description}</description><command>${cmd}</command></action>`;

const file = (path: string, content: string, attrs = ''): string =>
  `<action type="file"${attrs}><description>write ${path}</description><path>${path}</path>` +
  `<content><![CDATA[${content}]]></content></action>`;

describe('StructuredActionParser', () => {
  const parser = new StructuredActionParser({ logger: createSilentLogger() });

  it('should parse a single command block', () => {
    const text =
      '<actions><action type="command"><description>make dir</description>' +
      '<command>mkdir -p foo</command></action></actions>';

    const result = parser.extract(text);

    expect(result.actions).toEqual([{ kind: 'command', description: 'make dir', command: 'mkdir -p foo' }]);
    expect(result.remainingText).toBe(ACTIONS_PLACEHOLDER);
    expect(result.blockCount).toBe(1);
    expect(result.failedBlocks).toEqual([]);
  });

  it('should return actions from every block in document order', () => {
    const text = [
      'Intro',
      `<actions>${command('mkdir -p src')}${file('src/a.ts', 'export {};')}</actions>`,
      'Middle',
      `<actions>${command('npm test')}</actions>`,
      'End',
    ].join('\n');

    const result = parser.extract(text);

    expect(result.actions.map((a) => (a.kind === 'command' ? a.command : a.path))).toEqual([
      'mkdir -p src',
      'src/a.ts',
      'npm test',
    ]);
    expect(result.remainingText).toBe(`Intro\n${ACTIONS_PLACEHOLDER}\nMiddle\n${ACTIONS_PLACEHOLDER}\nEnd`);
    expect(result.remainingText).not.toContain('<actions>');
  });

  it('should keep file content verbatim apart from surrounding whitespace', () => {
    const content = '\nif (a < b && c) {\n  print("<tag>");\n}\n';
    const [action] = parser.extract(`<actions>${file('main.js', content)}</actions>`).actions;

    expect(action).toEqual({
      kind: 'file',
      description: 'write main.js',
      path: 'main.js',
      content: 'if (a < b && c) {\n  print("<tag>");\n}',
      op: 'create',
    });
  });

  it('should skip a malformed block and still parse its sibling', () => {
    const text =
      '<actions><action type="command"><command>ls</action></actions>\n' +
      `<actions>${command('pwd', 'where am I')}</actions>`;

    const result = parser.extract(text);

    expect(result.actions).toEqual([{ kind: 'command', description: 'where am I', command: 'pwd' }]);
    expect(result.failedBlocks).toEqual([0]);
    expect(result.remainingText).toBe(`${ACTIONS_PLACEHOLDER}\n${ACTIONS_PLACEHOLDER}`);
  });

  it('should log a warning naming the skipped block', () => {
    const sink = new MemorySink();
    const logged = new StructuredActionParser({ logger: new StructuredLogger({ level: 'warn', sinks: [sink] }) });

    logged.extract(`<actions>${command('ok')}</actions><actions><action></actions>`);

    const [entry] = sink.getEntries();
    expect(entry?.message).toBe('Skipping malformed actions block');
    expect(entry?.data).toMatchObject({ component: 'StructuredActionParser', block: 1 });
  });

  it('should still skip a malformed block when the log file cannot be written', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'stepwright-parser-'));
    try {
      await writeFile(join(dir, 'blocker'), 'not a directory', 'utf-8');
      const broken = new StructuredActionParser({
        logger: new StructuredLogger({ level: 'debug', sinks: [new FileSink(join(dir, 'blocker', 'logs', 'x.log'))] }),
      });

      const result = broken.extract(`<actions><action type="command"></actions><actions>${command('ls')}</actions>`);

      expect(result.failedBlocks).toEqual([0]);
      expect(result.actions).toEqual([{ kind: 'command', description: '', command: 'ls' }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should drop an incomplete action but keep the rest of its block', () => {
    const text = `<actions><action type="command"><description>nothing</description></action>${command('ls')}</actions>`;
    expect(parser.extract(text).actions).toEqual([{ kind: 'command', description: '', command: 'ls' }]);
  });

  it('should ignore actions of unknown type', () => {
    const text = `<actions><action type="browse"><url>x</url></action>${command('ls')}</actions>`;
    expect(parser.extract(text).actions).toHaveLength(1);
  });

  it('should read the op attribute of file actions', () => {
    const [action] = parser.extract(`<actions>${file('a.txt', 'new', ' op="modify"')}</actions>`).actions;
    expect(action).toMatchObject({ kind: 'file', op: 'modify', content: 'new' });
  });

  it('should drop file actions with an unknown op', () => {
    expect(parser.extract(`<actions>${file('a.txt', 'x', ' op="rename"')}</actions>`).actions).toEqual([]);
  });

  it('should accept delete actions without content', () => {
    const [action] = parser.extract('<actions><action type="delete"><path>old.txt</path></action></actions>').actions;
    expect(action).toEqual({ kind: 'file', description: '', path: 'old.txt', content: '', op: 'delete' });
  });

  it('should drop file actions without content', () => {
    const text = '<actions><action type="file"><path>a.txt</path></action></actions>';
    expect(parser.extract(text).actions).toEqual([]);
  });

  it('should return text untouched when there are no blocks', () => {
    const text = '  Just prose, with <b>markup</b> that is not an action.  ';
    expect(parser.extract(text)).toEqual({ actions: [], remainingText: text, blockCount: 0, failedBlocks: [] });
  });

  it('should replace a block even when it holds no valid actions', () => {
    const result = parser.extract('Before <actions>nothing here</actions> after');
    expect(result.actions).toEqual([]);
    expect(result.blockCount).toBe(1);
    expect(result.remainingText).toBe(`Before ${ACTIONS_PLACEHOLDER} after`);
  });

  it('should freeze parsed actions', () => {
    const [action] = parser.extract(`<actions>${command('ls')}</actions>`).actions;
    expect(Object.isFrozen(action)).toBe(true);
  });

  it('should understand the example given to the model', () => {
    const [actions] = parseActions(ACTION_MARKUP_EXAMPLE, { logger: createSilentLogger() });
    expect(actions).toEqual([
      { kind: 'command', description: 'What this command does', command: 'the bash command' },
      {
        kind: 'file',
        description: 'What this file is for',
        path: 'relative/path/to/file',
        content: 'file content here',
        op: 'create',
      },
    ]);
  });
});

describe('parseActions', () => {
  it('should return actions and cleaned text as a pair', () => {
    const [actions, cleaned] = parseActions(`Do this:\n<actions>${command('ls')}</actions>`, {
      logger: createSilentLogger(),
    });
    expect(actions).toHaveLength(1);
    expect(cleaned).toBe(`Do this:\n${ACTIONS_PLACEHOLDER}`);
  });
});
