import { describe, expect, it, vi } from 'vitest';
import {
  ConfirmationPolicy,
  buildPreview,
  parseConfirmationAnswer,
  truncatePreview,
  type ConfirmationChoice,
  type ConfirmationRequest,
} from '../../src/actions/confirmation.js';
import { ActionQueue } from '../../src/actions/queue.js';
import { commandAction, fileAction, type Action, type QueueItem } from '../../src/actions/types.js';
import { MemorySink, StructuredLogger, createSilentLogger } from '../../src/integrations/utilities/logger.js';

function itemFor(action: Action): QueueItem {
  const [item] = new ActionQueue([action], { logger: createSilentLogger() }).list();
  if (!item) throw new Error('queue is empty');
  return item;
}

function answering(...choices: ConfirmationChoice[]) {
  const ask = vi.fn(async (_request: ConfirmationRequest): Promise<ConfirmationChoice> => choices.shift() ?? 'no');
  return { prompter: { ask }, ask };
}

describe('parseConfirmationAnswer', () => {
  it('should treat empty input as yes', () => {
    expect(parseConfirmationAnswer('')).toBe('yes');
    expect(parseConfirmationAnswer('  ')).toBe('yes');
  });

  it('should accept words, letters and menu numbers', () => {
    expect(parseConfirmationAnswer(' Y ')).toBe('yes');
    expect(parseConfirmationAnswer('1')).toBe('yes');
    expect(parseConfirmationAnswer('A')).toBe('always');
    expect(parseConfirmationAnswer('2')).toBe('always');
    expect(parseConfirmationAnswer('no')).toBe('no');
    expect(parseConfirmationAnswer('3')).toBe('no');
  });

  it('should return undefined for anything else', () => {
    expect(parseConfirmationAnswer('maybe')).toBeUndefined();
    expect(parseConfirmationAnswer('4')).toBeUndefined();
  });
});

describe('truncatePreview', () => {
  const numbered = (count: number) => Array.from({ length: count }, (_, i) => `l${i + 1}`);

  it('should keep up to 20 lines as they are', () => {
    const text = numbered(20).join('\n');
    expect(truncatePreview(text)).toBe(text);
  });

  it('should keep the first 10 and last 5 of longer text', () => {
    const result = truncatePreview(numbered(25).join('\n')).split('\n');

    expect(result).toHaveLength(16);
    expect(result.slice(0, 10)).toEqual(numbered(10));
    expect(result[10]).toBe('... (10 lines hidden) ...');
    expect(result.slice(11)).toEqual(['l21', 'l22', 'l23', 'l24', 'l25']);
  });
});

describe('buildPreview', () => {
  it('should show commands with a prompt sign', () => {
    expect(buildPreview(itemFor(commandAction('npm test')))).toBe('$ npm test');
  });

  it('should show new file content', () => {
    expect(buildPreview(itemFor(fileAction('a.txt', 'hello')))).toBe('hello');
  });

  it('should name deletes', () => {
    expect(buildPreview(itemFor(fileAction('a.txt', '', { op: 'delete' })))).toBe('delete a.txt');
  });

  it('should say when an existing file would not change', () => {
    expect(buildPreview(itemFor(fileAction('a.txt', 'same')), 'same')).toBe('a.txt is unchanged');
  });

  it('should diff against existing content', () => {
    const preview = buildPreview(itemFor(fileAction('a.txt', 'one\nthree\n', { op: 'modify' })), 'one\ntwo\n');

    expect(preview.split('\n')).toContain('-two');
    expect(preview.split('\n')).toContain('+three');
    expect(preview).toContain('--- a.txt\tcurrent');
  });
});

describe('ConfirmationPolicy', () => {
  it('should approve everything with autoConfirm', async () => {
    const { prompter, ask } = answering();
    const policy = new ConfirmationPolicy({ prompter, autoConfirm: true, logger: createSilentLogger() });

    expect(await policy.confirm(itemFor(commandAction('ls')), '$ ls')).toBe(true);
    expect(ask).not.toHaveBeenCalled();
  });

  it('should pass the preview to the prompter', async () => {
    const { prompter, ask } = answering('yes');
    const policy = new ConfirmationPolicy({ prompter, logger: createSilentLogger() });
    const item = itemFor(commandAction('ls'));

    await policy.confirm(item, '$ ls');

    expect(ask).toHaveBeenCalledWith({ item, preview: '$ ls' });
  });

  it('should decline on no', async () => {
    const { prompter } = answering('no');
    const policy = new ConfirmationPolicy({ prompter, logger: createSilentLogger() });
    expect(await policy.confirm(itemFor(commandAction('ls')), '$ ls')).toBe(false);
  });

  it('should remember always for the same kind only', async () => {
    const { prompter, ask } = answering('always', 'no');
    const policy = new ConfirmationPolicy({ prompter, logger: createSilentLogger() });

    expect(await policy.confirm(itemFor(commandAction('ls')), '')).toBe(true);
    expect(await policy.confirm(itemFor(commandAction('pwd')), '')).toBe(true);
    expect(await policy.confirm(itemFor(fileAction('a.txt', 'x')), '')).toBe(false);

    expect(ask).toHaveBeenCalledTimes(2);
    expect(policy.isRemembered('command')).toBe(true);
    expect(policy.isRemembered('file')).toBe(false);
  });

  it('should forget remembered approvals on reset', async () => {
    const { prompter, ask } = answering('always', 'yes');
    const policy = new ConfirmationPolicy({ prompter, logger: createSilentLogger() });

    await policy.confirm(itemFor(commandAction('ls')), '');
    policy.reset();
    await policy.confirm(itemFor(commandAction('ls')), '');

    expect(ask).toHaveBeenCalledTimes(2);
  });

  it('should decline and warn without a prompter', async () => {
    const sink = new MemorySink();
    const policy = new ConfirmationPolicy({ logger: new StructuredLogger({ level: 'warn', sinks: [sink] }) });

    expect(await policy.confirm(itemFor(commandAction('ls')), '')).toBe(false);
    expect(sink.getEntries()[0]?.message).toBe('No confirmation prompter configured; declining');
  });
});
