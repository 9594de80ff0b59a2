import { Chalk } from 'chalk';
import { describe, expect, it } from 'vitest';
import { progressBar, renderQueue, summarizeQueue } from '../../src/actions/display.js';
import { ActionQueue } from '../../src/actions/queue.js';
import { commandAction, fileAction } from '../../src/actions/types.js';
import { createSilentLogger } from '../../src/integrations/utilities/logger.js';

const plain = new Chalk({ level: 0 });

function makeQueue(): ActionQueue {
  return new ActionQueue([commandAction('ls', 'list'), fileAction('a.ts', 'x\ny', { language: 'typescript' })], {
    logger: createSilentLogger(),
  });
}

describe('progressBar', () => {
  it('should fill proportionally', () => {
    expect(progressBar(1, 2, 10)).toBe('█████░░░░░');
    expect(progressBar(0, 0, 4)).toBe('░░░░');
    expect(progressBar(3, 3, 4)).toBe('████');
  });
});

describe('renderQueue', () => {
  it('should render nothing for an empty queue', () => {
    expect(renderQueue([], { chalk: plain })).toEqual([]);
  });

  it('should list pending items with previews and a next hint', () => {
    expect(renderQueue(makeQueue().list(), { chalk: plain })).toEqual([
      'Action Queue',
      '',
      'Progress: [░░░░░░░░░░░░░░░░░░░░] 0/2 completed',
      '1. ● list: ls',
      '   └─ Will execute: $ ls',
      '2. ● Create a.ts',
      '   └─ Will write 2 lines of typescript',
      '',
      'Next action ready:',
      '  → Execute command: ls',
      '    list',
      '',
      'Press Enter to review and execute action #1',
      'Or type a command (e.g. /skip, /run-all, /help)',
    ]);
  });

  it('should show errors under failed items', async () => {
    const queue = makeQueue();
    await queue.executeNext({ run: async () => ({ success: false, output: '', durationMs: 1 }) });

    const lines = renderQueue(queue.list(), { chalk: plain, showPreview: false });

    expect(lines.slice(2, 7)).toEqual([
      'Progress: [░░░░░░░░░░░░░░░░░░░░] 0/2 completed',
      '1 failed',
      '1. ✗ list: ls',
      '   └─ Error: Action failed',
      '2. ● Create a.ts',
    ]);
    expect(lines).toContain('  → Create file: a.ts');
    expect(lines).toContain('Press Enter to review and execute action #2');
  });

  it('should drop the hint once nothing is pending', () => {
    const queue = makeQueue();
    for (const item of queue.list()) queue.skip(item);

    const lines = renderQueue(queue.list(), { chalk: plain });

    expect(lines).toEqual([
      'Action Queue',
      '',
      'Progress: [████████████████████] 2/2 completed',
      '1. ✓ list: ls',
      '2. ✓ Create a.ts',
    ]);
  });
});

describe('summarizeQueue', () => {
  it('should count items by status', () => {
    const queue = makeQueue();
    const [first] = queue.list();
    if (first) queue.skip(first);

    expect(summarizeQueue(queue.list())).toBe('2 actions: 1 completed, 0 failed, 1 pending');
    expect(summarizeQueue([])).toBe('No actions queued');
  });
});
