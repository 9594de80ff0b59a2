/**
 * Command Handler
 *
 * Slash commands for the REPL. All output goes through
 * `CommandContext.output`, so the handler runs the same in tests.
 */

import { renderQueue, summarizeQueue } from '../actions/display.js';
import { formatError } from '../errors/index.js';
import { exportCodeBlocks } from '../integrations/code-export.js';
import type { StepResult } from '../orchestrator.js';
import type { CommandContext, CommandDefinition, CommandResult } from './types.js';

// =============================================================================
// COMMAND TABLE
// =============================================================================

export const COMMANDS: readonly CommandDefinition[] = [
  { name: '/help', aliases: ['/h', '/?'], description: 'Show this help' },
  { name: '/queue', description: 'Show the action queue' },
  { name: '/next', description: 'Review and run the next action (or press Enter)' },
  { name: '/skip', usage: '/skip [n]', description: 'Skip the next action, or action #n' },
  { name: '/run', usage: '/run <n>', description: 'Review and run action #n' },
  { name: '/run-all', description: 'Review and run every pending action in order' },
  { name: '/clear-queue', description: 'Drop the current queue' },
  { name: '/status', description: 'Show context usage and queue state' },
  { name: '/compact', description: 'Summarize older messages now' },
  { name: '/clear', description: 'Forget the conversation and the queue' },
  { name: '/add', usage: '/add <paths...>', description: 'Attach files to the next message' },
  { name: '/extract', usage: '/extract <dir>', description: 'Write code blocks of the last response to a directory' },
  { name: '/model', usage: '/model [name]', description: 'Show or change the model' },
  { name: '/quit', aliases: ['/exit', '/q'], description: 'Exit' },
];

export function getHelpText(): string {
  const width = Math.max(...COMMANDS.map((cmd) => (cmd.usage ?? cmd.name).length));
  const lines = COMMANDS.map((cmd) => {
    const label = (cmd.usage ?? cmd.name).padEnd(width);
    const aliases = cmd.aliases ? ` (alias: ${cmd.aliases.join(', ')})` : '';
    return `  ${label}  ${cmd.description}${aliases}`;
  });
  return ['Commands:', ...lines, '', 'Anything else is sent to the model.'].join('\n');
}

/**
 * Resolve an alias to its command name. Unknown input comes back as-is.
 */
export function canonicalCommand(cmd: string): string {
  const lower = cmd.toLowerCase();
  const match = COMMANDS.find((def) => def.name === lower || def.aliases?.includes(lower));
  return match?.name ?? lower;
}

// =============================================================================
// RESULT FORMATTING
// =============================================================================

/**
 * One or two lines describing what a step did.
 */
export function formatStepResult(result: StepResult): string[] {
  switch (result.status) {
    case 'empty':
      return ['No pending actions'];
    case 'error':
      return [result.error];
    case 'skipped':
      return [`Skipped: ${result.item.displayText}`];
    case 'executed': {
      const { outcome, item } = result;
      if (outcome.success) {
        return [`✓ ${item.displayText}`, ...(outcome.output ? [outcome.output] : [])];
      }
      return [`✗ ${item.displayText}`, outcome.error ? formatError(outcome.error) : outcome.output];
    }
  }
}

// =============================================================================
// HANDLER
// =============================================================================

export async function handleCommand(cmd: string, args: string[], ctx: CommandContext): Promise<CommandResult> {
  const { orchestrator, output, chalk } = ctx;

  const showQueue = (): void => {
    const queue = orchestrator.getQueue();
    const items = queue?.list() ?? [];
    if (items.length === 0) {
      output.log('No actions queued');
      return;
    }
    output.log(renderQueue(items, { chalk }).join('\n'));
  };

  const report = (result: StepResult): void => {
    const [first, ...rest] = formatStepResult(result);
    const failed = result.status === 'error' || (result.status === 'executed' && !result.outcome.success);
    if (first !== undefined) {
      if (failed) output.error(chalk.red(first));
      else output.log(result.status === 'executed' ? chalk.green(first) : first);
    }
    for (const line of rest) {
      output.log(failed ? chalk.red(line) : chalk.dim(line));
    }
  };

  switch (canonicalCommand(cmd)) {
    case '/quit':
      return 'quit';

    case '/help':
      output.log(getHelpText());
      return;

    case '/queue':
      showQueue();
      return;

    case '/next':
      report(await orchestrator.runNext());
      if (orchestrator.getQueue()?.hasPending()) showQueue();
      return;

    case '/skip':
      report(orchestrator.skip(args[0]));
      return;

    case '/run': {
      const [index] = args;
      if (index === undefined) {
        output.error('Usage: /run <n>');
        return;
      }
      report(await orchestrator.runIndex(index));
      return;
    }

    case '/run-all': {
      const summary = await orchestrator.runAll();
      if (!summary) {
        output.log('No actions queued');
        return;
      }
      output.log(
        `Ran ${summary.executed}: ${summary.completed} succeeded, ${summary.failed} failed, ${summary.skipped} skipped` +
          (summary.cancelled ? ' (cancelled)' : '')
      );
      showQueue();
      return;
    }

    case '/clear-queue':
      orchestrator.clearQueue();
      output.log('Queue cleared');
      return;

    case '/status': {
      const stats = orchestrator.contextStats();
      output.log(`Model: ${orchestrator.getModel()}`);
      output.log(`Context: ${orchestrator.budget.formatStatus(stats)}`);
      output.log(orchestrator.budget.autoCompactStatus(ctx.autoCompact, stats));
      output.log(`Queue: ${summarizeQueue(orchestrator.getQueue()?.list() ?? [])}`);
      return;
    }

    case '/compact': {
      const { before, after } = orchestrator.compactNow();
      if (after.messageCount === before.messageCount) {
        output.log('Nothing to compact');
        return;
      }
      output.log(
        `Compacted ${before.messageCount} → ${after.messageCount} messages ` +
          `(${before.totalTokens} → ${after.totalTokens} tokens)`
      );
      return;
    }

    case '/clear':
      orchestrator.clearHistory();
      orchestrator.clearQueue();
      output.log('Conversation cleared');
      return;

    case '/add': {
      if (args.length === 0) {
        output.error('Usage: /add <paths...>');
        return;
      }
      const context = await orchestrator.attachFiles(args);
      for (const path of context.included) {
        output.log(`Added ${path}`);
      }
      for (const { path, reason } of context.skipped) {
        output.error(chalk.yellow(`Skipped ${path}: ${reason}`));
      }
      return;
    }

    case '/extract': {
      const [dir] = args;
      const response = orchestrator.getLastResponse();
      if (dir === undefined) {
        output.error('Usage: /extract <dir>');
        return;
      }
      if (response === undefined) {
        output.error('No response to extract from');
        return;
      }
      try {
        const blocks = await exportCodeBlocks(response, dir);
        if (blocks.length === 0) {
          output.log('No code blocks found');
          return;
        }
        for (const block of blocks) {
          output.log(`Wrote ${block.path} (${block.bytes} bytes)`);
        }
      } catch (error) {
        output.error(chalk.red(formatError(error)));
      }
      return;
    }

    case '/model': {
      const [name] = args;
      if (name === undefined) {
        output.log(`Model: ${orchestrator.getModel()}`);
        return;
      }
      orchestrator.setModel(name);
      output.log(`Model set to ${name}`);
      return;
    }

    default:
      output.error(`Unknown command: ${cmd}. Type /help for commands.`);
      return 'unknown';
  }
}
