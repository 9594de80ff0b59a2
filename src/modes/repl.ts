/**
 * REPL Mode
 *
 * Readline loop: plain input goes to the model, slash commands go to the
 * command handler, and a blank line runs the next queued action.
 * Confirmation prompts reuse the same readline interface.
 */

import * as readline from 'node:readline/promises';
import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stdin, stdout } from 'node:process';
import chalk from 'chalk';

import {
  CONFIRMATION_CHOICES,
  parseConfirmationAnswer,
  type ConfirmationChoice,
  type ConfirmationPrompter,
  type ConfirmationRequest,
} from '../actions/confirmation.js';
import { renderQueue } from '../actions/display.js';
import { handleCommand } from '../commands/handler.js';
import type { CommandOutput } from '../commands/types.js';
import type { ResolvedSettings } from '../defaults.js';
import { formatError } from '../errors/index.js';
import type { NotificationQueue } from '../integrations/notifications.js';
import { logger } from '../integrations/utilities/logger.js';
import { Orchestrator } from '../orchestrator.js';
import { getHistoryPath } from '../paths.js';
import type { LLMProvider } from '../providers/types.js';

export interface REPLOptions {
  settings: ResolvedSettings;
  notifications?: NotificationQueue;
  /** Append every input line to the history file */
  saveHistory?: boolean;
}

/**
 * Terminal output for command handlers.
 */
export function createConsoleOutput(): CommandOutput {
  return {
    // eslint-disable-next-line no-console
    log: (message: string) => console.log(message),
    // eslint-disable-next-line no-console
    error: (message: string) => console.error(message),
    clear: () => console.clear(),
  };
}

/**
 * Asks on the REPL's readline interface until a valid answer is given.
 */
export class ReadlinePrompter implements ConfirmationPrompter {
  constructor(
    private readonly rl: readline.Interface,
    private readonly output: CommandOutput
  ) {}

  async ask(request: ConfirmationRequest): Promise<ConfirmationChoice> {
    this.output.log('');
    this.output.log(chalk.bold(`Review action: ${request.item.displayText}`));
    this.output.log(chalk.dim('─'.repeat(40)));
    this.output.log(request.preview);
    this.output.log(chalk.dim('─'.repeat(40)));
    for (const { key, label } of CONFIRMATION_CHOICES) {
      this.output.log(`  ${key}. ${label}`);
    }

    for (;;) {
      const choice = parseConfirmationAnswer(await this.rl.question(chalk.cyan('Proceed? ')));
      if (choice) {
        return choice;
      }
      this.output.error(chalk.yellow('Please answer 1, 2 or 3 (or y/a/n)'));
    }
  }
}

/**
 * Run the interactive loop until /quit or end of input.
 */
export async function startREPL(provider: LLMProvider, options: REPLOptions): Promise<void> {
  const { settings, notifications, saveHistory = true } = options;
  const rl = readline.createInterface({ input: stdin, output: stdout });
  const output = createConsoleOutput();

  const orchestrator = new Orchestrator({
    provider,
    settings,
    prompter: new ReadlinePrompter(rl, output),
  });

  const historyPath = getHistoryPath();
  const recordHistory = async (line: string): Promise<void> => {
    if (!saveHistory) return;
    try {
      await mkdir(dirname(historyPath), { recursive: true });
      await appendFile(historyPath, `${line}\n`, 'utf-8');
    } catch (error) {
      logger.debug('Could not write history', { error: formatError(error) });
    }
  };

  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  output.log(chalk.dim(`Provider: ${provider.name} | Model: ${orchestrator.getModel()}`));
  output.log(chalk.dim(`Root: ${settings.rootDir}`));
  output.log(chalk.dim('Type your request, or /help for commands.\n'));

  try {
    while (!closed) {
      for (const notification of notifications?.drain() ?? []) {
        const text = `[${notification.source}] ${notification.message}`;
        output.log(notification.level === 'warn' ? chalk.yellow(text) : chalk.cyan(text));
      }

      const pending = orchestrator.getQueue()?.counts().pending ?? 0;
      const prompt = (pending > 0 ? chalk.yellow(`[${pending}] `) : '') + chalk.green('You: ');

      let input: string;
      try {
        input = await rl.question(prompt);
      } catch (error) {
        // readline rejects once stdin is closed
        logger.debug('Input closed', { error: formatError(error) });
        break;
      }
      const trimmed = input.trim();

      if (!trimmed) {
        if (pending > 0) {
          await handleCommand('/next', [], { orchestrator, output, chalk, autoCompact: settings.context.autoCompact });
        }
        continue;
      }

      await recordHistory(trimmed);

      if (trimmed.startsWith('/')) {
        const [cmd = '', ...args] = trimmed.split(/\s+/);
        const result = await handleCommand(cmd, args, {
          orchestrator,
          output,
          chalk,
          autoCompact: settings.context.autoCompact,
        });
        if (result === 'quit') {
          output.log(chalk.cyan('Goodbye!'));
          break;
        }
        continue;
      }

      try {
        const turn = await orchestrator.sendTurn(trimmed);
        if (turn.compacted) {
          output.log(chalk.dim('(older messages were summarized to stay within the context window)'));
        }
        output.log(chalk.magenta('\n--- Assistant ---'));
        output.log(turn.displayText);
        output.log(chalk.magenta('-----------------'));
        if (turn.hint) {
          output.log(chalk.yellow(turn.hint));
        }
        const queue = orchestrator.getQueue();
        if (turn.actions.length > 0 && queue) {
          output.log('');
          output.log(renderQueue(queue.list(), { chalk }).join('\n'));
        }
        if (turn.stats.shouldWarn) {
          output.log(chalk.yellow(orchestrator.budget.formatStatus(turn.stats)));
        }
      } catch (error) {
        output.error(chalk.red(formatError(error)));
      }

      output.log('');
    }
  } finally {
    rl.close();
  }
}

/**
 * Send one task, print the answer and the queued actions, then return.
 * With auto-confirm on, the queue is run as well.
 */
export async function runSingleTask(provider: LLMProvider, task: string, settings: ResolvedSettings): Promise<boolean> {
  const output = createConsoleOutput();
  const orchestrator = new Orchestrator({ provider, settings });

  const turn = await orchestrator.sendTurn(task);
  output.log(turn.displayText);
  if (turn.hint) {
    output.log(chalk.yellow(turn.hint));
  }

  const queue = orchestrator.getQueue();
  if (!queue || turn.actions.length === 0) {
    return true;
  }

  output.log('');
  output.log(renderQueue(queue.list(), { chalk, showPreview: !settings.execution.autoConfirm }).join('\n'));
  if (!settings.execution.autoConfirm) {
    output.log(chalk.dim('Re-run with --yes to execute these actions.'));
    return true;
  }

  const summary = await orchestrator.runAll();
  if (summary) {
    output.log(`${summary.completed} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`);
  }
  return summary?.failed === 0;
}
