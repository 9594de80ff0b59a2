/**
 * Command Handler Types
 */

import type { ChalkInstance } from 'chalk';
import type { Orchestrator } from '../orchestrator.js';

/**
 * Output abstraction for command handlers, so the same command logic can
 * print to a terminal or into a buffer under test.
 */
export interface CommandOutput {
  log(message: string): void;
  error(message: string): void;
  clear(): void;
}

export interface CommandContext {
  orchestrator: Orchestrator;
  output: CommandOutput;
  /** Used for the queue display; tests pass a level-0 instance */
  chalk: ChalkInstance;
  /** Whether auto-compaction is on, for /status */
  autoCompact: boolean;
}

/**
 * - 'quit': leave the REPL
 * - 'unknown': not a recognised command
 * - void: handled
 */
export type CommandResult = 'quit' | 'unknown' | void;

export interface CommandDefinition {
  name: string;
  aliases?: string[];
  usage?: string;
  description: string;
}
