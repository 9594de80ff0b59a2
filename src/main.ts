#!/usr/bin/env node
/**
 * Stepwright
 *
 * Interactive coding assistant: the model proposes commands and file
 * writes, the user reviews and runs them one step at a time.
 *
 * Run: npx tsx src/main.ts
 */

// Load environment
import { config } from 'dotenv';
config();

// Import adapters to register them
import './providers/adapters/anthropic.js';
import './providers/adapters/mock.js';

import { resolve } from 'node:path';
import chalk from 'chalk';

import { VERSION, parseArgs, showHelp } from './cli.js';
import { loadConfig } from './config/index.js';
import { resolveSettings, type ResolvedSettings } from './defaults.js';
import { formatError } from './errors/index.js';
import { NotificationQueue, NotificationSink } from './integrations/notifications.js';
import { UpdateChecker } from './integrations/update-checker.js';
import {
  ConsoleSink,
  FileSink,
  StructuredLogger,
  configureLogger,
  type LogLevel,
  type LogSink,
} from './integrations/utilities/logger.js';
import { runSingleTask, startREPL } from './modes/repl.js';
import { getProvider } from './providers/provider.js';

// =============================================================================
// PROCESS ERROR HANDLERS
// =============================================================================

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red(`[FATAL] Unhandled rejection: ${formatError(reason)}`));
  process.exitCode = 1;
});

process.on('SIGTERM', () => {
  process.exit(143);
});

// =============================================================================
// MAIN
// =============================================================================

/**
 * Logger for work that runs while the prompt is waiting. It never writes
 * to the terminal; entries reach the user through the notification queue.
 */
function backgroundLogger(
  logging: { level: LogLevel; file?: string },
  notifications: NotificationQueue
): StructuredLogger {
  const sinks: LogSink[] = [new NotificationSink(notifications)];
  if (logging.file) {
    sinks.push(new FileSink(logging.file));
  }
  return new StructuredLogger({ level: logging.level, sinks });
}

async function main(): Promise<number> {
  const args = parseArgs();

  if (args.help) {
    showHelp();
    return 0;
  }
  if (args.version) {
    // eslint-disable-next-line no-console
    console.log(`stepwright v${VERSION}`);
    return 0;
  }
  if (args.errors.length > 0) {
    for (const error of args.errors) {
      console.error(chalk.red(error));
    }
    console.error('Run stepwright --help for usage.');
    return 2;
  }

  const loaded = loadConfig();
  for (const warning of loaded.warnings) {
    console.error(chalk.yellow(`Warning: ${warning}`));
  }

  const base = resolveSettings(loaded.config);
  const settings: ResolvedSettings = {
    ...base,
    ...(args.model !== undefined && { model: args.model }),
    rootDir: resolve(args.root ?? base.rootDir),
    context: { ...base.context, ...(args.maxTokens !== undefined && { maxTokens: args.maxTokens }) },
    execution: { ...base.execution, autoConfirm: base.execution.autoConfirm || args.yes },
    logging: { ...base.logging, level: args.debug ? 'debug' : base.logging.level },
  };

  const sinks: LogSink[] = [new ConsoleSink()];
  if (settings.logging.file) {
    sinks.push(new FileSink(settings.logging.file));
  }
  const log = configureLogger({ level: settings.logging.level, sinks });

  const provider = getProvider(args.provider ?? settings.provider, {
    ...(settings.model !== undefined && { model: settings.model }),
    logger: log,
  });
  log.debug('Settings resolved', { provider: provider.name, rootDir: settings.rootDir });

  if (args.task) {
    return (await runSingleTask(provider, args.task, settings)) ? 0 : 1;
  }

  const notifications = new NotificationQueue();
  const updates =
    args.updateCheck && settings.updates.enabled
      ? new UpdateChecker({
          currentVersion: VERSION,
          intervalMs: settings.updates.intervalMinutes * 60 * 1000,
          notifications,
          logger: backgroundLogger(settings.logging, notifications),
        })
      : undefined;
  updates?.start();

  try {
    await startREPL(provider, { settings, notifications });
  } finally {
    updates?.stop();
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red(formatError(error)));
    process.exitCode = 1;
  });
