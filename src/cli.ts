/**
 * CLI Argument Parsing and Help
 */

import chalk from 'chalk';

export const VERSION = '0.3.0';

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  /** Run every action without asking */
  yes: boolean;
  updateCheck: boolean;
  model?: string;
  provider?: string;
  root?: string;
  maxTokens?: number;
  /** Single task, run non-interactively */
  task?: string;
  /** Problems found while parsing; main prints them and exits */
  errors: string[];
}

/**
 * Parse command-line arguments. Everything from the first positional
 * argument on is the task.
 */
export function parseArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    yes: false,
    updateCheck: true,
    errors: [],
  };

  const valueFor = (flag: string, index: number): string | undefined => {
    const value = argv[index];
    if (value === undefined || value.startsWith('-')) {
      result.errors.push(`${flag} needs a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--yes' || arg === '-y') {
      result.yes = true;
    } else if (arg === '--no-update-check') {
      result.updateCheck = false;
    } else if (arg === '--model' || arg === '-m') {
      const value = valueFor(arg, i + 1);
      if (value !== undefined) {
        result.model = value;
        i++;
      }
    } else if (arg === '--provider') {
      const value = valueFor(arg, i + 1);
      if (value !== undefined) {
        result.provider = value;
        i++;
      }
    } else if (arg === '--root') {
      const value = valueFor(arg, i + 1);
      if (value !== undefined) {
        result.root = value;
        i++;
      }
    } else if (arg === '--max-tokens') {
      const value = valueFor(arg, i + 1);
      if (value !== undefined) {
        i++;
        const parsed = Number(value);
        if (Number.isInteger(parsed) && parsed > 0) {
          result.maxTokens = parsed;
        } else {
          result.errors.push(`--max-tokens expects a positive integer, got "${value}"`);
        }
      }
    } else if (arg === '--task' || arg === '-t') {
      result.task = argv.slice(i + 1).join(' ');
      break;
    } else if (arg.startsWith('-')) {
      result.errors.push(`Unknown option: ${arg}`);
    } else {
      result.task = argv.slice(i).join(' ');
      break;
    }
  }

  return result;
}

export function getHelpText(): string {
  const rule = chalk.dim('━'.repeat(72));
  return `
${rule}
${chalk.bold('  STEPWRIGHT - review and run what the model proposes, one step at a time')}
${rule}

${chalk.bold('USAGE:')}
  stepwright [OPTIONS] [TASK]

${chalk.bold('OPTIONS:')}
  -h, --help              Show this help
  -v, --version           Show version (${VERSION})
  -m, --model MODEL       Model to use
  --provider NAME         Provider: anthropic, mock (default: auto-detect)
  --root DIR              Directory actions run in (default: current directory)
  --max-tokens N          Context window size in tokens (default: 128000)
  -y, --yes               Run actions without asking
  -t, --task TASK         Run a single task non-interactively
  --debug                 Verbose logging
  --no-update-check       Do not check the registry for new versions

${chalk.bold('EXAMPLES:')}
  ${chalk.dim('# Interactive session')}
  stepwright

  ${chalk.dim('# Single task, actions listed but not run')}
  stepwright "Create a hello world script"

  ${chalk.dim('# Single task, actions run')}
  stepwright --yes "Create a hello world script"

${chalk.bold('ENVIRONMENT VARIABLES:')}
  ANTHROPIC_API_KEY         Anthropic API key
  STEPWRIGHT_MODEL          Default model
  STEPWRIGHT_PROVIDER       Default provider
  STEPWRIGHT_ROOT           Default root directory
  STEPWRIGHT_MAX_TOKENS     Context window size
  STEPWRIGHT_LOG_LEVEL      trace, debug, info, warn, error, silent
  STEPWRIGHT_AUTO_CONFIRM   Same as --yes when true

${chalk.bold('FILES:')}
  ~/.config/stepwright/config.json   User configuration
  .stepwright/config.json            Project configuration
${rule}
`;
}

/**
 * Display help text.
 */
export function showHelp(): void {
  // eslint-disable-next-line no-console
  console.log(getHelpText());
}
