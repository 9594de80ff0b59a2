/**
 * Action Executor
 *
 * Runs queue items against the local machine: commands through a shell
 * with a hard timeout, file writes under a fixed root directory. Every
 * failure comes back as a typed error on the outcome instead of a throw.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  ExecutionFaultError,
  ExecutionTimeoutError,
  FileOperationError,
  PathEscapeError,
  UnsupportedOperationError,
  formatErrorForLog,
  wrapError,
  type AgentError,
} from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { ConfirmationPolicy, buildPreview } from './confirmation.js';
import type { CommandAction, ExecutionOutcome, FileAction, ItemRunner, QueueItem } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
export const MAX_OUTPUT_CHARS = 100_000;
const KILL_GRACE_MS = 1_000;

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** stdout, then stderr under a separator when there is any */
  output: string;
  exitCode: number | null;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
  error?: AgentError;
}

export interface FileWriteResult {
  /** Absolute path written */
  path: string;
  /** Path relative to the root, as shown to the user */
  relativePath: string;
  created: boolean;
  lines: number;
  bytes: number;
}

export interface ActionExecutorOptions {
  rootDir: string;
  commandTimeoutMs?: number;
  /** Shell used as `<shell> -c <command>` */
  shell?: string;
  confirmation?: ConfirmationPolicy;
  logger?: StructuredLogger;
}

// =============================================================================
// PATH CONTAINMENT
// =============================================================================

/**
 * Resolve `requested` against `root` and reject anything that lands outside
 * it, including absolute paths elsewhere and `..` traversal.
 */
export function resolveWithinRoot(root: string, requested: string): string {
  const base = path.resolve(root);
  const target = path.resolve(base, requested);
  const relative = path.relative(base, target);

  if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new PathEscapeError(requested, base);
  }
  return target;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Write to a temp file beside the target, then rename over it.
 */
async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2, 8)}`;

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

// =============================================================================
// EXECUTOR
// =============================================================================

export class ActionExecutor implements ItemRunner {
  readonly rootDir: string;
  private readonly commandTimeoutMs: number;
  private readonly shell: string;
  private readonly confirmation: ConfirmationPolicy;
  private readonly logger: StructuredLogger;

  constructor(options: ActionExecutorOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.shell = options.shell ?? 'bash';
    this.logger = createComponentLogger('ActionExecutor', options.logger);
    this.confirmation = options.confirmation ?? new ConfirmationPolicy({ logger: this.logger });
  }

  /**
   * Ask whether the item may run, showing a preview (a diff when the target
   * file already exists).
   */
  async confirm(item: QueueItem): Promise<boolean> {
    const existing = item.action.kind === 'file' ? await this.readExisting(item.action) : undefined;
    return this.confirmation.confirm(item, buildPreview(item, existing));
  }

  /**
   * Run one item. Never rejects.
   */
  async run(item: QueueItem): Promise<ExecutionOutcome> {
    const startedAt = Date.now();
    const { action } = item;

    try {
      if (action.kind === 'command') {
        const result = await this.executeCommand(action);
        return {
          success: result.success,
          output: result.output,
          ...(result.error && { error: result.error }),
          durationMs: result.durationMs,
        };
      }

      const written = await this.executeFile(action);
      return {
        success: true,
        output: `${written.created ? 'Created' : 'Updated'} ${written.relativePath} (${written.lines} lines, ${written.bytes} bytes)`,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      const wrapped = wrapError(error, { itemId: item.id });
      this.logger.warn('Action failed', { id: item.id, error: formatErrorForLog(wrapped) });
      return { success: false, output: '', error: wrapped, durationMs: Date.now() - startedAt };
    }
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  /**
   * Spawn the command in the root directory. Resolves with a timeout or
   * fault error on the result rather than rejecting.
   */
  executeCommand(action: CommandAction): Promise<CommandResult> {
    const startedAt = Date.now();
    const { command } = action;
    this.logger.debug('Running command', { command, cwd: this.rootDir });

    return new Promise((resolve) => {
      const proc = spawn(this.shell, ['-c', command], {
        cwd: this.rootDir,
        env: { ...process.env, TERM: 'dumb' },
        stdio: ['ignore', 'pipe', 'pipe'],
        // own process group so a timeout also reaches grandchildren
        detached: true,
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const timeoutResult = () => ({
        success: false,
        exitCode: proc.exitCode,
        timedOut: true,
        error: new ExecutionTimeoutError(command, this.commandTimeoutMs),
      });

      // The shell may already have exited while a background job still
      // holds the pipes, so the whole group is signalled regardless.
      const timer = setTimeout(() => {
        timedOut = true;
        this.signal(proc, 'SIGTERM');
        killTimer = setTimeout(() => {
          this.signal(proc, 'SIGKILL');
          proc.stdout?.destroy();
          proc.stderr?.destroy();
          settle(timeoutResult());
        }, KILL_GRACE_MS);
      }, this.commandTimeoutMs);

      const settle = (result: Omit<CommandResult, 'stdout' | 'stderr' | 'output' | 'truncated' | 'durationMs'>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);

        const combined = stdout + (stderr ? `\n--- stderr ---\n${stderr}` : '');
        const truncated = combined.length > MAX_OUTPUT_CHARS;
        const output = truncated ? `${combined.slice(0, MAX_OUTPUT_CHARS)}\n... (output truncated)` : combined;
        const durationMs = Date.now() - startedAt;

        if (result.error) {
          this.logger.warn('Command failed', { command, error: result.error.message, durationMs });
        } else {
          this.logger.debug('Command finished', { command, durationMs });
        }
        resolve({ ...result, stdout, stderr, output, truncated, durationMs });
      };

      proc.stdout?.on('data', (data: Buffer) => {
        if (stdout.length < MAX_OUTPUT_CHARS) stdout += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer) => {
        if (stderr.length < MAX_OUTPUT_CHARS) stderr += data.toString();
      });

      proc.on('close', (code, signal) => {
        if (timedOut) {
          settle({ ...timeoutResult(), exitCode: code });
          return;
        }
        if (code === 0) {
          settle({ success: true, exitCode: 0, timedOut: false });
          return;
        }
        const error =
          code === null
            ? new ExecutionFaultError(`Command terminated by ${signal ?? 'signal'}`, { command })
            : ExecutionFaultError.nonZeroExit(command, code, stderr || stdout);
        settle({ success: false, exitCode: code, timedOut: false, error });
      });

      proc.on('error', (error) => {
        settle({
          success: false,
          exitCode: null,
          timedOut: false,
          error: new ExecutionFaultError(`Failed to start ${this.shell}: ${error.message}`, { command }, error),
        });
      });
    });
  }

  private signal(proc: ChildProcess, signal: NodeJS.Signals): void {
    if (proc.pid === undefined) return;
    try {
      process.kill(-proc.pid, signal);
      return;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ESRCH') return;
      this.logger.debug('Process group signal failed, signalling child only', {
        pid: proc.pid,
        signal,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    if (proc.exitCode === null && proc.signalCode === null) {
      proc.kill(signal);
    }
  }

  // ---------------------------------------------------------------------------
  // Files
  // ---------------------------------------------------------------------------

  /**
   * Create or overwrite a file under the root. Throws PathEscapeError,
   * UnsupportedOperationError or FileOperationError.
   */
  async executeFile(action: FileAction): Promise<FileWriteResult> {
    const target = resolveWithinRoot(this.rootDir, action.path);

    if (action.op === 'delete') {
      throw new UnsupportedOperationError('delete', action.path);
    }

    let created = true;
    try {
      await fs.access(target);
      created = false;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw this.toFileError(error, action.path, 'access');
      }
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
    } catch (error) {
      throw this.toFileError(error, action.path, 'mkdir');
    }

    try {
      await writeFileAtomic(target, action.content);
    } catch (error) {
      throw this.toFileError(error, action.path, 'write');
    }

    const result: FileWriteResult = {
      path: target,
      relativePath: path.relative(this.rootDir, target),
      created,
      lines: action.content.split('\n').length,
      bytes: Buffer.byteLength(action.content, 'utf-8'),
    };
    this.logger.info(created ? 'File created' : 'File overwritten', {
      path: result.relativePath,
      bytes: result.bytes,
    });
    return result;
  }

  private toFileError(error: unknown, filePath: string, operation: string): AgentError {
    if (isErrnoException(error)) {
      return FileOperationError.fromErrno(error, filePath, operation);
    }
    return wrapError(error, { path: filePath, operation });
  }

  private async readExisting(action: FileAction): Promise<string | undefined> {
    try {
      return await fs.readFile(resolveWithinRoot(this.rootDir, action.path), 'utf-8');
    } catch (error) {
      // missing files and escaping paths preview as plain content
      this.logger.debug('No existing content for preview', {
        path: action.path,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
