/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the action pipeline, the context budget
 * manager and the LLM client. Every failure inside a queue item is turned
 * into one of these before it reaches the queue, so the display can show
 * a category next to the captured message.
 *
 * Error Categories:
 * - TRANSIENT: Network, timeout - retryable
 * - PERMANENT: Auth, unsupported operation, path escape - not retryable
 * - RESOURCE: Disk full, limits exceeded
 * - VALIDATION: Malformed markup, invalid config, bad arguments
 * - RATE_LIMITED: API rate limits hit
 * - DEPENDENCY: External service failures
 *
 * @example
 * ```typescript
 * throw new PathEscapeError('../etc/passwd', '/work/project');
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

/**
 * Categories of errors for recovery decisions.
 */
export enum ErrorCategory {
  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry */
  PERMANENT = 'PERMANENT',

  /** Resource errors - system resource limits exceeded */
  RESOURCE = 'RESOURCE',

  /** Validation errors - invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** Rate limited - API rate limits hit, retry after delay */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Dependency errors - external service failures */
  DEPENDENCY = 'DEPENDENCY',

  /** Internal errors - unexpected internal failures */
  INTERNAL = 'INTERNAL',

  /** Cancelled - operation was cancelled */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all stepwright errors.
 */
export class AgentError extends Error {
  /** Error category for recovery decisions */
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  override readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'AgentError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// ACTION PIPELINE ERRORS
// =============================================================================

/**
 * Malformed `<actions>` block. Raised by the markup reader and caught by the
 * structured parser, which skips the block and moves on.
 */
export class ActionParseError extends AgentError {
  /** Character offset inside the block where reading stopped */
  readonly offset: number;

  constructor(message: string, offset: number, context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, offset });
    this.name = 'ActionParseError';
    this.offset = offset;
  }
}

/**
 * A queue transition the state machine does not allow.
 */
export class InvalidTransitionError extends AgentError {
  readonly itemId: string;
  readonly from: string;
  readonly to: string;

  constructor(itemId: string, from: string, to: string, reason?: string) {
    super(
      `Cannot move ${itemId} from ${from} to ${to}${reason ? `: ${reason}` : ''}`,
      ErrorCategory.VALIDATION,
      false,
      { itemId, from, to }
    );
    this.name = 'InvalidTransitionError';
    this.itemId = itemId;
    this.from = from;
    this.to = to;
  }
}

/**
 * A command ran past its time budget and was killed.
 */
export class ExecutionTimeoutError extends AgentError {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms`, ErrorCategory.TRANSIENT, true, {
      command,
      timeoutMs,
    });
    this.name = 'ExecutionTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Any other command or file failure (non-zero exit, spawn failure, I/O error).
 */
export class ExecutionFaultError extends AgentError {
  /** Exit code when the failure came from a finished process */
  readonly exitCode?: number;

  constructor(message: string, context?: Record<string, unknown> & { exitCode?: number }, cause?: Error) {
    super(message, ErrorCategory.INTERNAL, false, context, cause);
    this.name = 'ExecutionFaultError';
    this.exitCode = context?.exitCode;
  }

  static nonZeroExit(command: string, exitCode: number, output: string): ExecutionFaultError {
    const detail = output.trim() ? `: ${output.trim()}` : '';
    return new ExecutionFaultError(`Command exited with code ${exitCode}${detail}`, { command, exitCode });
  }
}

/**
 * The action is part of the data model but execution is not built for it.
 */
export class UnsupportedOperationError extends AgentError {
  readonly operation: string;

  constructor(operation: string, target?: string) {
    super(
      `Operation not yet supported: ${operation}${target ? ` (${target})` : ''}`,
      ErrorCategory.PERMANENT,
      false,
      { operation, target }
    );
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

/**
 * A file target resolved outside the configured root directory.
 */
export class PathEscapeError extends AgentError {
  readonly requestedPath: string;
  readonly root: string;

  constructor(requestedPath: string, root: string) {
    super(`Path escapes the project root: ${requestedPath}`, ErrorCategory.PERMANENT, false, {
      path: requestedPath,
      root,
    });
    this.name = 'PathEscapeError';
    this.requestedPath = requestedPath;
    this.root = root;
  }
}

/**
 * Error from file operations.
 */
export class FileOperationError extends AgentError {
  readonly path: string;

  /** Type of operation (read, write, mkdir) */
  readonly operation: string;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    path: string,
    operation: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, category, recoverable, { ...context, path, operation }, cause);
    this.name = 'FileOperationError';
    this.path = path;
    this.operation = operation;
  }

  static notFound(path: string, operation: string): FileOperationError {
    return new FileOperationError(`File not found: ${path}`, ErrorCategory.PERMANENT, false, path, operation);
  }

  static permissionDenied(path: string, operation: string): FileOperationError {
    return new FileOperationError(`Permission denied: ${path}`, ErrorCategory.PERMANENT, false, path, operation);
  }

  /**
   * File busy (may resolve on retry).
   */
  static busy(path: string, operation: string): FileOperationError {
    return new FileOperationError(`File busy: ${path}`, ErrorCategory.TRANSIENT, true, path, operation);
  }

  static diskFull(path: string, operation: string): FileOperationError {
    return new FileOperationError(
      `Disk full - cannot write file: ${path}`,
      ErrorCategory.RESOURCE,
      false,
      path,
      operation
    );
  }

  /**
   * Map a Node errno error onto the matching factory.
   */
  static fromErrno(error: NodeJS.ErrnoException, path: string, operation: string): FileOperationError {
    switch (error.code) {
      case 'ENOENT':
        return FileOperationError.notFound(path, operation);
      case 'EACCES':
      case 'EPERM':
        return FileOperationError.permissionDenied(path, operation);
      case 'EBUSY':
        return FileOperationError.busy(path, operation);
      case 'ENOSPC':
        return FileOperationError.diskFull(path, operation);
      default:
        return new FileOperationError(
          error.message,
          ErrorCategory.INTERNAL,
          false,
          path,
          operation,
          { code: error.code },
          error
        );
    }
  }
}

// =============================================================================
// CONTEXT ERRORS
// =============================================================================

/**
 * Caller misuse of the budget manager (non-positive budget, malformed
 * message list). The one failure in the core that is meant to be fatal.
 */
export class PreconditionError extends AgentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, context);
    this.name = 'PreconditionError';
  }
}

// =============================================================================
// PROVIDER ERRORS
// =============================================================================

export type ProviderErrorCode =
  | 'NOT_CONFIGURED'
  | 'AUTHENTICATION_FAILED'
  | 'RATE_LIMITED'
  | 'CONTEXT_LENGTH_EXCEEDED'
  | 'INVALID_REQUEST'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'UNKNOWN';

const PROVIDER_CODE_CATEGORY: Record<ProviderErrorCode, ErrorCategory> = {
  NOT_CONFIGURED: ErrorCategory.PERMANENT,
  AUTHENTICATION_FAILED: ErrorCategory.PERMANENT,
  RATE_LIMITED: ErrorCategory.RATE_LIMITED,
  CONTEXT_LENGTH_EXCEEDED: ErrorCategory.RESOURCE,
  INVALID_REQUEST: ErrorCategory.VALIDATION,
  SERVER_ERROR: ErrorCategory.TRANSIENT,
  NETWORK_ERROR: ErrorCategory.TRANSIENT,
  UNKNOWN: ErrorCategory.DEPENDENCY,
};

/**
 * Error from LLM provider calls. `code` is the error kind surfaced to the
 * orchestrator; the transport details stay in `context`.
 */
export class ProviderError extends AgentError {
  readonly providerName: string;
  readonly code: ProviderErrorCode;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(
    message: string,
    providerName: string,
    code: ProviderErrorCode,
    context?: Record<string, unknown> & { statusCode?: number },
    cause?: Error
  ) {
    const category = PROVIDER_CODE_CATEGORY[code];
    super(
      message,
      category,
      category === ErrorCategory.TRANSIENT || category === ErrorCategory.RATE_LIMITED,
      { ...context, provider: providerName, code },
      cause
    );
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.code = code;
    this.statusCode = context?.statusCode;
  }

  /**
   * Map an HTTP status onto an error code.
   */
  static fromStatus(providerName: string, status: number, body: string): ProviderError {
    let code: ProviderErrorCode = 'UNKNOWN';
    if (status === 401 || status === 403) code = 'AUTHENTICATION_FAILED';
    else if (status === 429) code = 'RATE_LIMITED';
    else if (status === 413) code = 'CONTEXT_LENGTH_EXCEEDED';
    else if (status === 400) code = /context|too long|max.*tokens/i.test(body) ? 'CONTEXT_LENGTH_EXCEEDED' : 'INVALID_REQUEST';
    else if (status >= 500) code = 'SERVER_ERROR';

    return new ProviderError(`${providerName} API error (${status}): ${body}`, providerName, code, {
      statusCode: status,
    });
  }
}

// =============================================================================
// GENERAL ERRORS
// =============================================================================

/**
 * Error from validation failures.
 */
export class ValidationError extends AgentError {
  /** Field(s) that failed validation */
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from Zod validation result.
   */
  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, fields);
  }
}

/**
 * Error when an operation is cancelled.
 */
export class CancellationError extends AgentError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

function errnoCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  const message = error.message.toLowerCase();
  const code = errnoCode(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('socket hang up') ||
    message.includes('network error')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (message.includes('rate limit') || message.includes('too many requests') || message.includes('429')) {
    return { category: ErrorCategory.RATE_LIMITED, recoverable: true };
  }

  if (
    message.includes('unauthorized') ||
    message.includes('forbidden') ||
    code === 'EACCES' ||
    code === 'EPERM'
  ) {
    return { category: ErrorCategory.PERMANENT, recoverable: false };
  }

  if (message.includes('invalid') || message.includes('validation') || message.includes('required')) {
    return { category: ErrorCategory.VALIDATION, recoverable: false };
  }

  if (code === 'ENOMEM' || code === 'ENOSPC' || message.includes('out of memory')) {
    return { category: ErrorCategory.RESOURCE, recoverable: false };
  }

  if (message.includes('cancelled') || message.includes('aborted')) {
    return { category: ErrorCategory.CANCELLED, recoverable: false };
  }

  return { category: ErrorCategory.INTERNAL, recoverable: false };
}

/**
 * Wrap an unknown thrown value as an AgentError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): AgentError {
  if (error instanceof AgentError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const { category, recoverable } = categorizeError(err);

  return new AgentError(err.message, category, recoverable, context, err);
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof AgentError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof AgentError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
