/**
 * Tests for the centralized error types.
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCategory,
  AgentError,
  ActionParseError,
  InvalidTransitionError,
  ExecutionTimeoutError,
  ExecutionFaultError,
  UnsupportedOperationError,
  PathEscapeError,
  FileOperationError,
  ProviderError,
  ValidationError,
  CancellationError,
  categorizeError,
  wrapError,
  isAgentError,
  formatError,
  formatErrorForLog,
} from '../src/errors/index.js';

describe('Error Types', () => {
  describe('AgentError', () => {
    it('should create error with all properties', () => {
      const error = new AgentError('Something went wrong', ErrorCategory.TRANSIENT, true, { key: 'value' });

      expect(error.message).toBe('Something went wrong');
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ key: 'value' });
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should serialize to JSON', () => {
      const cause = new Error('root cause');
      const error = new AgentError('Test error', ErrorCategory.PERMANENT, false, { foo: 'bar' }, cause);

      const json = error.toJSON();
      expect(json.name).toBe('AgentError');
      expect(json.message).toBe('Test error');
      expect(json.category).toBe(ErrorCategory.PERMANENT);
      expect(json.recoverable).toBe(false);
      expect(json.context).toEqual({ foo: 'bar' });
      expect(json.cause).toBe('root cause');
    });

    it('should format for logging', () => {
      const error = new AgentError('Test error', ErrorCategory.INTERNAL, false, { id: 1 });
      expect(error.toLogString()).toBe('[AgentError] (INTERNAL) Test error context={"id":1}');
    });

    it('should omit empty context from the log string', () => {
      const error = new AgentError('Plain', ErrorCategory.INTERNAL, false);
      expect(error.toLogString()).toBe('[AgentError] (INTERNAL) Plain');
    });
  });

  describe('action pipeline errors', () => {
    it('should carry the offset of a parse failure', () => {
      const error = new ActionParseError('Unclosed <action>', 42, { block: 0 });
      expect(error.name).toBe('ActionParseError');
      expect(error.offset).toBe(42);
      expect(error.category).toBe(ErrorCategory.VALIDATION);
      expect(error.context).toEqual({ block: 0, offset: 42 });
    });

    it('should describe an invalid transition', () => {
      const error = new InvalidTransitionError('action-1', 'completed', 'in_progress', 'already finished');
      expect(error.message).toBe('Cannot move action-1 from completed to in_progress: already finished');
    });

    it('should describe an invalid transition without a reason', () => {
      const error = new InvalidTransitionError('action-2', 'pending', 'failed');
      expect(error.message).toBe('Cannot move action-2 from pending to failed');
    });

    it('should mark timeouts as transient', () => {
      const error = new ExecutionTimeoutError('sleep 5', 100);
      expect(error.message).toBe('Command timed out after 100ms');
      expect(error.timeoutMs).toBe(100);
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
      expect(error.recoverable).toBe(true);
    });

    it('should include trimmed output in a non-zero exit', () => {
      const error = ExecutionFaultError.nonZeroExit('false', 2, '  boom\n');
      expect(error.message).toBe('Command exited with code 2: boom');
      expect(error.exitCode).toBe(2);
    });

    it('should leave out empty output in a non-zero exit', () => {
      expect(ExecutionFaultError.nonZeroExit('false', 1, '   ').message).toBe('Command exited with code 1');
    });

    it('should name the unsupported operation', () => {
      const error = new UnsupportedOperationError('delete', 'old.txt');
      expect(error.message).toBe('Operation not yet supported: delete (old.txt)');
      expect(error.operation).toBe('delete');
      expect(error.category).toBe(ErrorCategory.PERMANENT);
    });

    it('should report the requested path on escape', () => {
      const error = new PathEscapeError('../etc/passwd', '/work');
      expect(error.message).toBe('Path escapes the project root: ../etc/passwd');
      expect(error.root).toBe('/work');
    });
  });

  describe('FileOperationError', () => {
    it('should map errno codes onto factories', () => {
      const enoent = Object.assign(new Error('no such file'), { code: 'ENOENT' });
      const eacces = Object.assign(new Error('denied'), { code: 'EACCES' });
      const ebusy = Object.assign(new Error('busy'), { code: 'EBUSY' });
      const enospc = Object.assign(new Error('full'), { code: 'ENOSPC' });

      expect(FileOperationError.fromErrno(enoent, 'a.txt', 'write').message).toBe('File not found: a.txt');
      expect(FileOperationError.fromErrno(eacces, 'a.txt', 'write').message).toBe('Permission denied: a.txt');
      expect(FileOperationError.fromErrno(ebusy, 'a.txt', 'write').recoverable).toBe(true);
      expect(FileOperationError.fromErrno(enospc, 'a.txt', 'write').category).toBe(ErrorCategory.RESOURCE);
    });

    it('should keep the errno message for unknown codes', () => {
      const other = Object.assign(new Error('is a directory'), { code: 'EISDIR' });
      const error = FileOperationError.fromErrno(other, 'dir', 'write');
      expect(error.message).toBe('is a directory');
      expect(error.category).toBe(ErrorCategory.INTERNAL);
      expect(error.context).toEqual({ code: 'EISDIR', path: 'dir', operation: 'write' });
      expect(error.cause).toBe(other);
    });
  });

  describe('ProviderError', () => {
    it('should map HTTP statuses to codes', () => {
      expect(ProviderError.fromStatus('anthropic', 401, 'bad key').code).toBe('AUTHENTICATION_FAILED');
      expect(ProviderError.fromStatus('anthropic', 429, 'slow down').code).toBe('RATE_LIMITED');
      expect(ProviderError.fromStatus('anthropic', 413, 'big').code).toBe('CONTEXT_LENGTH_EXCEEDED');
      expect(ProviderError.fromStatus('anthropic', 400, 'prompt is too long').code).toBe('CONTEXT_LENGTH_EXCEEDED');
      expect(ProviderError.fromStatus('anthropic', 400, 'bad field').code).toBe('INVALID_REQUEST');
      expect(ProviderError.fromStatus('anthropic', 503, 'down').code).toBe('SERVER_ERROR');
      expect(ProviderError.fromStatus('anthropic', 418, 'teapot').code).toBe('UNKNOWN');
    });

    it('should build the message and status', () => {
      const error = ProviderError.fromStatus('anthropic', 500, 'oops');
      expect(error.message).toBe('anthropic API error (500): oops');
      expect(error.statusCode).toBe(500);
      expect(error.recoverable).toBe(true);
    });

    it('should not mark authentication failures recoverable', () => {
      expect(ProviderError.fromStatus('anthropic', 403, 'no').recoverable).toBe(false);
    });
  });

  describe('ValidationError', () => {
    it('should collect fields from zod issues', () => {
      const error = ValidationError.fromZodError({
        issues: [
          { path: ['context', 'maxTokens'], message: 'Expected number' },
          { path: ['model'], message: 'Required' },
        ],
      });
      expect(error.fields).toEqual(['context.maxTokens', 'model']);
      expect(error.message).toBe('Validation failed: context.maxTokens: Expected number, model: Required');
    });
  });

  describe('CancellationError', () => {
    it('should default its reason', () => {
      const error = new CancellationError();
      expect(error.reason).toBe('Operation cancelled');
      expect(error.category).toBe(ErrorCategory.CANCELLED);
    });
  });

  describe('categorizeError', () => {
    it('should detect transient failures', () => {
      expect(categorizeError(new Error('Request timed out'))).toEqual({
        category: ErrorCategory.TRANSIENT,
        recoverable: true,
      });
      const reset = Object.assign(new Error('reset'), { code: 'ECONNRESET' });
      expect(categorizeError(reset).category).toBe(ErrorCategory.TRANSIENT);
    });

    it('should detect rate limits', () => {
      expect(categorizeError(new Error('Too many requests')).category).toBe(ErrorCategory.RATE_LIMITED);
    });

    it('should detect permission problems', () => {
      const eperm = Object.assign(new Error('operation not permitted'), { code: 'EPERM' });
      expect(categorizeError(eperm).category).toBe(ErrorCategory.PERMANENT);
    });

    it('should detect validation problems', () => {
      expect(categorizeError(new Error('Invalid argument')).category).toBe(ErrorCategory.VALIDATION);
    });

    it('should detect cancellation', () => {
      expect(categorizeError(new Error('The operation was aborted')).category).toBe(ErrorCategory.CANCELLED);
    });

    it('should fall back to internal', () => {
      expect(categorizeError(new Error('weird'))).toEqual({ category: ErrorCategory.INTERNAL, recoverable: false });
    });
  });

  describe('wrapError', () => {
    it('should return agent errors unchanged', () => {
      const original = new PathEscapeError('/x', '/root');
      expect(wrapError(original)).toBe(original);
    });

    it('should wrap plain errors with a category', () => {
      const wrapped = wrapError(new Error('socket hang up'), { attempt: 2 });
      expect(wrapped).toBeInstanceOf(AgentError);
      expect(wrapped.category).toBe(ErrorCategory.TRANSIENT);
      expect(wrapped.context).toEqual({ attempt: 2 });
    });

    it('should wrap non-error values', () => {
      const wrapped = wrapError('just a string');
      expect(wrapped.message).toBe('just a string');
      expect(wrapped.cause).toBeInstanceOf(Error);
    });
  });

  describe('formatting', () => {
    it('should prefix agent errors with their name', () => {
      expect(formatError(new UnsupportedOperationError('delete'))).toBe(
        'UnsupportedOperationError: Operation not yet supported: delete'
      );
    });

    it('should print plain errors and values', () => {
      expect(formatError(new Error('plain'))).toBe('plain');
      expect(formatError(42)).toBe('42');
    });

    it('should format for logs', () => {
      expect(formatErrorForLog(new CancellationError('stop'))).toBe(
        '[CancellationError] (CANCELLED) stop context={"reason":"stop"}'
      );
      expect(formatErrorForLog(new Error('plain'))).toBe('[Error] plain');
      expect(formatErrorForLog(null)).toBe('[Unknown] null');
    });

    it('should identify agent errors', () => {
      expect(isAgentError(new CancellationError())).toBe(true);
      expect(isAgentError(new Error('x'))).toBe(false);
    });
  });
});
