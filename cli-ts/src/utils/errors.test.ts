import { describe, it, expect } from 'vitest';
import { CLIError, ClusterError, ErrorCode, formatError, unwrapOrThrow } from './errors';
import { ok, err } from '../types';

describe('CLIError.from', () => {
  it('keeps CLI errors and wraps anything else', () => {
    const original = new CLIError('boom', ErrorCode.CHECK_FAILED);
    expect(CLIError.from(original)).toBe(original);

    const wrapped = CLIError.from(new Error('plain'));
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN);
    expect(wrapped.message).toBe('plain');

    expect(CLIError.from('text', ErrorCode.COMMAND_FAILED).code).toBe(ErrorCode.COMMAND_FAILED);
  });
});

describe('ClusterError', () => {
  it('defaults to COMMAND_FAILED', () => {
    expect(new ClusterError('failed').code).toBe(ErrorCode.COMMAND_FAILED);
  });

  it('shows the CLI output and the suggestion', () => {
    const text = formatError(new ClusterError('Cannot connect', {
      code: ErrorCode.CLUSTER_UNREACHABLE,
      suggestion: 'Check your network connection',
      output: 'line one\nline two\n',
    }));

    expect(text).toContain('Error: Cannot connect');
    expect(text).toContain('  line one');
    expect(text).toContain('  line two');
    expect(text).toContain('→ Check your network connection');
  });
});

describe('unwrapOrThrow', () => {
  it('returns data and rethrows CLI errors unchanged', () => {
    expect(unwrapOrThrow(ok(3))).toBe(3);

    const failure = new ClusterError('failed', { code: ErrorCode.CHECK_FAILED });
    expect(() => unwrapOrThrow(err(failure))).toThrow(failure);
  });

  it('wraps other errors with the given code', () => {
    expect.assertions(3);
    const plain = new Error('plain');

    try {
      unwrapOrThrow(err(plain), ErrorCode.COMMAND_FAILED);
    } catch (error) {
      expect(error).toBeInstanceOf(CLIError);
      if (error instanceof CLIError) {
        expect(error.code).toBe(ErrorCode.COMMAND_FAILED);
        expect(error.cause).toBe(plain);
      }
    }
  });
});

describe('ErrorCode', () => {
  it('lists the exit codes commands end with', () => {
    const names = Object.keys(ErrorCode).filter(key => Number.isNaN(Number(key)));

    expect(names).toEqual([
      'UNKNOWN',
      'COMMAND_FAILED',
      'CONFIG_NOT_FOUND',
      'CONFIG_INVALID',
      'TOOL_UNAVAILABLE',
      'NOT_LOGGED_IN',
      'CLUSTER_UNREACHABLE',
      'CHECK_FAILED',
      'PROJECT_NOT_FOUND',
      'DELETION_REQUEST_FAILED',
      'DELETION_TIMED_OUT',
      'VALIDATION_FAILED',
    ]);
  });
});
