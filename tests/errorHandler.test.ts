import { describe, it, expect, vi, afterEach } from 'vitest';
import { handleCommandError } from '../src/cli/errorHandler';
import { DuplicateError } from '../src/errors';
import { logger } from '../src/logger';

describe('handleCommandError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the message of a gradebook error', () => {
    const info = vi.spyOn(logger, 'info');

    expect(handleCommandError(new DuplicateError('Alice'), 'add')).toBe("Student 'Alice' already exists");
    expect(info).toHaveBeenCalledWith(
      expect.objectContaining({ module: 'cli.errorHandler', command: 'add', error_code: 'DUPLICATE' }),
      'Command failed',
    );
  });

  it('reports anything else as unexpected', () => {
    const error = vi.spyOn(logger, 'error');

    expect(handleCommandError(new Error('boom'), 'list')).toBe('Unexpected error: boom');
    expect(handleCommandError('oops', 'list')).toBe('Unexpected error: oops');
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ module: 'cli.errorHandler', command: 'list', error_message: 'boom' }),
      'Unhandled error',
    );
  });
});
