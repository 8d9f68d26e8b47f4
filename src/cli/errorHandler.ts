import { logger } from '../logger';
import { GradebookError } from '../errors';

/**
 * Logs a failed command and returns the line to show the user.
 * The menu loop keeps running whatever comes back from here.
 */
export function handleCommandError(err: unknown, command: string): string {
  if (err instanceof GradebookError) {
    logger.info({
      module: 'cli.errorHandler',
      command,
      error_type: err.name,
      error_code: err.code,
      error_message: err.message,
    }, 'Command failed');
    return err.message;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error({
    module: 'cli.errorHandler',
    command,
    error_type: error.name,
    error_message: error.message,
    stack_trace: error.stack,
  }, 'Unhandled error');
  return `Unexpected error: ${error.message}`;
}
