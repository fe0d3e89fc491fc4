import { describeError } from '../types/errors.js';
import type { Notifier } from '../types/index.js';
import type { Logger } from './logger.js';

/**
 * Runs one user-facing operation. A failure is logged with its context,
 * reported through the notifier and then stops here; the caller gets
 * `undefined` instead of the result.
 */
export async function guard<T>(
  notifier: Notifier,
  logger: Logger,
  context: string,
  operation: () => Promise<T>,
): Promise<T | undefined> {
  try {
    return await operation();
  } catch (error) {
    logger.error('An error occurred', {
      context,
      error,
      type: error instanceof Error ? error.name : typeof error,
    });
    notifier.notify(`An error occurred: ${describeError(error)}`, {
      title: '⛔ Unexpected Error',
      severity: 'error',
    });
    return undefined;
  }
}
