import { setTimeout as sleep } from 'node:timers/promises';
import { ElementTimeoutError } from '../types/errors.js';

export interface PollOptions {
  intervalMs?: number;
  attempts?: number;
  description?: string;
}

/**
 * Calls `query` until it returns something other than `undefined` or stops
 * throwing, waiting `intervalMs` between attempts. Gives up with an
 * {@link ElementTimeoutError} once the attempt budget is spent.
 */
export async function pollUntil<T>(query: () => T | undefined, options: PollOptions = {}): Promise<T> {
  const { intervalMs = 100, attempts = 50, description = 'UI element' } = options;

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      const value = query();
      if (value !== undefined) {
        return value;
      }
    } catch (error) {
      lastError = error;
    }
    await sleep(intervalMs);
  }

  throw new ElementTimeoutError(description, intervalMs * attempts, { cause: lastError });
}
