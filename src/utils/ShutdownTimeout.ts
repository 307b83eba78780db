/**
 * @fileoverview Deadlines for the shutdown sequence.
 *
 * Stopping the API server waits for open connections, and saving the catalog or the
 * configuration touches the disk. Each step is bounded so a stuck client cannot keep the
 * process alive, and a hard deadline ends the process if the whole sequence overruns.
 *
 * Key exports:
 * - TimeoutError: rejection reason of a bounded step
 * - withTimeout(): races a promise against a timer
 * - createHardDeadline(): exits the process with code 1 once the deadline passes
 */

import { logError, logWarning } from './logging';

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface TimeoutOptions {
  readonly timeoutMs: number;
  readonly operation: string;
  readonly silent?: boolean;
}

/**
 * Settle with the promise, or reject with TimeoutError when the timer fires first.
 * The timer is cleared either way.
 *
 * @example
 * ```typescript
 * await withTimeout(server.stop(), { timeoutMs: 5000, operation: 'stop API server' });
 * ```
 */
export async function withTimeout<T>(promise: Promise<T>, options: TimeoutOptions): Promise<T> {
  const { timeoutMs, operation, silent = false } = options;
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      if (!silent) {
        logWarning('Shutdown', `Timeout: ${operation} (${timeoutMs}ms)`);
      }
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Exit with code 1 once `timeoutMs` elapses; clear the returned handle when shutdown completes.
 * The timer does not keep the event loop alive on its own.
 */
export function createHardDeadline(timeoutMs: number): NodeJS.Timeout {
  const handle = setTimeout(() => {
    logError('Shutdown', `HARD DEADLINE (${timeoutMs}ms) exceeded - forcing exit`);
    process.exit(1);
  }, timeoutMs);
  handle.unref();
  return handle;
}
