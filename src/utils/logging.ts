/**
 * @fileoverview Logging utilities with namespace support
 *
 * Every module logs through a short namespace tag (e.g. `[Reconcile]`). Verbose output is
 * gated on the DEBUG environment variable or a development NODE_ENV.
 */

function isVerboseEnabled(): boolean {
  return Boolean(process.env.DEBUG) || process.env.NODE_ENV === 'development';
}

/**
 * Log verbose debug message with namespace
 */
export function logVerbose(namespace: string, message: string, ...args: unknown[]): void {
  if (isVerboseEnabled()) {
    console.debug(`[${namespace}]`, message, ...args);
  }
}

/**
 * Log info message with namespace
 */
export function logInfo(namespace: string, message: string, ...args: unknown[]): void {
  console.info(`[${namespace}]`, message, ...args);
}

/**
 * Log warning message with namespace
 */
export function logWarning(namespace: string, message: string, ...args: unknown[]): void {
  console.warn(`[${namespace}]`, message, ...args);
}

/**
 * Log error message with namespace
 */
export function logError(namespace: string, message: string, ...args: unknown[]): void {
  console.error(`[${namespace}]`, message, ...args);
}
