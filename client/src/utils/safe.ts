/**
 * Safe Wrappers
 *
 * Utility functions to wrap risky operations and prevent host app crashes.
 *
 * @module utils/safe
 */

import { getLogger, type Logger } from "./logger";

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Safely execute a function, catching and logging errors
 *
 * @param fn - Function to execute
 * @param logger - Logger instance (defaults to the SDK logger)
 * @param context - Label included in the error log
 * @returns The function's result, or undefined if it threw
 */
export function safeTry<T>(
  fn: () => T,
  logger?: Logger,
  context?: string
): T | undefined {
  try {
    return fn();
  } catch (error) {
    const log = logger ?? getLogger();
    log.logError(`${context ?? "safeTry"} failed: ${describeError(error)}`, error);
    return undefined;
  }
}

/**
 * Safely execute an async function
 *
 * @returns Promise that resolves to result or undefined
 */
export async function safeTryAsync<T>(
  fn: () => Promise<T>,
  logger?: Logger,
  context?: string
): Promise<T | undefined> {
  try {
    return await fn();
  } catch (error) {
    const log = logger ?? getLogger();
    log.logError(`${context ?? "safeTryAsync"} failed: ${describeError(error)}`, error);
    return undefined;
  }
}
