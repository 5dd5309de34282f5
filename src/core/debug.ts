/**
 * Debug logging.
 *
 * Activated by setting NESTARRAY_DEBUG=1 environment variable.
 * When disabled, debugLog is a no-op.
 */

let debugEnabled =
  typeof process !== "undefined" && !!process.env?.NESTARRAY_DEBUG;

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/** Override the environment setting (returns the previous value). */
export function setDebugEnabled(enabled: boolean): boolean {
  const previous = debugEnabled;
  debugEnabled = enabled;
  return previous;
}

export function debugLog(scope: string, message: string): void {
  if (!debugEnabled) return;
  console.debug(`[${scope}] ${message}`);
}
