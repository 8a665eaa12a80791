/**
 * Controlled debug logging for baseline lifecycle traces.
 * Set DEBUG_SPC=true to enable.
 */

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_SPC === "true";
}

export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(...args);
  }
}
