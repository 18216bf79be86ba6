/**
 * Shared utilities for progress reporting
 */

/**
 * Forward a progress message if anyone is listening.
 */
export function logProgress(message: string, onProgress?: (msg: string) => void): void {
  onProgress?.(message);
}

/**
 * Progress sink that writes prefixed lines to stderr, keeping stdout clean
 * for the script's own output.
 */
export function stderrProgress(prefix: string): (msg: string) => void {
  return (msg: string) => console.error(`[${prefix}] ${msg}`);
}
