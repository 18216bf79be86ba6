/**
 * Fix Poller
 *
 * Reads from a fix source a bounded number of times and stops as soon as
 * the fix passes isValidFix().
 */

import { config } from './config.js';
import { isValidFix, snapshotFix, type GpsFix } from './gpsd/fix.js';
import { logProgress } from './utils/progress.js';

/**
 * Anything that holds a fix and can be stepped through new data.
 * GpsSession is the production implementation.
 */
export interface FixSource {
  /** Block until one unit of data has been consumed */
  read(): Promise<unknown>;
  /** Advance to the next buffered message */
  next(): Promise<unknown>;
  readonly fix: Readonly<GpsFix>;
}

export interface PollOptions {
  /** Maximum read steps (default: config.poll.attempts) */
  attempts?: number;
  /** Called with the fix after every read step */
  onStatus?: (fix: Readonly<GpsFix>, attempt: number) => void;
  /** Progress messages, for MCP progress notifications */
  onProgress?: (msg: string) => void;
}

export interface PollResult {
  /** Whether the last evaluated fix passed isValidFix() */
  acquired: boolean;
  /** Number of read steps performed */
  attempts: number;
  /**
   * Snapshot of the final fix state: the accepted fix, or after an exhausted
   * loop the fix as the last next() left it. null if no read happened.
   */
  fix: GpsFix | null;
}

export async function pollForFix(source: FixSource, options: PollOptions = {}): Promise<PollResult> {
  const maxAttempts = options.attempts ?? config.poll.attempts;
  let attempts = 0;

  while (attempts < maxAttempts) {
    await source.read();
    attempts++;

    const observed = snapshotFix(source.fix);
    options.onStatus?.(observed, attempts);

    if (isValidFix(observed)) {
      logProgress(`Fix acquired after ${attempts} read(s)`, options.onProgress);
      return { acquired: true, attempts, fix: observed };
    }

    logProgress(`No fix yet (${attempts}/${maxAttempts})`, options.onProgress);
    await source.next();
  }

  // Nothing is read here; the snapshot matches what a session dump shows
  return { acquired: false, attempts, fix: attempts > 0 ? snapshotFix(source.fix) : null };
}
