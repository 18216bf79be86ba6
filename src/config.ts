/**
 * Central configuration for gpsd-oneshot
 *
 * Loads environment variables from .env file (if present) and provides
 * typed defaults for all configurable values. The defaults are the fixed
 * settings the oneshot script has always used.
 *
 * Usage:
 *   import { config } from './config.js';
 *   const session = new GpsSession({
 *     host: config.gpsd.host,
 *     port: config.gpsd.port,
 *   });
 */
import { config as loadDotenv } from 'dotenv';
import { WATCH_ENABLE, WATCH_JSON, WATCH_SCALED } from './gpsd/watch.js';

// Load .env file (no-op if doesn't exist, quiet suppresses promotional message)
loadDotenv({ quiet: true });

/** parseInt that keeps the default when the variable is not a number */
function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = Object.freeze({
  // gpsd connection defaults
  gpsd: {
    host: process.env.GPSD_HOST ?? 'localhost',
    port: intFromEnv(process.env.GPSD_PORT, 2947),
    /** Watch flags sent right after connecting (streaming, JSON, scaled units) */
    watch: WATCH_ENABLE | WATCH_JSON | WATCH_SCALED,
    /**
     * Verbosity level.
     * - 0: quiet
     * - 1+: echo every received line to stderr
     */
    verbose: intFromEnv(process.env.GPSD_VERBOSE, 0),
  },

  // Fix polling
  poll: {
    /** Maximum number of read steps before giving up */
    attempts: intFromEnv(process.env.GPSD_ATTEMPTS, 9),
    /** Sleep between buffer checks while waiting for a line */
    intervalMs: intFromEnv(process.env.GPSD_POLL_INTERVAL, 50),
  },

  // Timeout defaults (milliseconds)
  timeouts: {
    /** Timeout for initial socket connection */
    connect: intFromEnv(process.env.GPSD_TIMEOUT_CONNECT, 10000),
    /** Timeout waiting for one line from gpsd (0 waits forever) */
    read: intFromEnv(process.env.GPSD_TIMEOUT_READ, 0),
  },
});

export type Config = typeof config;
