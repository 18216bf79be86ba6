/**
 * gpsd-oneshot Public API
 *
 * This module exports all public APIs for use as a library.
 *
 * @example
 * ```typescript
 * import { withSession, pollForFix, summarizeFix } from 'gpsd-oneshot';
 *
 * const result = await withSession({}, session => pollForFix(session));
 * if (result.acquired && result.fix) {
 *   console.log(summarizeFix(result.fix));
 * }
 * ```
 */

// =============================================================================
// Session
// =============================================================================

export {
  GpsSession,
  withSession,
  STATUS_NO_FIX,
  STATUS_FIX,
  STATUS_DGPS_FIX,
} from './gpsd/session.js';
export type { GpsSessionOptions, DilutionOfPrecision } from './gpsd/session.js';

// =============================================================================
// Fix, Reports and Watch Flags
// =============================================================================

export {
  createEmptyFix,
  snapshotFix,
  isValidFix,
  summarizeFix,
  MODE_NOT_SEEN,
  MODE_NO_FIX,
  MODE_2D,
  MODE_3D,
} from './gpsd/fix.js';
export type { GpsFix, FixMode, FixSummary } from './gpsd/fix.js';

export { parseReport } from './gpsd/reports.js';
export type { GpsdReport, TpvReport, SkyReport, Satellite, VersionReport } from './gpsd/reports.js';

export * from './gpsd/watch.js';

export { formatFix, formatSummary, formatSession } from './gpsd/format.js';

// =============================================================================
// Poller
// =============================================================================

export { pollForFix } from './poller.js';
export type { FixSource, PollOptions, PollResult } from './poller.js';

// =============================================================================
// Transport Layer
// =============================================================================

export type { Transport } from './transport/transport.js';
export { BaseTransport } from './transport/transport.js';
export { SocketTransport } from './transport/socket-transport.js';

// =============================================================================
// Configuration
// =============================================================================

export { config } from './config.js';
export type { Config } from './config.js';

// =============================================================================
// MCP Server
// =============================================================================

export { createServer, handleGetFix, handleVersion } from './server.js';
export type { GetFixResult, VersionResult } from './server.js';
