/**
 * Position fix record and the checks made against it.
 */

export const MODE_NOT_SEEN = 0;
export const MODE_NO_FIX = 1;
export const MODE_2D = 2;
export const MODE_3D = 3;

export type FixMode = typeof MODE_NOT_SEEN | typeof MODE_NO_FIX | typeof MODE_2D | typeof MODE_3D;

/**
 * Latest position report held by a session. Mutated in place as TPV
 * reports arrive; readers that need a stable value take a snapshot.
 */
export interface GpsFix {
  mode: FixMode;
  /** ISO-8601 UTC time of the fix, null until one has been reported */
  time: string | null;
  /** Estimated time error (s) */
  ept: number;
  /** Degrees, north positive */
  latitude: number;
  /** Degrees, east positive */
  longitude: number;
  /** Meters above MSL; NaN when unknown */
  altitude: number;
  epx: number;
  epy: number;
  epv: number;
  /** Course over ground, degrees from true north */
  track: number;
  /** m/s */
  speed: number;
  /** m/s, positive up */
  climb: number;
  epd: number;
  eps: number;
  epc: number;
}

/**
 * Fix state before gpsd has reported anything.
 */
export function createEmptyFix(): GpsFix {
  return {
    mode: MODE_NO_FIX,
    time: null,
    ept: NaN,
    latitude: 0.0,
    longitude: 0.0,
    altitude: NaN,
    epx: NaN,
    epy: NaN,
    epv: NaN,
    track: NaN,
    speed: NaN,
    climb: NaN,
    epd: NaN,
    eps: NaN,
    epc: NaN,
  };
}

export function snapshotFix(fix: Readonly<GpsFix>): GpsFix {
  return { ...fix };
}

/**
 * Heuristic acquisition check: an unacquired fix still carries the zeroed
 * coordinates and NaN altitude of createEmptyFix(). A real fix at exactly
 * 0°N or 0°E is therefore rejected too.
 */
export function isValidFix(fix: Readonly<GpsFix>): boolean {
  return fix.latitude !== 0.0 && fix.longitude !== 0.0 && !Number.isNaN(fix.altitude);
}

/**
 * (latitude, longitude, altitude, time) as printed at the end of a poll.
 */
export type FixSummary = [latitude: number, longitude: number, altitude: number, time: string | null];

export function summarizeFix(fix: Readonly<GpsFix>): FixSummary {
  return [fix.latitude, fix.longitude, fix.altitude, fix.time];
}
