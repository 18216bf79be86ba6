/**
 * Watch-mode flags and the ?WATCH command they turn into.
 *
 * Flag values match the ones libgps clients pass around, so a bitmask built
 * in another client means the same thing here.
 */

export const WATCH_ENABLE = 0x000001;
export const WATCH_DISABLE = 0x000002;
export const WATCH_JSON = 0x000010;
export const WATCH_NMEA = 0x000020;
export const WATCH_RARE = 0x000040;
export const WATCH_RAW = 0x000080;
export const WATCH_SCALED = 0x000100;
export const WATCH_TIMING = 0x000200;
export const WATCH_DEVICE = 0x000800;
export const WATCH_SPLIT24 = 0x001000;
export const WATCH_PPS = 0x002000;
export const WATCH_NEWSTYLE = 0x010000;
export const WATCH_OLDSTYLE = 0x020000;

/**
 * Build the command that switches streaming on or off for the given flags.
 *
 * @example
 * ```typescript
 * buildWatchCommand(WATCH_ENABLE | WATCH_JSON | WATCH_SCALED);
 * // '?WATCH={"enable":true,"json":true,"scaled":true}'
 * ```
 *
 * @param devpath - Device to watch; only sent when WATCH_DEVICE is set
 */
export function buildWatchCommand(flags: number, devpath?: string): string {
  if (flags & WATCH_OLDSTYLE) {
    return flags & WATCH_DISABLE ? 'w-' : 'w+';
  }

  const enable = (flags & WATCH_DISABLE) === 0;
  const parts: string[] = [`"enable":${enable}`];

  if (flags & WATCH_JSON) parts.push(`"json":${enable}`);
  if (flags & WATCH_NMEA) parts.push(`"nmea":${enable}`);
  if (flags & WATCH_RARE) parts.push('"raw":1');
  if (flags & WATCH_RAW) parts.push('"raw":2');
  if (flags & WATCH_SCALED) parts.push(`"scaled":${enable}`);
  if (flags & WATCH_TIMING) parts.push(`"timing":${enable}`);
  if (flags & WATCH_SPLIT24) parts.push(`"split24":${enable}`);
  if (flags & WATCH_PPS) parts.push(`"pps":${enable}`);
  if (enable && flags & WATCH_DEVICE && devpath) {
    parts.push(`"device":${JSON.stringify(devpath)}`);
  }

  return `?WATCH={${parts.join(',')}}`;
}

/**
 * Whether the flags ask gpsd to start streaming.
 */
export function isStreaming(flags: number): boolean {
  return (flags & WATCH_ENABLE) !== 0 && (flags & WATCH_DISABLE) === 0;
}
