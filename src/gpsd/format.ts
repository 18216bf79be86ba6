/**
 * Human-readable renderings of fixes and sessions.
 */

import { MODE_2D, MODE_3D, MODE_NO_FIX, MODE_NOT_SEEN, type FixMode, type FixSummary, type GpsFix } from './fix.js';
import type { GpsSession } from './session.js';

const MODE_NAMES: Record<FixMode, string> = {
  [MODE_NOT_SEEN]: 'MODE_ZERO',
  [MODE_NO_FIX]: 'MODE_NO_FIX',
  [MODE_2D]: 'MODE_2D',
  [MODE_3D]: 'MODE_3D',
};

const STATUS_NAMES = ['STATUS_NO_FIX', 'STATUS_FIX', 'STATUS_DGPS_FIX'];

/**
 * The parts of a session formatSession() prints.
 */
export type SessionView = Pick<
  GpsSession,
  'fix' | 'utc' | 'status' | 'satellites' | 'satellitesUsed' | 'dop'
>;

function decimal(value: number): string {
  return value.toFixed(6);
}

function optionalDecimal(value: number): string {
  return Number.isNaN(value) ? '?' : decimal(value);
}

function timeOf(time: string | null): string {
  return time ?? 'n/a';
}

export function modeName(mode: FixMode): string {
  return MODE_NAMES[mode];
}

export function statusName(status: number): string {
  return STATUS_NAMES[status] ?? `STATUS_${status}`;
}

/**
 * One status line, printed after every read step.
 */
export function formatFix(fix: Readonly<GpsFix>): string {
  return [
    `mode=${modeName(fix.mode)}`,
    `time=${timeOf(fix.time)}`,
    `lat=${decimal(fix.latitude)}`,
    `lon=${decimal(fix.longitude)}`,
    `alt=${optionalDecimal(fix.altitude)}`,
  ].join(' ');
}

/**
 * Render the summary tuple, e.g. `(48.85, 2.35, 35, 2026-10-19T08:00:00.000Z)`.
 */
export function formatSummary([latitude, longitude, altitude, time]: FixSummary): string {
  return `(${latitude}, ${longitude}, ${altitude}, ${timeOf(time)})`;
}

/**
 * Multi-line dump of everything the session has learned.
 */
export function formatSession(session: SessionView): string {
  const { fix, dop } = session;
  const lines = [
    `Time:     ${timeOf(session.utc)} (${timeOf(fix.time)})`,
    `Lat/Lon:  ${decimal(fix.latitude)} ${decimal(fix.longitude)}`,
    `Altitude: ${optionalDecimal(fix.altitude)}`,
    `Speed:    ${optionalDecimal(fix.speed)}`,
    `Track:    ${optionalDecimal(fix.track)}`,
    `Climb:    ${optionalDecimal(fix.climb)}`,
    `Status:   ${statusName(session.status)}`,
    `Mode:     ${modeName(fix.mode)}`,
    `Quality:  ${session.satellitesUsed} p=${dop.pdop.toFixed(2)} h=${dop.hdop.toFixed(2)} v=${dop.vdop.toFixed(2)} t=${dop.tdop.toFixed(2)} g=${dop.gdop.toFixed(2)}`,
    `Y: ${session.satellites.length} satellites in view:`,
  ];

  for (const sat of session.satellites) {
    const el = sat.el ?? NaN;
    const az = sat.az ?? NaN;
    const ss = sat.ss ?? NaN;
    lines.push(`    PRN: ${sat.PRN}  E: ${el}  Az: ${az}  Ss: ${ss}  Used: ${sat.used ? 'y' : 'n'}`);
  }

  return lines.join('\n');
}
