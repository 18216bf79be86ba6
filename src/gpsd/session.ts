import type { Transport } from '../transport/transport.js';
import { SocketTransport } from '../transport/socket-transport.js';
import { config } from '../config.js';
import type { FixSource } from '../poller.js';
import { createEmptyFix, MODE_2D, MODE_NOT_SEEN, type GpsFix } from './fix.js';
import {
  parseReport,
  isTpvReport,
  isSkyReport,
  isVersionReport,
  isDevicesReport,
  isErrorReport,
  type GpsdReport,
  type Satellite,
  type SkyReport,
  type TpvReport,
  type VersionReport,
} from './reports.js';
import { buildWatchCommand, isStreaming, WATCH_DISABLE, WATCH_JSON, WATCH_OLDSTYLE } from './watch.js';

export const STATUS_NO_FIX = 0;
export const STATUS_FIX = 1;
export const STATUS_DGPS_FIX = 2;

// Bits of GpsSession.valid: which parts of the state the last read touched
export const ONLINE_SET = 1 << 1;
export const TIME_SET = 1 << 2;
export const TIMERR_SET = 1 << 3;
export const LATLON_SET = 1 << 4;
export const ALTITUDE_SET = 1 << 5;
export const SPEED_SET = 1 << 6;
export const TRACK_SET = 1 << 7;
export const CLIMB_SET = 1 << 8;
export const STATUS_SET = 1 << 9;
export const MODE_SET = 1 << 10;
export const DOP_SET = 1 << 11;
export const HERR_SET = 1 << 12;
export const VERR_SET = 1 << 13;
export const SATELLITE_SET = 1 << 15;
export const DEVICE_SET = 1 << 19;
export const DEVICELIST_SET = 1 << 20;
export const PACKET_SET = 1 << 25;
export const VERSION_SET = 1 << 28;
export const ERROR_SET = 2 ** 31;

export interface DilutionOfPrecision {
  xdop: number;
  ydop: number;
  pdop: number;
  hdop: number;
  vdop: number;
  tdop: number;
  gdop: number;
}

export interface GpsSessionOptions {
  host?: string;
  port?: number;
  /**
   * Watch flags sent right after connecting. 0 connects without streaming.
   */
  watch?: number;
  /** Device path, only used with WATCH_DEVICE */
  devpath?: string;
  /** 0 = quiet, 1+ = echo received lines to stderr */
  verbose?: number;
  /** Timeout for a single read step; 0 waits forever */
  readTimeoutMs?: number;
  connectTimeoutMs?: number;
  /**
   * Optional custom transport instance. Overrides host/port.
   */
  transport?: Transport;
}

/**
 * A connection to gpsd and the state it has reported so far.
 *
 * The session owns its transport: open() acquires it and close() releases
 * it. Prefer withSession() so the release happens on every exit path.
 */
export class GpsSession implements FixSource {
  readonly fix: GpsFix = createEmptyFix();
  utc: string | null = null;
  device: string | null = null;
  status = STATUS_NO_FIX;
  satellites: Satellite[] = [];
  satellitesUsed = 0;
  readonly dop: DilutionOfPrecision = {
    xdop: NaN, ydop: NaN, pdop: NaN, hdop: NaN, vdop: NaN, tdop: NaN, gdop: NaN,
  };
  version: VersionReport | null = null;
  devices: string[] = [];
  lastError: string | null = null;
  /** Bitmask of *_SET flags for the last read */
  valid = 0;
  /** Last raw line received */
  response = '';
  /** Last parsed report, null when the last line was not JSON */
  data: GpsdReport | null = null;

  private transport: Transport | null = null;
  private streaming = false;
  private watchFlags = 0;
  private readonly options: Required<Omit<GpsSessionOptions, 'transport' | 'devpath'>> & { devpath?: string };
  private readonly providedTransport: Transport | null;

  constructor(options: GpsSessionOptions = {}) {
    this.options = {
      host: options.host ?? config.gpsd.host,
      port: options.port ?? config.gpsd.port,
      watch: options.watch ?? config.gpsd.watch,
      devpath: options.devpath,
      verbose: options.verbose ?? config.gpsd.verbose,
      readTimeoutMs: options.readTimeoutMs ?? config.timeouts.read,
      connectTimeoutMs: options.connectTimeoutMs ?? config.timeouts.connect,
    };
    this.providedTransport = options.transport ?? null;
  }

  /**
   * Connect to gpsd and, if watch flags were given, start streaming.
   */
  async open(): Promise<void> {
    if (this.transport) {
      return;
    }

    const transport = this.providedTransport
      ?? new SocketTransport(this.options.host, this.options.port, {
        connectTimeout: this.options.connectTimeoutMs,
      });
    try {
      await transport.init();
    } catch (error) {
      await transport.close();
      throw error;
    }
    this.transport = transport;
    this.debug(`connected to ${this.options.host}:${this.options.port}`);

    if (this.options.watch) {
      await this.stream(this.options.watch, this.options.devpath);
    }
  }

  /**
   * Ask gpsd to start (or with WATCH_DISABLE, stop) streaming reports.
   */
  async stream(flags: number, devpath?: string): Promise<void> {
    await this.send(buildWatchCommand(flags, devpath));
    this.streaming = isStreaming(flags);
    this.watchFlags = flags;
  }

  async send(command: string): Promise<void> {
    const transport = this.requireTransport();
    this.debug(`send ${command}`);
    await transport.send(`${command}\n`);
  }

  /**
   * Wait for one line from gpsd and fold it into the session state.
   *
   * @returns the parsed report, or null for a non-JSON line
   * @throws when the connection is lost or a JSON report is malformed
   */
  async read(): Promise<GpsdReport | null> {
    const transport = this.requireTransport();
    const line = await transport.readLine(this.options.readTimeoutMs);
    this.debug(`recv ${line}`);

    this.response = line;
    this.valid = ONLINE_SET | PACKET_SET;

    if (!line.startsWith('{')) {
      this.data = null;
      return null;
    }

    const report = parseReport(line);
    this.unpack(report);
    this.data = report;
    return report;
  }

  /**
   * Advance to the next message from gpsd.
   *
   * @throws `gpsd stream exhausted` once gpsd has closed the stream
   */
  async next(): Promise<GpsdReport | null> {
    try {
      return await this.read();
    } catch (error) {
      if (this.transport && !this.transport.isOpen()) {
        throw new Error('gpsd stream exhausted', { cause: error });
      }
      throw error;
    }
  }

  /**
   * Read until a report of the given class arrives.
   */
  async waitForReport(reportClass: string, maxReads: number = 10): Promise<GpsdReport> {
    for (let i = 0; i < maxReads; i++) {
      const report = await this.read();
      if (report?.class === reportClass) {
        return report;
      }
    }
    throw new Error(`No ${reportClass} report within ${maxReads} reads`);
  }

  isOpen(): boolean {
    return this.transport?.isOpen() ?? false;
  }

  /**
   * Stop streaming and close the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    const transport = this.transport;
    if (!transport) {
      return;
    }

    if (this.streaming && transport.isOpen()) {
      const disable = this.watchFlags & WATCH_OLDSTYLE
        ? WATCH_OLDSTYLE | WATCH_DISABLE
        : WATCH_DISABLE | (this.watchFlags & WATCH_JSON);
      try {
        await transport.send(`${buildWatchCommand(disable)}\n`);
      } catch (error) {
        // Closing anyway; a dead peer cannot be told to stop
        this.debug(`watch disable failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    this.transport = null;
    this.streaming = false;
    await transport.close();
    this.debug('closed');
  }

  private unpack(report: GpsdReport): void {
    if (isTpvReport(report)) {
      this.unpackTpv(report);
    } else if (isSkyReport(report)) {
      this.unpackSky(report);
    } else if (isVersionReport(report)) {
      this.version = report;
      this.markValid(VERSION_SET);
    } else if (isDevicesReport(report)) {
      this.devices = report.devices.flatMap(d => (d.path ? [d.path] : []));
      this.markValid(DEVICELIST_SET);
    } else if (isErrorReport(report)) {
      this.lastError = report.message;
      this.markValid(ERROR_SET);
      this.debug(`error report: ${report.message}`);
    }
  }

  private unpackTpv(report: TpvReport): void {
    const fix = this.fix;

    this.device = report.device ?? this.device;
    this.utc = report.time ?? null;
    fix.time = report.time ?? null;
    fix.ept = report.ept ?? NaN;
    fix.latitude = report.lat ?? NaN;
    fix.longitude = report.lon ?? NaN;
    fix.altitude = report.alt ?? NaN;
    fix.epx = report.epx ?? NaN;
    fix.epy = report.epy ?? NaN;
    fix.epv = report.epv ?? NaN;
    fix.track = report.track ?? NaN;
    fix.speed = report.speed ?? NaN;
    fix.climb = report.climb ?? NaN;
    fix.epd = report.epd ?? NaN;
    fix.eps = report.eps ?? NaN;
    fix.epc = report.epc ?? NaN;
    fix.mode = report.mode ?? MODE_NOT_SEEN;
    this.status = report.status ?? (fix.mode >= MODE_2D ? STATUS_FIX : STATUS_NO_FIX);

    const flags: Array<[unknown, number]> = [
      [report.device, DEVICE_SET],
      [report.time, TIME_SET],
      [report.ept, TIMERR_SET],
      [report.lat, LATLON_SET],
      [report.alt, ALTITUDE_SET],
      [report.epx ?? report.epy, HERR_SET],
      [report.epv, VERR_SET],
      [report.track, TRACK_SET],
      [report.speed, SPEED_SET],
      [report.climb, CLIMB_SET],
      [report.mode, MODE_SET],
      [report.status, STATUS_SET],
    ];
    for (const [value, flag] of flags) {
      if (value !== undefined) {
        this.markValid(flag);
      }
    }
  }

  private unpackSky(report: SkyReport): void {
    this.device = report.device ?? this.device;

    const dopKeys = ['xdop', 'ydop', 'pdop', 'hdop', 'vdop', 'tdop', 'gdop'] as const;
    for (const key of dopKeys) {
      const value = report[key];
      if (value !== undefined) {
        this.dop[key] = value;
        this.markValid(DOP_SET);
      }
    }

    if (report.satellites) {
      this.satellites = report.satellites;
      this.satellitesUsed = report.satellites.filter(s => s.used === true).length;
      this.markValid(SATELLITE_SET);
    }
  }

  // Kept unsigned: ERROR_SET is bit 31
  private markValid(flag: number): void {
    this.valid = (this.valid | flag) >>> 0;
  }

  private requireTransport(): Transport {
    if (!this.transport) {
      throw new Error('Session not open');
    }
    return this.transport;
  }

  private debug(message: string): void {
    if (this.options.verbose > 0) {
      console.error(`[GPSD] ${message}`);
    }
  }
}

/**
 * Open a session, hand it to fn, and close it however fn exits.
 */
export async function withSession<T>(
  options: GpsSessionOptions,
  fn: (session: GpsSession) => Promise<T>
): Promise<T> {
  const session = new GpsSession(options);
  try {
    await session.open();
    return await fn(session);
  } finally {
    await session.close();
  }
}
