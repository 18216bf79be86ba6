/**
 * Schemas for the JSON reports gpsd streams in watch mode.
 *
 * Only the members the session unpacks are declared; everything else a
 * report carries is kept via passthrough().
 */

import { z } from 'zod';

const fixModeSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

export const tpvReportSchema = z.object({
  class: z.literal('TPV'),
  device: z.string().optional(),
  mode: fixModeSchema.optional(),
  status: z.number().int().optional(),
  time: z.string().optional(),
  ept: z.number().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  alt: z.number().optional(),
  epx: z.number().optional(),
  epy: z.number().optional(),
  epv: z.number().optional(),
  track: z.number().optional(),
  speed: z.number().optional(),
  climb: z.number().optional(),
  epd: z.number().optional(),
  eps: z.number().optional(),
  epc: z.number().optional(),
}).passthrough();

export const satelliteSchema = z.object({
  PRN: z.number().int(),
  el: z.number().optional(),
  az: z.number().optional(),
  ss: z.number().optional(),
  used: z.boolean().optional(),
}).passthrough();

export const skyReportSchema = z.object({
  class: z.literal('SKY'),
  device: z.string().optional(),
  time: z.string().optional(),
  xdop: z.number().optional(),
  ydop: z.number().optional(),
  vdop: z.number().optional(),
  tdop: z.number().optional(),
  hdop: z.number().optional(),
  gdop: z.number().optional(),
  pdop: z.number().optional(),
  satellites: z.array(satelliteSchema).optional(),
}).passthrough();

export const versionReportSchema = z.object({
  class: z.literal('VERSION'),
  release: z.string(),
  rev: z.string().optional(),
  proto_major: z.number().int(),
  proto_minor: z.number().int(),
}).passthrough();

export const deviceSchema = z.object({
  path: z.string().optional(),
  driver: z.string().optional(),
  activated: z.string().optional(),
}).passthrough();

export const devicesReportSchema = z.object({
  class: z.literal('DEVICES'),
  devices: z.array(deviceSchema),
}).passthrough();

export const watchReportSchema = z.object({
  class: z.literal('WATCH'),
  enable: z.boolean().optional(),
  json: z.boolean().optional(),
  scaled: z.boolean().optional(),
}).passthrough();

export const errorReportSchema = z.object({
  class: z.literal('ERROR'),
  message: z.string(),
}).passthrough();

const otherReportSchema = z.object({
  class: z.string(),
}).passthrough();

export type TpvReport = z.infer<typeof tpvReportSchema>;
export type SkyReport = z.infer<typeof skyReportSchema>;
export type Satellite = z.infer<typeof satelliteSchema>;
export type VersionReport = z.infer<typeof versionReportSchema>;
export type DevicesReport = z.infer<typeof devicesReportSchema>;
export type WatchReport = z.infer<typeof watchReportSchema>;
export type ErrorReport = z.infer<typeof errorReportSchema>;
export type OtherReport = z.infer<typeof otherReportSchema>;

export type GpsdReport =
  | TpvReport
  | SkyReport
  | VersionReport
  | DevicesReport
  | WatchReport
  | ErrorReport
  | OtherReport;

const schemasByClass: Partial<Record<string, z.ZodType<GpsdReport, z.ZodTypeDef, unknown>>> = {
  TPV: tpvReportSchema,
  SKY: skyReportSchema,
  VERSION: versionReportSchema,
  DEVICES: devicesReportSchema,
  WATCH: watchReportSchema,
  ERROR: errorReportSchema,
};

/**
 * Parse one JSON line from gpsd into a typed report.
 * Throws on invalid JSON, a missing class, or a known class whose members
 * have the wrong types.
 */
export function parseReport(line: string): GpsdReport {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new Error(`Malformed gpsd response: ${line}`, { cause: error });
  }

  const base = otherReportSchema.safeParse(raw);
  if (!base.success) {
    throw new Error(`gpsd response has no class: ${line}`, { cause: base.error });
  }

  const schema = schemasByClass[base.data.class];
  if (!schema) {
    return base.data;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Malformed ${base.data.class} report: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function isTpvReport(report: GpsdReport): report is TpvReport {
  return report.class === 'TPV';
}

export function isSkyReport(report: GpsdReport): report is SkyReport {
  return report.class === 'SKY';
}

export function isVersionReport(report: GpsdReport): report is VersionReport {
  return report.class === 'VERSION';
}

export function isDevicesReport(report: GpsdReport): report is DevicesReport {
  return report.class === 'DEVICES';
}

export function isErrorReport(report: GpsdReport): report is ErrorReport {
  return report.class === 'ERROR';
}
