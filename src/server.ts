import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { config } from './config.js';
import { createEmptyFix, summarizeFix, type FixSummary } from './gpsd/fix.js';
import { formatFix, formatSummary } from './gpsd/format.js';
import { withSession, type GpsSessionOptions } from './gpsd/session.js';
import { isVersionReport } from './gpsd/reports.js';
import { pollForFix } from './poller.js';

const DEBUG = process.env.GPSD_MCP_DEBUG === '1';

/**
 * Helper to create a success response.
 */
function successResponse(text: string): CallToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

/**
 * Helper to create an error response.
 * In debug mode, prefixes the tool name.
 */
function errorResponse(action: string, error: unknown): CallToolResult {
  const message = error instanceof Error ? error.message : String(error);
  if (DEBUG) {
    console.error(`[MCP] ${action} failed:`, error);
  }
  return {
    content: [{ type: 'text', text: DEBUG ? `${action}: ${message}` : message }],
    isError: true,
  };
}

// Input schemas - defaults come from config
export const getFixInputSchema = z.object({
  host: z.string().optional().default(config.gpsd.host).describe('gpsd host'),
  port: z.number().int().optional().default(config.gpsd.port).describe('gpsd port'),
  attempts: z.number().int().positive().optional().default(config.poll.attempts)
    .describe('Maximum number of reads before giving up'),
});

export const versionInputSchema = z.object({
  host: z.string().optional().default(config.gpsd.host).describe('gpsd host'),
  port: z.number().int().optional().default(config.gpsd.port).describe('gpsd port'),
});

export interface GetFixResult {
  acquired: boolean;
  attempts: number;
  summary: FixSummary;
  /** Status line per read, in order */
  statusLines: string[];
}

/**
 * Poll gpsd once for a fix.
 *
 * @param sessionOverrides - extra session options (tests pass a transport here)
 */
export async function handleGetFix(
  rawInput: z.input<typeof getFixInputSchema>,
  sessionOverrides: Partial<GpsSessionOptions> = {}
): Promise<GetFixResult> {
  // Parse input to apply defaults
  const input = getFixInputSchema.parse(rawInput);
  const statusLines: string[] = [];

  return withSession(
    { host: input.host, port: input.port, watch: config.gpsd.watch, ...sessionOverrides },
    async (session) => {
      const result = await pollForFix(session, {
        attempts: input.attempts,
        onStatus: (fix) => statusLines.push(formatFix(fix)),
      });
      return {
        acquired: result.acquired,
        attempts: result.attempts,
        summary: summarizeFix(result.fix ?? createEmptyFix()),
        statusLines,
      };
    }
  );
}

export interface VersionResult {
  release: string;
  protocol: string;
}

/**
 * Connect without watching and read the VERSION banner gpsd sends first.
 */
export async function handleVersion(
  rawInput: z.input<typeof versionInputSchema>,
  sessionOverrides: Partial<GpsSessionOptions> = {}
): Promise<VersionResult> {
  const input = versionInputSchema.parse(rawInput);

  return withSession(
    { host: input.host, port: input.port, watch: 0, ...sessionOverrides },
    async (session) => {
      const report = await session.waitForReport('VERSION');
      if (!isVersionReport(report)) {
        throw new Error(`Unexpected ${report.class} report`);
      }
      return {
        release: report.release,
        protocol: `${report.proto_major}.${report.proto_minor}`,
      };
    }
  );
}

export function createServer(): McpServer {
  const server = new McpServer({
    name: 'gpsd-oneshot',
    version: '0.1.0',
  });

  server.registerTool(
    'get_fix',
    {
      description: 'Poll gpsd for a position fix. Stops at the first valid fix or after the attempt budget; returns (latitude, longitude, altitude, time).',
      inputSchema: getFixInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: true,
      },
    },
    async (args) => {
      try {
        const result = await handleGetFix(args);
        const outcome = result.acquired
          ? `Fix acquired after ${result.attempts} read(s)`
          : `No valid fix after ${result.attempts} read(s)`;
        return successResponse(`${outcome}\n${formatSummary(result.summary)}`);
      } catch (error) {
        return errorResponse('get_fix', error);
      }
    }
  );

  server.registerTool(
    'gpsd_version',
    {
      description: 'Report the gpsd release and protocol version.',
      inputSchema: versionInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async (args) => {
      try {
        const result = await handleVersion(args);
        return successResponse(`gpsd ${result.release} (protocol ${result.protocol})`);
      } catch (error) {
        return errorResponse('gpsd_version', error);
      }
    }
  );

  return server;
}
