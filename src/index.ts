#!/usr/bin/env node
/**
 * gpsd-oneshot MCP Entry Point
 *
 * Serves the get_fix and gpsd_version tools over stdio.
 *
 * @example
 * ```bash
 * gpsd-oneshot-mcp
 * GPSD_HOST=192.168.1.20 gpsd-oneshot-mcp
 * ```
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';

// Library API re-exports (for direct imports from 'gpsd-oneshot')
export * from './lib.js';

async function main(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[MCP] gpsd-oneshot server running on stdio');
}

// Only runs when executed directly, not when imported
if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
