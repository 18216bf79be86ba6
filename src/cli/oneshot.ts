#!/usr/bin/env node
/**
 * Poll gpsd for a position fix and print it
 * Usage: gpsd-oneshot
 *
 * Connects to the configured gpsd (localhost:2947 unless GPSD_HOST /
 * GPSD_PORT say otherwise), prints the fix after each read, stops at the
 * first valid fix or after the attempt budget, then prints the summary
 * tuple and a dump of the session. Finding no fix is not an error.
 */

import { config } from '../config.js';
import { formatFix, formatSession, formatSummary } from '../gpsd/format.js';
import { createEmptyFix, summarizeFix } from '../gpsd/fix.js';
import { withSession } from '../gpsd/session.js';
import { pollForFix } from '../poller.js';
import { stderrProgress } from '../utils/progress.js';

export async function main(): Promise<void> {
  await withSession(
    {
      host: config.gpsd.host,
      port: config.gpsd.port,
      watch: config.gpsd.watch,
      verbose: config.gpsd.verbose,
    },
    async (session) => {
      const result = await pollForFix(session, {
        attempts: config.poll.attempts,
        onStatus: (fix) => console.log(formatFix(fix)),
        onProgress: config.gpsd.verbose > 0 ? stderrProgress('POLL') : undefined,
      });

      console.log(formatSummary(summarizeFix(result.fix ?? createEmptyFix())));
      console.log(formatSession(session));
    }
  );
}

/**
 * Run the script and map the outcome to an exit code: 0 when the poll ran to
 * completion (fix or not), 1 when an error propagated.
 */
export async function run(): Promise<number> {
  try {
    await main();
    return 0;
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

// Only runs when executed directly, not when imported
if (require.main === module) {
  void run().then((code) => {
    process.exitCode = code;
  });
}
