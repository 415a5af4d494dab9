#!/usr/bin/env node
/**
 * One-shot check from the command line.
 *
 * Usage: check-once <scope> [--refresh]
 *
 * Prints the check report as JSON on stdout.
 * Exit codes: 0 nothing new, 2 new events found, 1 error.
 */
import { runCheck } from "../workers/check.worker";
import { logger } from "../monitoring/logger";

export const EXIT_CODES = {
  OK: 0,
  ERROR: 1,
  NEW_EVENTS: 2,
} as const;

export interface CliArgs {
  scope: string;
  refresh: boolean;
}

export const USAGE = "Usage: check-once <scope> [--refresh]";

/** Parse argv (without node and script path); null when unusable */
export function parseArgs(argv: string[]): CliArgs | null {
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  const flags = argv.filter((arg) => arg.startsWith("--"));

  if (positional.length !== 1) return null;
  if (flags.some((flag) => flag !== "--refresh")) return null;

  return { scope: positional[0], refresh: flags.includes("--refresh") };
}

/**
 * Run one check and map its outcome to an exit code.
 */
export async function runCli(
  argv: string[],
  check: typeof runCheck = runCheck,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): Promise<number> {
  const args = parseArgs(argv);
  if (!args) {
    process.stderr.write(`${USAGE}\n`);
    return EXIT_CODES.ERROR;
  }

  try {
    const report = await check(args.scope, { refresh: args.refresh });
    write(JSON.stringify(report, null, 2));
    return report.newEvents.length > 0 ? EXIT_CODES.NEW_EVENTS : EXIT_CODES.OK;
  } catch (error) {
    logger.error({ error: (error as Error).message }, "check-once failed");
    return EXIT_CODES.ERROR;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ error: (error as Error).message }, "check-once crashed");
      process.exitCode = EXIT_CODES.ERROR;
    }
  );
}
