#!/usr/bin/env node

import { parseArgs } from './cli/arg-parser.js';
import { loadConfig } from './cli/config.js';
import { resolveConfig } from './cli/config-resolver.js';
import { printHelp, printVersion } from './cli/help.js';
import { handleRoutesCommand } from './cli/routes-command.js';
import { startAppServer } from './cli/server-starter.js';
import type { ParsedArgs } from './cli/types.js';

function reportFailure(err: unknown, hint?: string): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  if (hint) {
    process.stderr.write(`${hint}\n`);
  }
  process.exitCode = 1;
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  // Handle routes subcommand
  if (argv[0] === 'routes') {
    try {
      await handleRoutesCommand(argv.slice(1));
    } catch (err) {
      reportFailure(err);
    }
    return;
  }

  // Parse CLI arguments
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    reportFailure(err, 'Use --help to see usage.');
    return;
  }

  // Handle help and version flags
  if (args.help) {
    printHelp();
    return;
  }

  if (args.version) {
    await printVersion();
    return;
  }

  // Load and merge configuration
  const { values: fileConfig } = await loadConfig();

  try {
    const config = resolveConfig(args, fileConfig);
    await startAppServer(config);
  } catch (err) {
    reportFailure(err);
  }
}

main().catch((error: unknown) => {
  reportFailure(error);
});
