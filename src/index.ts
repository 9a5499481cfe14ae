#!/usr/bin/env node

import "dotenv/config";

import { EXIT_ERROR, EXIT_INTERRUPTED, runCli } from "./cli.js";
import { formatError } from "./errors.js";

const shutdown = new AbortController();

function onSignal(): void {
  // A second interrupt does not wait for the in-flight tick.
  if (shutdown.signal.aborted) {
    process.exit(EXIT_INTERRUPTED);
  }

  shutdown.abort();
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2), { signal: shutdown.signal });
  process.exit(code);
}

main().catch((error) => {
  console.error("Fatal error:", formatError(error));
  process.exit(EXIT_ERROR);
});
