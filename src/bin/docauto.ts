#!/usr/bin/env node
// CLI entry point for docauto

import { DocautoCli } from "../cli.js";

const cli = new DocautoCli();

const onSignal = (): void => {
  if (cli.requestShutdown()) {
    process.stderr.write("[ERROR] Forced exit\n");
    process.exit(1);
  }
};
process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

cli
  .run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`[ERROR] ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
