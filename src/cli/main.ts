#!/usr/bin/env node
/**
 * igdeal — command line entry point.
 */

import { buildProgram } from "./program.js";
import { logger } from "../utils/logger.js";
import { DealingError } from "../utils/errors.js";

async function main(argv: string[]): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

main(process.argv).catch((err: unknown) => {
  if (err instanceof DealingError) {
    process.stderr.write(`igdeal: ${err.message}\n`);
    logger.debug("Command failed", { error: err });
    process.exitCode = 1;
    return;
  }
  logger.error("Fatal error", { error: err });
  process.exitCode = 1;
});
