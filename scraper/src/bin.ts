#!/usr/bin/env node
import { run } from "./cli";
import { logger } from "./logger";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error("Fatal error", error);
    process.exit(1);
  });
