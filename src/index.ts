#!/usr/bin/env node
import { main } from "./cli/main.js";
import { logger } from "./logger.js";

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error("fatal", { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  });
