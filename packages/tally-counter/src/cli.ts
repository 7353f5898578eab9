#!/usr/bin/env node

import { logger } from "@tally/utils";
import { createProgram } from "./program";

createProgram()
  .parseAsync()
  .catch((reason) => {
    logger.log();
    logger.error("Unexpected error. Please report it as a bug:");
    logger.log(reason);
    logger.log();
    process.exit(1);
  });
