#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./lib/cli";

createProgram()
  .parseAsync(process.argv)
  .catch(() => {
    // Already reported by the command's logger.
    process.exit(1);
  });
