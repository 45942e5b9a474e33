#!/usr/bin/env node

import { createProgram } from "./program.js";
import { error } from "./output.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
