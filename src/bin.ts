#!/usr/bin/env node
import { createProgram } from "./cli";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("Error locating text:", error);
    process.exitCode = 1;
  });
