#!/usr/bin/env tsx
import "./setup-env";
import { createProgram } from "./cli";
import { formatErrorChain } from "./errors";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("Command failed:", formatErrorChain(error));
    process.exit(1);
  });
