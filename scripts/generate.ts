#!/usr/bin/env node

import { runGenerate } from "../src/cli/generate";

runGenerate(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  },
);
