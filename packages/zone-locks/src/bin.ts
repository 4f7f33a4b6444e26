#!/usr/bin/env node

import { main } from "./cli.js";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Fatal:", error instanceof Error ? error.message : String(error));
    process.exitCode = 0;
  },
);
