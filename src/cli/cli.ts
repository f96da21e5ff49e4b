#!/usr/bin/env node

/**
 * sprout — start pre-defined tmux sessions declaratively.
 */

import pc from "picocolors";
import { run } from "./program.js";

run(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(
      pc.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`),
    );
    process.exit(1);
  });
