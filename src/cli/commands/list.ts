/**
 * `sprout list` — print the stored session definitions.
 */

import { Command } from "commander";
import pc from "picocolors";
import { listDefinitions } from "../../definition/loader.js";
import { getConfigDir } from "../../utils/pathResolver.js";

export function createListCommand(): Command {
  return new Command("list")
    .description("List all available session definitions")
    .action(async () => {
      const dir = getConfigDir();
      const names = await listDefinitions(dir);

      if (names.length === 0) {
        process.stderr.write(pc.dim(`No session definitions in ${dir}\n`));
        return;
      }

      for (const name of names) {
        process.stdout.write(`${name}\n`);
      }
    });
}
