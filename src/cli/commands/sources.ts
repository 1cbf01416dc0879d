import { SOURCE_NAMES, SOURCES } from "../../sources/index.js";
import { displaySourcesTable } from "../utils/display.js";

import type { Command } from "commander";

export function registerSourcesCommand(program: Command): void {
  program
    .command("sources")
    .description("List the sources that can be synced")
    .action(() => {
      displaySourcesTable(SOURCE_NAMES.map((name) => SOURCES[name]));
    });
}
