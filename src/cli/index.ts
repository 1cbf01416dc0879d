#!/usr/bin/env node

/**
 * Health Sheets Sync CLI
 *
 * Pulls recent health and activity metrics into a Google Sheets spreadsheet.
 */

import { Command } from "commander";

import { registerSourcesCommand } from "./commands/sources.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("health-sync")
  .description("Sync health and activity metrics into Google Sheets")
  .version("0.1.0");

registerSyncCommand(program);
registerSourcesCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
