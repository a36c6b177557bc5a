#!/usr/bin/env node
import { Command } from "commander";
import { PACKAGE_VERSION } from "@neocities-sync/shared";
import { syncCommand } from "./commands/sync.js";
import { configCommand } from "./commands/config.js";
import { initCommand } from "./commands/init.js";
import { CONFIG_HELP } from "./lib/help.js";

const program = new Command();

program
  .name("neocities-sync")
  .description("Sync local directories with neocities.org sites")
  .version(PACKAGE_VERSION, "-V, --version")
  .addHelpText("after", CONFIG_HELP);

program.addCommand(syncCommand, { isDefault: true });
program.addCommand(configCommand);
program.addCommand(initCommand);

await program.parseAsync();
