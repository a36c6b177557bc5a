import { existsSync, readFileSync } from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { toError } from "@neocities-sync/shared";
import { CONFIG_FILE, CONFIG_FILE_DISPLAY, appendSiteConfig, parseConfig } from "../lib/config.js";
import {
  confirmAction,
  promptAllowedExtensions,
  promptApiKey,
  promptRootDir,
  promptSiteName,
} from "../lib/prompts.js";

export const initCommand = new Command("init")
  .description("Add a site to the config file")
  .option("-C, --config-file <path>", `config file to write (default "${CONFIG_FILE_DISPLAY}")`, CONFIG_FILE)
  .action(async (options: { configFile: string }) => {
    console.log(chalk.bold("\nneocities-sync: add a site\n"));

    let existing: Set<string>;
    try {
      existing = existsSync(options.configFile)
        ? new Set(parseConfig(readFileSync(options.configFile, "utf-8")).keys())
        : new Set<string>();
    } catch (error) {
      console.error(chalk.red(`Error: ${toError(error).message}`));
      console.error(chalk.dim("  Fix the config file before adding another site."));
      process.exit(1);
    }

    const site = await promptSiteName(existing);
    const apiKey = await promptApiKey();
    const rootDir = await promptRootDir(process.cwd());
    const allowedExtensions = await promptAllowedExtensions();

    if (!existsSync(options.configFile)) {
      const create = await confirmAction(`Create ${options.configFile}?`);
      if (!create) {
        console.log(chalk.dim("Nothing written."));
        return;
      }
    }

    try {
      appendSiteConfig(options.configFile, site, { apiKey, rootDir, allowedExtensions });
    } catch (error) {
      console.error(chalk.red(`Error: ${toError(error).message}`));
      process.exit(1);
    }

    console.log(chalk.green(`\n✓ Added "${site}" to ${options.configFile}`));
    console.log(chalk.dim(`  Run "neocities-sync --site ${site} --dry-run" to preview the first sync.`));
  });
