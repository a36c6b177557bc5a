import { Command } from "commander";
import chalk from "chalk";
import { toError } from "@neocities-sync/shared";
import { CONFIG_FILE, CONFIG_FILE_DISPLAY, formatSiteConfig, loadConfigFile, selectSites } from "../lib/config.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const configCommand = new Command("config")
  .description("Show the parsed configuration (API keys redacted)")
  .option("-s, --site <name>", "site to show (repeatable; default all)", collect, [])
  .option("-C, --config-file <path>", `config file to use (default "${CONFIG_FILE_DISPLAY}")`, CONFIG_FILE)
  .action((options: { site: string[]; configFile: string }) => {
    try {
      const sites = selectSites(loadConfigFile(options.configFile), options.site);
      console.log(chalk.dim(`# ${options.configFile}`));
      for (const [name, config] of sites) {
        console.log(`\n${chalk.bold(`[${name}]`)}`);
        for (const line of formatSiteConfig(config).split("\n")) {
          console.log(`  ${line}`);
        }
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${toError(error).message}`));
      process.exit(1);
    }
  });
