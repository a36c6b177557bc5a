import { Command, InvalidArgumentError } from "commander";
import ora, { type Ora } from "ora";
import { toError } from "@neocities-sync/shared";
import type { SiteConfig } from "@neocities-sync/shared";
import { CONFIG_FILE, CONFIG_FILE_DISPLAY, loadConfigFile, selectSites } from "../lib/config.js";
import { Logger } from "../lib/logger.js";
import { CONFIG_HELP } from "../lib/help.js";
import { NeocitiesClient } from "../lib/neocities.js";
import { exitCodeFor, runSync, type ProgressReporter } from "../sync/runner.js";

interface SyncCommandOptions {
  site: string[];
  configFile: string;
  dryRun: boolean;
  verbose: number;
  quiet: number;
  concurrency?: number;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function increase(_value: string | undefined, previous: number): number {
  return previous + 1;
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export const syncCommand = new Command("sync")
  .description("Sync local directories with their sites (default command)")
  .option("-s, --site <name>", "site to sync, as named in the config file (repeatable; default all)", collect, [])
  .option("-C, --config-file <path>", `config file to use (default "${CONFIG_FILE_DISPLAY}")`, CONFIG_FILE)
  .option("-d, --dry-run", "show what would change without changing anything", false)
  .option("-v, --verbose", "more output (repeatable)", increase, 0)
  .option("-q, --quiet", "less output (repeatable)", increase, 0)
  .option("--concurrency <n>", "transfers run at once", parseConcurrency)
  .addHelpText("after", CONFIG_HELP)
  .action(async (options: SyncCommandOptions) => {
    // Spinner lines are cleared around log output so the two don't interleave
    let spinner: Ora | null = null;
    const logger = new Logger({
      verbosity: options.verbose - options.quiet,
      write: (stream, text) => {
        spinner?.clear();
        process[stream].write(text);
        spinner?.render();
      },
    });

    let sites: Array<[string, SiteConfig]>;
    try {
      sites = selectSites(loadConfigFile(options.configFile), options.site);
    } catch (error) {
      logger.fatal(toError(error).message);
      process.exit(1);
    }

    const progress: ProgressReporter = {
      start: (text) => {
        const current = ora({ text, isSilent: !logger.isEnabled("info") }).start();
        spinner = current;
        const done = (finish: () => void) => {
          finish();
          if (spinner === current) spinner = null;
        };
        return {
          succeed: (message) => done(() => current.succeed(message)),
          fail: (message) => done(() => current.fail(message)),
        };
      },
    };

    const controller = new AbortController();
    const onInterrupt = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      logger.warn("Interrupted: letting running transfers finish (press Ctrl-C again to quit now)");
      controller.abort();
    };
    process.on("SIGINT", onInterrupt);

    const results = await runSync(sites, {
      dryRun: options.dryRun,
      concurrency: options.concurrency,
      signal: controller.signal,
      logger,
      progress,
      createApi: (config) => new NeocitiesClient(config.apiKey),
    });

    process.off("SIGINT", onInterrupt);
    process.exitCode = controller.signal.aborted ? 130 : exitCodeFor(results);
  });
