import { appendFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import ini from "ini";
import { z } from "zod";
import { ConfigError, normalizeExtension, toError } from "@neocities-sync/shared";
import type { SiteConfig } from "@neocities-sync/shared";

export const CONFIG_FILE_DISPLAY = "~/.config/neocities-sync.conf";
export const CONFIG_FILE = join(homedir(), ".config", "neocities-sync.conf");

export type SiteConfigs = ReadonlyMap<string, SiteConfig>;

const TRUE_WORDS = new Set(["1", "yes", "true", "on"]);
const FALSE_WORDS = new Set(["0", "no", "false", "off"]);

const flag = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === "boolean") return value;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected yes/no, got "${value}"` });
  return z.NEVER;
});

const siteSectionSchema = z.object({
  api_key: z.string().trim().min(1, "is required"),
  root_dir: z.string().trim().min(1, "is required"),
  sync_disallowed: flag.default(false),
  sync_hidden: flag.default(false),
  sync_vcs: flag.default(false),
  remove_empty_dirs: flag.default(true),
  allowed_extensions: z.string().optional(),
});

const recordSchema = z.record(z.unknown());

/** Expand a leading "~" and make the path absolute. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return resolve(path);
}

/**
 * Sections of the parsed file keyed by their full name. The ini parser
 * nests sections on dots, so "[example.neocities.org]" arrives as
 * { example: { neocities: { org: {...} } } } and is put back together here.
 */
function collectSections(tree: Record<string, unknown>, prefix: string, out: Map<string, Record<string, unknown>>): void {
  for (const [key, value] of Object.entries(tree)) {
    const section = recordSchema.safeParse(value);
    if (!section.success) continue;

    const name = prefix ? `${prefix}.${key}` : key;
    const entries = Object.entries(section.data);
    if (entries.some(([, child]) => !recordSchema.safeParse(child).success)) {
      out.set(name, section.data);
    }
    collectSections(section.data, name, out);
  }
}

/** Section names in the order their headers appear */
function sectionOrder(contents: string): string[] {
  return contents.split(/\r?\n/).flatMap((line) => {
    const match = /^\s*\[([^\]]*)\]\s*$/.exec(line);
    return match?.[1] !== undefined ? [match[1].trim()] : [];
  });
}

function toSiteConfig(site: string, section: Record<string, unknown>): SiteConfig {
  const parsed = siteSectionSchema.safeParse(section);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "section"} ${issue.message}`);
    throw new ConfigError(`Invalid config for site "${site}": ${problems.join("; ")}`);
  }

  const values = parsed.data;
  const extensions = values.allowed_extensions?.split(/\s+/).filter((ext) => ext !== "");

  return Object.freeze({
    apiKey: values.api_key,
    rootDir: expandHome(values.root_dir),
    syncDisallowed: values.sync_disallowed,
    syncHidden: values.sync_hidden,
    syncVcs: values.sync_vcs,
    removeEmptyDirs: values.remove_empty_dirs,
    allowedExtensions: extensions && extensions.length > 0 ? Object.freeze(extensions.map(normalizeExtension)) : null,
  });
}

/**
 * Parse config file contents into site configs, keyed by section name.
 */
export function parseConfig(contents: string): SiteConfigs {
  const parsed = recordSchema.safeParse(ini.parse(contents));
  if (!parsed.success) {
    throw new ConfigError("Config file could not be parsed");
  }

  const sections = new Map<string, Record<string, unknown>>();
  collectSections(parsed.data, "", sections);

  // Nesting moves dotted sections to the end; restore file order
  const order = sectionOrder(contents);
  const rank = (name: string) => {
    const index = order.indexOf(name);
    return index === -1 ? order.length : index;
  };

  const sites = new Map<string, SiteConfig>();
  for (const [site, section] of [...sections].sort(([a], [b]) => rank(a) - rank(b))) {
    sites.set(site, toSiteConfig(site, section));
  }
  return sites;
}

/**
 * Load and parse the config file.
 */
export function loadConfigFile(path = CONFIG_FILE): SiteConfigs {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file "${path}" not found. Run "neocities-sync init" or pass --config-file.`);
  }

  let contents: string;
  try {
    contents = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Config file "${path}" could not be read: ${toError(error).message}`);
  }

  const sites = parseConfig(contents);
  if (sites.size === 0) {
    throw new ConfigError(`Config file "${path}" has no site sections`);
  }
  return sites;
}

/**
 * Pick the sites to sync. An empty selection means all of them.
 */
export function selectSites(sites: SiteConfigs, names: readonly string[]): Array<[string, SiteConfig]> {
  if (names.length === 0) return [...sites.entries()];

  return names.map((name): [string, SiteConfig] => {
    const config = sites.get(name);
    if (!config) {
      const known = [...sites.keys()].map((site) => `"${site}"`).join(", ");
      throw new ConfigError(`Unknown site "${name}". Sites in the config file: ${known}`);
    }
    return [name, config];
  });
}

/**
 * Human-readable dump of a site's settings with the API key redacted.
 */
export function formatSiteConfig(config: SiteConfig): string {
  const extensions = config.allowedExtensions ? config.allowedExtensions.join(" ") : "(any)";
  return [
    `api_key: <redacted>`,
    `root_dir: ${config.rootDir}`,
    `sync_disallowed: ${config.syncDisallowed}`,
    `sync_hidden: ${config.syncHidden}`,
    `sync_vcs: ${config.syncVcs}`,
    `allowed_extensions: ${extensions}`,
    `remove_empty_dirs: ${config.removeEmptyDirs}`,
  ].join("\n");
}

export interface NewSiteSection {
  apiKey: string;
  rootDir: string;
  allowedExtensions?: string;
}

/**
 * Append a site section to the config file, creating it if needed.
 */
export function appendSiteConfig(path: string, site: string, values: NewSiteSection): void {
  const section: Record<string, string> = {
    api_key: values.apiKey,
    root_dir: values.rootDir,
  };
  if (values.allowedExtensions?.trim()) {
    section.allowed_extensions = values.allowedExtensions.trim();
  }

  mkdirSync(dirname(path), { recursive: true });
  const separator = existsSync(path) && readFileSync(path, "utf-8").trim() !== "" ? "\n" : "";
  appendFileSync(path, separator + ini.stringify(section, { section: site }), "utf-8");
}
