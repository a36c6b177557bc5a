import picomatch from "picomatch";
import { isBeneath } from "./paths.js";

/**
 * One compiled line of an ignore file.
 */
export interface IgnoreRule {
  /** The line as written */
  source: string;
  /** Leading `!`: re-include what earlier rules excluded */
  negated: boolean;
  /** Trailing `/`: only directories match */
  directoryOnly: boolean;
  /** Contains a `/`: matched against the scope-relative path, else the basename */
  anchored: boolean;
  test: (subject: string) => boolean;
}

/**
 * The rules of one ignore file, scoped to the directory that holds it.
 */
export interface IgnoreScope {
  /** Root-relative directory of the ignore file ("" for the root) */
  readonly base: string;
  readonly rules: readonly IgnoreRule[];
}

/**
 * Split ignore-file contents into patterns.
 *
 * Blank lines and `#` comments are dropped and trailing whitespace is
 * trimmed, except a space escaped with a backslash.
 */
export function parseIgnoreRules(content: string): string[] {
  const patterns: string[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/(?<!\\)\s+$/, "");
    if (line === "" || line.startsWith("#")) continue;
    patterns.push(line);
  }
  return patterns;
}

export function compileIgnoreRule(source: string): IgnoreRule | null {
  let body = source;
  let negated = false;

  if (body.startsWith("!")) {
    negated = true;
    body = body.slice(1);
  } else if (body.startsWith("\\!") || body.startsWith("\\#")) {
    body = body.slice(1);
  }

  const directoryOnly = body.endsWith("/");
  body = body.replace(/\/+$/, "");

  const anchored = body.includes("/");
  body = body.replace(/^\/+/, "");
  if (body === "") return null;

  const options = { dot: true, nobrace: true, noextglob: true, nonegate: true };
  const glob = picomatch(body, options);

  // "dir/**" matches what lies beneath "dir", never "dir" itself
  const prefix = body.endsWith("/**") ? body.slice(0, -3) : null;
  const isPrefix = prefix ? picomatch(prefix, options) : null;
  const test = isPrefix ? (subject: string) => glob(subject) && !isPrefix(subject) : glob;

  return { source, negated, directoryOnly, anchored, test };
}

/**
 * Compile an ignore file for directory `base`. Accepts the raw file contents
 * or already-split patterns.
 */
export function createIgnoreScope(base: string, source: string | readonly string[]): IgnoreScope {
  const patterns = typeof source === "string" ? parseIgnoreRules(source) : source;
  const rules: IgnoreRule[] = [];
  for (const pattern of patterns) {
    const rule = compileIgnoreRule(pattern);
    if (rule) rules.push(rule);
  }
  return { base, rules };
}

/** Whether the rules in scope leave `path` excluded. Last match wins. */
function isExcludedByRules(path: string, isDirectory: boolean, scopes: readonly IgnoreScope[]): boolean {
  let excluded = false;
  const basename = path.slice(path.lastIndexOf("/") + 1);

  for (const scope of scopes) {
    if (scope.base !== "" && !isBeneath(scope.base, path)) continue;
    const relative = scope.base === "" ? path : path.slice(scope.base.length + 1);

    for (const rule of scope.rules) {
      if (rule.directoryOnly && !isDirectory) continue;
      if (rule.test(rule.anchored ? relative : basename)) {
        excluded = !rule.negated;
      }
    }
  }

  return excluded;
}

/**
 * Decide whether a root-relative path survives the ignore rules in scope.
 *
 * Scopes are ordered outermost first, so rules in deeper directories are
 * evaluated on top of the outcome of their ancestors. A path whose parent
 * directory is excluded stays excluded whatever the later rules say. Paths
 * nothing matches are included.
 */
export function isIncluded(path: string, isDirectory: boolean, scopes: readonly IgnoreScope[]): boolean {
  const segments = path.split("/");
  for (let depth = 1; depth < segments.length; depth++) {
    if (isExcludedByRules(segments.slice(0, depth).join("/"), true, scopes)) return false;
  }
  return !isExcludedByRules(path, isDirectory, scopes);
}
