import { createHash } from "node:crypto";
import type { Dirent, Stats } from "node:fs";
import { readdir, readFile, realpath, stat } from "node:fs/promises";
import { isAbsolute, join, relative, sep } from "node:path";
import {
  CancelledError,
  IGNORE_FILE_NAME,
  ScanError,
  VCS_NAMES,
  comparePaths,
  createIgnoreScope,
  fileExtension,
  isIncluded,
  joinPath,
  parseIgnoreRules,
  toError,
} from "@neocities-sync/shared";
import type { IgnoreScope, LocalEntry, ScanIssue, ScanResult, SiteConfig } from "@neocities-sync/shared";
import { TaskQueue } from "./queue.js";

export interface ScanOptions {
  /** Files hashed at once */
  concurrency?: number;
  signal?: AbortSignal;
}

type ScanFilters = Pick<SiteConfig, "syncHidden" | "syncVcs" | "allowedExtensions">;

interface ScanContext {
  rootDir: string;
  realRoot: string;
  filters: ScanFilters;
  queue: TaskQueue;
  entries: LocalEntry[];
  issues: ScanIssue[];
  /** Hash jobs in flight; each settles into entries or issues */
  hashing: Promise<void>[];
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

async function fingerprintFile(path: string): Promise<{ size: number; fingerprint: string }> {
  const bytes = await readFile(path);
  return {
    size: bytes.byteLength,
    fingerprint: createHash("sha1").update(bytes).digest("hex"),
  };
}

/**
 * Whether an entry passes the name-based filters: hidden names, VCS
 * metadata and the extension allowlist.
 */
function passesNameFilters(name: string, isDirectory: boolean, filters: ScanFilters): boolean {
  if (name === IGNORE_FILE_NAME) return false;
  if (!filters.syncHidden && name.startsWith(".")) return false;
  if (!filters.syncVcs && VCS_NAMES.has(name)) return false;
  if (!isDirectory && filters.allowedExtensions && !filters.allowedExtensions.includes(fileExtension(name))) {
    return false;
  }
  return true;
}

async function loadScope(dirAbs: string, dirRel: string, ctx: ScanContext): Promise<IgnoreScope | null> {
  const file = join(dirAbs, IGNORE_FILE_NAME);
  try {
    return createIgnoreScope(dirRel, parseIgnoreRules(await readFile(file, "utf-8")));
  } catch (error) {
    ctx.issues.push({
      path: joinPath(dirRel, IGNORE_FILE_NAME),
      kind: "unreadable",
      message: `Could not read ignore file: ${toError(error).message}`,
    });
    return null;
  }
}

async function walk(dirAbs: string, dirRel: string, scopes: readonly IgnoreScope[], ctx: ScanContext): Promise<void> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dirAbs, { withFileTypes: true });
  } catch (error) {
    if (dirRel === "") {
      throw new ScanError(ctx.rootDir, `Cannot read root directory "${ctx.rootDir}": ${toError(error).message}`, {
        cause: error,
      });
    }
    ctx.issues.push({ path: dirRel, kind: "unreadable", message: toError(error).message });
    return;
  }

  let chain = scopes;
  if (dirents.some((dirent) => dirent.name === IGNORE_FILE_NAME && !dirent.isDirectory())) {
    const scope = await loadScope(dirAbs, dirRel, ctx);
    if (scope) chain = [...scopes, scope];
  }

  dirents.sort((a, b) => comparePaths(a.name, b.name));

  for (const dirent of dirents) {
    const path = joinPath(dirRel, dirent.name);
    const abs = join(dirAbs, dirent.name);

    // Follows symlinks, so a link is filtered as whatever it points at
    let stats: Stats | null = null;
    let statError: Error | null = null;
    try {
      stats = await stat(abs);
    } catch (error) {
      statError = toError(error);
    }

    const isDirectory = stats?.isDirectory() ?? false;
    if (!passesNameFilters(dirent.name, isDirectory, ctx.filters)) continue;
    if (!isIncluded(path, isDirectory, chain)) continue;

    if (!stats) {
      ctx.issues.push({ path, kind: "unreadable", message: statError?.message ?? "Cannot stat entry" });
      continue;
    }

    if (dirent.isSymbolicLink()) {
      let target: string;
      try {
        target = await realpath(abs);
      } catch (error) {
        ctx.issues.push({ path, kind: "unreadable", message: toError(error).message });
        continue;
      }
      if (!isInside(ctx.realRoot, target)) {
        ctx.issues.push({ path, kind: "outside-root", message: `Symbolic link points outside the root: ${target}` });
        continue;
      }
      if (isDirectory) {
        ctx.issues.push({ path, kind: "symlinked-directory", message: "Symbolic links to directories are not followed" });
        continue;
      }
    }

    if (isDirectory) {
      ctx.entries.push({ path, isDirectory: true, size: 0, fingerprint: null, mtime: stats.mtimeMs });
      await walk(abs, path, chain, ctx);
    } else if (stats.isFile()) {
      const mtime = stats.mtimeMs;
      ctx.hashing.push(
        ctx.queue.enqueue(() => fingerprintFile(abs)).then(
          ({ size, fingerprint }) => {
            ctx.entries.push({ path, isDirectory: false, size, fingerprint, mtime });
          },
          (error: unknown) => {
            if (error instanceof CancelledError) return;
            ctx.issues.push({ path, kind: "unreadable", message: toError(error).message });
          },
        ),
      );
    } else {
      ctx.issues.push({ path, kind: "unsupported", message: "Not a regular file or directory" });
    }
  }
}

/**
 * Walk a site's root directory and collect the entries to sync, with the
 * SHA-1 fingerprint of every file.
 *
 * Per-entry problems are reported in `issues`; only an unreadable root
 * throws.
 */
export async function scanLocalTree(config: SiteConfig, options: ScanOptions = {}): Promise<ScanResult> {
  let realRoot: string;
  try {
    realRoot = await realpath(config.rootDir);
    if (!(await stat(realRoot)).isDirectory()) {
      throw new Error("not a directory");
    }
  } catch (error) {
    throw new ScanError(config.rootDir, `Cannot read root directory "${config.rootDir}": ${toError(error).message}`, {
      cause: error,
    });
  }

  const ctx: ScanContext = {
    rootDir: config.rootDir,
    realRoot,
    filters: config,
    queue: new TaskQueue({ concurrency: options.concurrency, maxRetries: 0, signal: options.signal }),
    entries: [],
    issues: [],
    hashing: [],
  };

  try {
    await walk(config.rootDir, "", [], ctx);
  } finally {
    await Promise.all(ctx.hashing);
  }

  if (options.signal?.aborted) {
    throw new CancelledError("Scan cancelled");
  }

  ctx.entries.sort((a, b) => comparePaths(a.path, b.path));
  ctx.issues.sort((a, b) => comparePaths(a.path, b.path));
  return { entries: ctx.entries, issues: ctx.issues };
}
