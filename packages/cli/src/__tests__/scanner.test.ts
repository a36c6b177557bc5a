import { createHash } from "node:crypto";
import { symlink } from "node:fs/promises";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CancelledError, ScanError } from "@neocities-sync/shared";
import type { SiteConfig } from "@neocities-sync/shared";
import { scanLocalTree } from "../sync/scanner.js";
import { makeTempDir, removeTempDir, writeTree } from "./helpers/temp-dir.js";

/* --- Helpers --- */

function siteConfig(rootDir: string, overrides: Partial<SiteConfig> = {}): SiteConfig {
  return {
    apiKey: "test-secret",
    rootDir,
    syncDisallowed: false,
    syncHidden: false,
    syncVcs: false,
    removeEmptyDirs: true,
    allowedExtensions: null,
    ...overrides,
  };
}

async function scannedPaths(config: SiteConfig): Promise<string[]> {
  const { entries } = await scanLocalTree(config);
  return entries.map((entry) => entry.path);
}

describe("scanLocalTree", () => {
  let root: string;
  let outside: string;

  beforeEach(async () => {
    root = await makeTempDir();
    outside = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
    await removeTempDir(outside);
  });

  it("records files with size and SHA-1 fingerprint, directories without", async () => {
    await writeTree(root, { "index.html": "hello", "css/site.css": "body{}" });

    const { entries, issues } = await scanLocalTree(siteConfig(root));

    expect(issues).toEqual([]);
    expect(entries.map(({ mtime: _mtime, ...rest }) => rest)).toEqual([
      { path: "css", isDirectory: true, size: 0, fingerprint: null },
      { path: "css/site.css", isDirectory: false, size: 6, fingerprint: createHash("sha1").update("body{}").digest("hex") },
      { path: "index.html", isDirectory: false, size: 5, fingerprint: createHash("sha1").update("hello").digest("hex") },
    ]);
  });

  it("returns entries sorted by path", async () => {
    await writeTree(root, { "b.html": "", "a/z.html": "", "a-b.html": "", "A.html": "" });

    expect(await scannedPaths(siteConfig(root))).toEqual(["A.html", "a", "a-b.html", "a/z.html", "b.html"]);
  });

  it("skips hidden entries unless enabled", async () => {
    await writeTree(root, { ".env": "x", ".well-known/a.txt": "x", "index.html": "x" });

    expect(await scannedPaths(siteConfig(root))).toEqual(["index.html"]);
    expect(await scannedPaths(siteConfig(root, { syncHidden: true }))).toEqual([
      ".env",
      ".well-known",
      ".well-known/a.txt",
      "index.html",
    ]);
  });

  it("skips version-control metadata unless enabled", async () => {
    await writeTree(root, { "CVS/Root": "x", "_darcs/format": "x", "index.html": "x" });

    expect(await scannedPaths(siteConfig(root))).toEqual(["index.html"]);
    expect(await scannedPaths(siteConfig(root, { syncVcs: true }))).toEqual([
      "CVS",
      "CVS/Root",
      "_darcs",
      "_darcs/format",
      "index.html",
    ]);
  });

  it("needs both flags for hidden VCS directories", async () => {
    await writeTree(root, { ".git/HEAD": "x", "index.html": "x" });

    expect(await scannedPaths(siteConfig(root, { syncHidden: true }))).toEqual(["index.html"]);
    expect(await scannedPaths(siteConfig(root, { syncHidden: true, syncVcs: true }))).toEqual([
      ".git",
      ".git/HEAD",
      "index.html",
    ]);
  });

  it("applies the extension allowlist to files only", async () => {
    await writeTree(root, { "a.HTML": "x", "b.css": "x", "c.js": "x", "docs.d/readme": "x", "docs.d/x.css": "x" });

    const paths = await scannedPaths(siteConfig(root, { allowedExtensions: [".html", ".css"] }));

    expect(paths).toEqual(["a.HTML", "b.css", "docs.d", "docs.d/x.css"]);
  });

  it("never syncs the ignore file itself", async () => {
    await writeTree(root, { ".neocitiesignore": "", "index.html": "x" });

    expect(await scannedPaths(siteConfig(root, { syncHidden: true }))).toEqual(["index.html"]);
  });

  /* --- Ignore files --- */

  it("lets a deeper ignore file re-include what an ancestor excluded", async () => {
    await writeTree(root, {
      ".neocitiesignore": "*.log\n",
      "sub/.neocitiesignore": "!keep.log\n",
      "sub/keep.log": "x",
      "sub/other.log": "x",
      "top.log": "x",
    });

    expect(await scannedPaths(siteConfig(root))).toEqual(["sub", "sub/keep.log"]);
  });

  it("re-includes a file from a directory whose contents were excluded", async () => {
    await writeTree(root, {
      ".neocitiesignore": "docs/**\n!docs/index.html\n",
      "docs/index.html": "x",
      "docs/draft.html": "x",
    });

    expect(await scannedPaths(siteConfig(root))).toEqual(["docs", "docs/index.html"]);
  });

  it("does not descend into an excluded directory", async () => {
    await writeTree(root, {
      ".neocitiesignore": "drafts/\n",
      "drafts/.neocitiesignore": "!*.html\n",
      "drafts/post.html": "x",
      "index.html": "x",
    });

    expect(await scannedPaths(siteConfig(root))).toEqual(["index.html"]);
  });

  it("scopes rules to the directory of their ignore file", async () => {
    await writeTree(root, {
      "blog/.neocitiesignore": "/draft.html\n",
      "blog/draft.html": "x",
      "draft.html": "x",
    });

    expect(await scannedPaths(siteConfig(root))).toEqual(["blog", "draft.html"]);
  });

  /* --- Links and problems --- */

  it("syncs links to files inside the root as files", async () => {
    await writeTree(root, { "real.html": "same" });
    await symlink(join(root, "real.html"), join(root, "alias.html"));

    const { entries, issues } = await scanLocalTree(siteConfig(root));

    expect(issues).toEqual([]);
    expect(entries.map((entry) => [entry.path, entry.size])).toEqual([
      ["alias.html", 4],
      ["real.html", 4],
    ]);
  });

  it("reports links that leave the root", async () => {
    await writeTree(outside, { "secret.html": "x" });
    await writeTree(root, { "index.html": "x" });
    await symlink(join(outside, "secret.html"), join(root, "leak.html"));

    const { entries, issues } = await scanLocalTree(siteConfig(root));

    expect(entries.map((entry) => entry.path)).toEqual(["index.html"]);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ path: "leak.html", kind: "outside-root" });
  });

  it("reports links to directories without following them", async () => {
    await writeTree(root, { "real/a.html": "x" });
    await symlink(join(root, "real"), join(root, "mirror"));

    const { entries, issues } = await scanLocalTree(siteConfig(root));

    expect(entries.map((entry) => entry.path)).toEqual(["real", "real/a.html"]);
    expect(issues).toEqual([
      { path: "mirror", kind: "symlinked-directory", message: "Symbolic links to directories are not followed" },
    ]);
  });

  it("reports broken links as unreadable", async () => {
    await symlink(join(root, "gone.html"), join(root, "dangling.html"));

    const { entries, issues } = await scanLocalTree(siteConfig(root));

    expect(entries).toEqual([]);
    expect(issues[0]).toMatchObject({ path: "dangling.html", kind: "unreadable" });
  });

  it("does not report problems inside ignored entries", async () => {
    await writeTree(root, { ".neocitiesignore": "dangling.html\n" });
    await symlink(join(root, "gone.html"), join(root, "dangling.html"));

    const { issues } = await scanLocalTree(siteConfig(root));

    expect(issues).toEqual([]);
  });

  it("throws ScanError when the root is missing", async () => {
    await expect(scanLocalTree(siteConfig(join(root, "nope")))).rejects.toBeInstanceOf(ScanError);
  });

  it("throws ScanError when the root is a file", async () => {
    await writeTree(root, { "file.html": "x" });

    await expect(scanLocalTree(siteConfig(join(root, "file.html")))).rejects.toBeInstanceOf(ScanError);
  });

  it("stops with CancelledError when the signal is aborted", async () => {
    await writeTree(root, { "a/b.html": "x" });
    const controller = new AbortController();
    controller.abort();

    await expect(scanLocalTree(siteConfig(root), { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });
});
