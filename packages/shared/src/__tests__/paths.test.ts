import { describe, it, expect } from "vitest";
import { comparePaths, fileExtension, isBeneath, joinPath, normalizeExtension, parentPath } from "../paths.js";

describe("fileExtension", () => {
  it("returns the lowercased extension of the last segment", () => {
    expect(fileExtension("/path/to/file.ext")).toBe(".ext");
    expect(fileExtension("file.abc.DEF")).toBe(".def");
  });

  it("returns an empty string when there is none", () => {
    expect(fileExtension("path/to/file")).toBe("");
    expect(fileExtension("path/to/.bashrc")).toBe("");
    expect(fileExtension("dir.d/file")).toBe("");
  });
});

describe("normalizeExtension", () => {
  it("adds a single leading dot and lowercases", () => {
    expect(normalizeExtension("HTML")).toBe(".html");
    expect(normalizeExtension(".css")).toBe(".css");
    expect(normalizeExtension("..js")).toBe(".js");
  });
});

describe("path helpers", () => {
  it("joins onto the root without a leading slash", () => {
    expect(joinPath("", "a.html")).toBe("a.html");
    expect(joinPath("a/b", "c.html")).toBe("a/b/c.html");
  });

  it("checks containment on segment boundaries", () => {
    expect(isBeneath("a", "a/b")).toBe(true);
    expect(isBeneath("a", "a")).toBe(false);
    expect(isBeneath("a", "ab/c")).toBe(false);
  });

  it("finds the parent directory", () => {
    expect(parentPath("a/b/c.html")).toBe("a/b");
    expect(parentPath("c.html")).toBe("");
  });

  it("orders by code unit", () => {
    expect(["b", "B", "a-b", "a/b"].sort(comparePaths)).toEqual(["B", "a-b", "a/b", "b"]);
  });
});
