import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { symlinkSync } from "node:fs";
import { join, sep } from "node:path";
import {
  canonicalPath,
  gatherFiles,
  getCommonParent,
  isXmlFile,
  listDirectories,
  listFiles,
  readBytes,
} from "../../src/utils/fileUtils.js";
import { readArchiveEntries } from "../../src/utils/archive.js";
import { createTempDir, removeTempDir, writeJar, writeTree } from "../helpers/fixtures.js";

let testDir: string;

beforeEach(() => {
  testDir = createTempDir();
});

afterEach(() => {
  removeTempDir(testDir);
});

describe("getCommonParent", () => {
  it("should return the nearest shared ancestor", () => {
    expect(getCommonParent(["/a/b/c", "/a/b/d/e"])).toBe("/a/b");
  });

  it("should treat a path as its own ancestor", () => {
    expect(getCommonParent(["/a/b", "/a/b/c"])).toBe("/a/b");
    expect(getCommonParent(["/a/b"])).toBe("/a/b");
  });

  it("should return the filesystem root for unrelated paths", () => {
    expect(getCommonParent(["/a", "/b"])).toBe(sep);
  });

  it("should return null for no paths", () => {
    expect(getCommonParent([])).toBeNull();
  });
});

describe("listing", () => {
  it("should list entries in name order", () => {
    // Given: Entries created out of order
    writeTree(testDir, { "values/": "", "layout/": "", "a.txt": "x" });

    // When: Listing
    const files = listFiles(testDir);
    const dirs = listDirectories(testDir);

    // Then: Both are sorted by name
    expect(files).toEqual([join(testDir, "a.txt"), join(testDir, "layout"), join(testDir, "values")]);
    expect(dirs).toEqual([join(testDir, "layout"), join(testDir, "values")]);
  });

  it("should return an empty list for a missing directory", () => {
    expect(listFiles(join(testDir, "missing"))).toEqual([]);
    expect(listDirectories(join(testDir, "missing"))).toEqual([]);
  });

  it("should gather files by suffix recursively", () => {
    writeTree(testDir, {
      "com/example/B.java": "",
      "com/example/A.java": "",
      "com/Top.java": "",
      "com/notes.txt": "",
    });

    expect(gatherFiles(testDir, ".java")).toEqual([
      join(testDir, "com/Top.java"),
      join(testDir, "com/example/A.java"),
      join(testDir, "com/example/B.java"),
    ]);
  });

  it("should not follow a symbolic link back into the tree", () => {
    // Given: A source folder holding a link to itself
    writeTree(testDir, { "src/com/Foo.java": "" });
    symlinkSync(join(testDir, "src"), join(testDir, "src/com/loop"), "dir");

    // When: Gathering sources
    const files = gatherFiles(join(testDir, "src"), ".java");

    // Then: Each file appears once
    expect(files).toEqual([join(testDir, "src/com/Foo.java")]);
  });

  it("should recognise xml files case-insensitively", () => {
    expect(isXmlFile("/res/layout/main.XML")).toBe(true);
    expect(isXmlFile("/res/raw/data.bin")).toBe(false);
  });
});

describe("readBytes", () => {
  it("should read a file", () => {
    writeTree(testDir, { "Foo.class": "com/Foo" });

    const result = readBytes(join(testDir, "Foo.class"));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.toString("utf-8")).toBe("com/Foo");
    }
  });

  it("should report a missing file", () => {
    const result = readBytes(join(testDir, "Missing.class"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("NOT_FOUND");
    }
  });

  it("should report a directory", () => {
    const result = readBytes(testDir);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("NOT_FILE");
    }
  });
});

describe("canonicalPath", () => {
  it("should fall back to the absolute path for missing files", () => {
    expect(canonicalPath(join(testDir, "a", "..", "missing"))).toBe(join(testDir, "missing"));
  });
});

describe("readArchiveEntries", () => {
  it("should list file entries in archive order", () => {
    // Given: A jar with two classes
    const jar = join(testDir, "classes.jar");
    writeJar(jar, { "com/A.class": "com/A", "com/B.class": "com/B" });

    // When: Reading the entries
    const result = readArchiveEntries(jar);

    // Then: Names and contents are available
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((entry) => entry.name)).toEqual(["com/A.class", "com/B.class"]);
      const bytes = result.value[1]?.read();
      expect(bytes?.ok && bytes.value.toString("utf-8")).toBe("com/B");
    }
  });

  it("should report an unreadable archive", () => {
    writeTree(testDir, { "broken.jar": "not a zip" });

    const result = readArchiveEntries(join(testDir, "broken.jar"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("ARCHIVE_UNREADABLE");
    }
  });
});
