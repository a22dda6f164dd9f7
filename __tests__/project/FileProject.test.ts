/**
 * File Project Tests
 *
 * Tests for the directory-backed project model and its cache
 * using Given-When-Then pattern.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { FileProject, parseProperties } from "../../src/project/FileProject.js";
import { ProjectCache } from "../../src/project/ProjectCache.js";
import { RecordingClient } from "../helpers/fakes.js";
import { createProject, createTempDir, removeTempDir, writeJar, writeTree } from "../helpers/fixtures.js";

let testDir: string;

beforeEach(() => {
  testDir = createTempDir();
});

afterEach(() => {
  removeTempDir(testDir);
});

describe("parseProperties", () => {
  it("should read key/value pairs and skip comments", () => {
    const properties = parseProperties(
      ["# generated", "target=android-15", "", "android.library = true", "! legacy", "flag"].join("\n")
    );

    expect([...properties.entries()]).toEqual([
      ["target", "android-15"],
      ["android.library", "true"],
      ["flag", ""],
    ]);
  });
});

describe("FileProject", () => {
  // ==========================================================================
  // Layout
  // ==========================================================================

  it("should find the conventional folders", () => {
    // Given: A project with every conventional folder
    const dir = createProject(testDir, "app", {
      "res/values/strings.xml": "resources",
      "src/com/Foo.java": "",
      "gen/com/R.java": "",
      "bin/classes/com/Foo.class": "com/Foo",
    });
    writeJar(join(dir, "libs/support.jar"), { "com/Support.class": "com/Support" });
    writeTree(dir, { "libs/readme.txt": "" });

    // When: Creating the project
    const project = new FileProject(new RecordingClient(), dir, dir);

    // Then: Everything is located
    expect(project.manifestFile).toBe(join(dir, "AndroidManifest.xml"));
    expect(project.resourceFolders).toEqual([join(dir, "res")]);
    expect(project.javaSourceFolders).toEqual([join(dir, "src"), join(dir, "gen")]);
    expect(project.javaClassFolders).toEqual([
      join(dir, "bin/classes"),
      join(dir, "libs/support.jar"),
    ]);
    expect(project.isLibrary).toBe(false);
    expect(project.subset).toBeNull();
  });

  it("should leave out folders that do not exist", () => {
    const dir = join(testDir, "bare");
    writeTree(dir, { "bare.txt": "" });

    const project = new FileProject(new RecordingClient(), dir, dir);

    expect(project.manifestFile).toBeNull();
    expect(project.resourceFolders).toEqual([]);
    expect(project.javaSourceFolders).toEqual([]);
    expect(project.javaClassFolders).toEqual([]);
  });

  // ==========================================================================
  // Libraries
  // ==========================================================================

  describe("libraries", () => {
    it("should resolve library references in index order", () => {
      // Given: A project referencing two libraries, listed out of order
      const app = createProject(testDir, "app", {
        "project.properties": [
          "android.library.reference.2=../second",
          "android.library.reference.1=../first",
        ].join("\n"),
      });
      createProject(testDir, "first", { "project.properties": "android.library=true" });
      createProject(testDir, "second", { "project.properties": "android.library=true" });
      const client = new RecordingClient();

      // When: Looking up the project through the client
      const project = client.getProject(app, app);

      // Then: Libraries come back by index, flagged as libraries
      expect(project.directLibraries.map((library) => library.dir)).toEqual([
        join(testDir, "first"),
        join(testDir, "second"),
      ]);
      expect(project.directLibraries.every((library) => library.isLibrary)).toBe(true);
      expect(project.directLibraries[0]).toBe(client.getProject(join(testDir, "first"), testDir));
    });

    it("should compute the transitive closure without duplicates or cycles", () => {
      // Given: app -> a -> shared, app -> shared, shared -> a
      const app = createProject(testDir, "app", {
        "project.properties": [
          "android.library.reference.1=../a",
          "android.library.reference.2=../shared",
        ].join("\n"),
      });
      createProject(testDir, "a", {
        "project.properties": "android.library=true\nandroid.library.reference.1=../shared",
      });
      createProject(testDir, "shared", {
        "project.properties": "android.library=true\nandroid.library.reference.1=../a",
      });
      const client = new RecordingClient();

      // When: Asking for all libraries
      const libraries = client.getProject(app, app).allLibraries;

      // Then: Each library appears once, in discovery order
      expect(libraries.map((library) => library.dir)).toEqual([
        join(testDir, "a"),
        join(testDir, "shared"),
      ]);
    });

    it("should log a reference to a missing directory", () => {
      const app = createProject(testDir, "app", {
        "project.properties": "android.library.reference.1=../missing",
      });
      const client = new RecordingClient();

      const project = client.getProject(app, app);

      expect(project.directLibraries).toEqual([]);
      expect(client.logs.map((entry) => entry.message)).toEqual([
        `Library project ${join(testDir, "missing")} referenced from ${app} does not exist`,
      ]);
    });
  });

  // ==========================================================================
  // Mutation
  // ==========================================================================

  it("should read the package and SDK levels from the manifest", () => {
    const dir = createProject(testDir, "app");
    const project = new FileProject(new RecordingClient(), dir, dir);

    project.readManifest({
      root: {
        tagName: "manifest",
        attributes: [{ name: "package", value: "com.example.app" }],
        children: [
          {
            tagName: "uses-sdk",
            attributes: [
              { name: "android:minSdkVersion", value: "8" },
              { name: "android:targetSdkVersion", value: "15" },
            ],
            children: [],
          },
        ],
      },
    });

    expect(project.packageName).toBe("com.example.app");
    expect(project.minSdkVersion).toBe(8);
    expect(project.targetSdkVersion).toBe(15);
  });

  it("should collect an explicit subset", () => {
    const dir = createProject(testDir, "app");
    const project = new FileProject(new RecordingClient(), dir, dir);

    project.addFile(join(dir, "res"));
    project.addFile(join(dir, "src/Foo.java"));

    expect(project.subset).toEqual([join(dir, "res"), join(dir, "src/Foo.java")]);
  });

  it("should keep each subset file once and drop the subset on reset", () => {
    const dir = createProject(testDir, "app");
    const project = new FileProject(new RecordingClient(), dir, dir);

    project.addFile(join(dir, "res"));
    project.addFile(join(dir, "res"));
    expect(project.subset).toEqual([join(dir, "res")]);

    project.resetSubset();
    expect(project.subset).toBeNull();
  });

  it("should load its configuration once", () => {
    const dir = createProject(testDir, "app", {
      "lint.json": JSON.stringify({ issues: {} }),
    });
    const project = new FileProject(new RecordingClient(), dir, dir);

    expect(project.configuration).toBe(project.configuration);
  });
});

describe("ProjectCache", () => {
  it("should hand out one project per canonical directory", () => {
    // Given: The same directory spelled two ways
    const dir = createProject(testDir, "app");
    const cache = new ProjectCache(new RecordingClient());

    // When: Looking both up
    const first = cache.getProject(dir, dir);
    const second = cache.getProject(join(dir, "src", ".."), testDir);

    // Then: One instance
    expect(second).toBe(first);
    expect(cache.size).toBe(1);
  });
});
