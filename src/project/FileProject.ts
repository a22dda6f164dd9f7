/**
 * File-system Project
 *
 * The default project model: a directory laid out the conventional way,
 *
 * ```
 * AndroidManifest.xml
 * project.properties
 * proguard.cfg
 * res/        resources
 * src/ gen/   sources
 * bin/classes compiled classes
 * libs/*.jar  bundled archives
 * ```
 *
 * Library dependencies are declared in `project.properties` as
 * `android.library.reference.N=<relative dir>`.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { LintClient } from "../client/LintClient.js";
import type { Configuration } from "../config/Configuration.js";
import type { MarkupDocument, MarkupElement } from "../types/index.js";
import {
  ANDROID_MANIFEST_XML,
  BIN_FOLDER,
  CLASSES_FOLDER,
  DOT_JAR,
  GEN_FOLDER,
  LIBS_FOLDER,
  PROJECT_PROPERTIES,
  RES_FOLDER,
  SRC_FOLDER,
} from "../utils/constants.js";
import { canonicalPath, isDirectory, isFile, listFiles } from "../utils/fileUtils.js";
import type { Project } from "./Project.js";

// ============================================================================
// Properties
// ============================================================================

const LIBRARY_PROPERTY = "android.library";
const LIBRARY_REFERENCE_PREFIX = "android.library.reference.";

/**
 * Parse a `key=value` properties file. Blank lines and lines starting with
 * `#` or `!` are skipped.
 */
export function parseProperties(content: string): Map<string, string> {
  const properties = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#") || line.startsWith("!")) {
      continue;
    }

    const separator = line.search(/[=:]/);
    if (separator === -1) {
      properties.set(line, "");
    } else {
      properties.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
    }
  }

  return properties;
}

// ============================================================================
// FileProject
// ============================================================================

export class FileProject implements Project {
  readonly dir: string;
  readonly manifestFile: string | null;
  readonly resourceFolders: readonly string[];
  readonly javaSourceFolders: readonly string[];
  readonly javaClassFolders: readonly string[];
  readonly isLibrary: boolean;

  packageName: string | null = null;
  minSdkVersion: number | null = null;
  targetSdkVersion: number | null = null;

  private files: string[] | null = null;
  private readonly libraryDirs: readonly string[];
  private directLibraryCache: Project[] | null = null;
  private configurationCache: Configuration | null = null;

  constructor(
    private readonly client: LintClient,
    dir: string,
    readonly referenceDir: string
  ) {
    this.dir = canonicalPath(dir);

    const manifest = join(this.dir, ANDROID_MANIFEST_XML);
    this.manifestFile = isFile(manifest) ? manifest : null;

    this.resourceFolders = [join(this.dir, RES_FOLDER)].filter(isDirectory);
    this.javaSourceFolders = [join(this.dir, SRC_FOLDER), join(this.dir, GEN_FOLDER)].filter(
      isDirectory
    );

    const classFolders = [join(this.dir, BIN_FOLDER, CLASSES_FOLDER)].filter(isDirectory);
    const jars = listFiles(join(this.dir, LIBS_FOLDER)).filter(
      (path) => path.endsWith(DOT_JAR) && isFile(path)
    );
    this.javaClassFolders = [...classFolders, ...jars];

    const properties = this.readProperties();
    this.isLibrary = properties.get(LIBRARY_PROPERTY) === "true";
    this.libraryDirs = [...properties.entries()]
      .filter(([key]) => key.startsWith(LIBRARY_REFERENCE_PREFIX))
      .map(([key, value]) => ({
        index: Number.parseInt(key.slice(LIBRARY_REFERENCE_PREFIX.length), 10),
        dir: value,
      }))
      .filter((reference) => !Number.isNaN(reference.index) && reference.dir !== "")
      .sort((a, b) => a.index - b.index)
      .map((reference) => join(this.dir, reference.dir));
  }

  get subset(): readonly string[] | null {
    return this.files;
  }

  get configuration(): Configuration {
    if (this.configurationCache === null) {
      this.configurationCache = this.client.getConfiguration(this);
    }
    return this.configurationCache;
  }

  /**
   * Library projects are looked up on first use, so that a project can be
   * created before the projects it references.
   */
  get directLibraries(): readonly Project[] {
    if (this.directLibraryCache === null) {
      const libraries: Project[] = [];
      for (const libraryDir of this.libraryDirs) {
        if (!isDirectory(libraryDir)) {
          this.client.log(null, `Library project ${libraryDir} referenced from ${this.dir} does not exist`);
          continue;
        }
        libraries.push(this.client.getProject(libraryDir, libraryDir));
      }
      this.directLibraryCache = libraries;
    }
    return this.directLibraryCache;
  }

  get allLibraries(): readonly Project[] {
    const result: Project[] = [];
    const seen = new Set<Project>([this]);

    const visit = (project: Project): void => {
      for (const library of project.directLibraries) {
        if (!seen.has(library)) {
          seen.add(library);
          result.push(library);
          visit(library);
        }
      }
    };
    visit(this);

    return result;
  }

  addFile(file: string): void {
    if (this.files === null) {
      this.files = [];
    }
    if (!this.files.includes(file)) {
      this.files.push(file);
    }
  }

  resetSubset(): void {
    this.files = null;
  }

  readManifest(document: MarkupDocument): void {
    const root = document.root;
    if (root === null) {
      return;
    }

    this.packageName = attributeValue(root, "package");

    const usesSdk = root.children.find((child) => child.tagName === "uses-sdk");
    if (usesSdk !== undefined) {
      this.minSdkVersion = parseApiLevel(attributeValue(usesSdk, "android:minSdkVersion"));
      this.targetSdkVersion = parseApiLevel(attributeValue(usesSdk, "android:targetSdkVersion"));
    }
  }

  toString(): string {
    return `Project [dir=${this.dir}]`;
  }

  private readProperties(): Map<string, string> {
    const path = join(this.dir, PROJECT_PROPERTIES);
    if (!isFile(path)) {
      return new Map();
    }

    try {
      return parseProperties(readFileSync(path, "utf-8"));
    } catch (error) {
      this.client.log(
        error instanceof Error ? error : null,
        `Could not read ${path}`
      );
      return new Map();
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function attributeValue(element: MarkupElement, name: string): string | null {
  return element.attributes.find((attribute) => attribute.name === name)?.value ?? null;
}

function parseApiLevel(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const level = Number.parseInt(value, 10);
  return Number.isNaN(level) ? null : level;
}
