/**
 * Project Model
 *
 * What the engine needs to know about a project. Instances come from
 * `LintClient.getProject`, which must return the same instance for the
 * same directory.
 */

import type { Configuration } from "../config/Configuration.js";
import type { MarkupDocument } from "../types/index.js";

export interface Project {
  /** Canonical project directory */
  readonly dir: string;
  /** Directory the project was referenced from, used for display */
  readonly referenceDir: string;

  readonly manifestFile: string | null;
  readonly resourceFolders: readonly string[];
  readonly javaSourceFolders: readonly string[];
  /** Class output directories and jar files */
  readonly javaClassFolders: readonly string[];

  /**
   * Files the user pointed at inside the project, or `null` when the
   * whole project is to be checked
   */
  readonly subset: readonly string[] | null;

  readonly configuration: Configuration;

  /** Libraries this project references directly */
  readonly directLibraries: readonly Project[];
  /** Transitive closure of `directLibraries`, without duplicates */
  readonly allLibraries: readonly Project[];

  readonly isLibrary: boolean;

  /** Restrict the project to an explicit set of files */
  addFile(file: string): void;

  /** Go back to checking the whole project */
  resetSubset(): void;

  /** Record data read from the parsed manifest */
  readManifest(document: MarkupDocument): void;
}
