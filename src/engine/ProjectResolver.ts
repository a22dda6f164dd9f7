/**
 * Project Resolver
 *
 * Turns the paths given to `analyze` into the root projects to check. A
 * path may be a project directory, a folder inside a project (source or
 * resource folder), a directory containing projects further down, or a
 * single file inside a project. Library projects reachable from another
 * resolved project are checked as part of it, not on their own.
 */

import { dirname, join, resolve } from "node:path";
import type { LintClient } from "../client/LintClient.js";
import type { EngineOptions } from "../config/engineConfig.js";
import type { Project } from "../project/Project.js";
import { lintAssert } from "../utils/assertions.js";
import { ANDROID_MANIFEST_XML } from "../utils/constants.js";
import {
  canonicalPath,
  getCommonParent,
  isDirectory,
  isFile,
  listDirectories,
} from "../utils/fileUtils.js";
import { logger } from "../utils/logger.js";

/** A project directory is one that contains a manifest */
export function isProjectDir(dir: string): boolean {
  return isFile(join(dir, ANDROID_MANIFEST_XML));
}

function parentOf(path: string): string | null {
  const parent = dirname(path);
  return parent === path ? null : parent;
}

export class ProjectResolver {
  constructor(
    private readonly client: LintClient,
    private readonly signal: AbortSignal,
    private readonly options: EngineOptions
  ) {}

  /**
   * Resolve `paths` into root projects, in the order they were found.
   * Returns an empty list if the run is canceled while resolving.
   */
  resolve(paths: readonly string[]): Project[] {
    const files = paths.map((path) => resolve(path));
    const fileToProject = new Map<string, Project>();

    let sharedRoot: string | null = null;
    if (files.length > 1) {
      sharedRoot = getCommonParent(files);
      if (sharedRoot !== null && parentOf(sharedRoot) === null) {
        sharedRoot = null;
      }
    }

    for (const file of files) {
      if (isDirectory(file)) {
        const rootDir = sharedRoot ?? (files.length > 1 ? (parentOf(file) ?? file) : file);
        this.resolveDirectory(file, rootDir, fileToProject);
      } else {
        this.resolveFile(file, fileToProject);
      }

      if (this.signal.aborted) {
        return [];
      }
    }

    const projects: Project[] = [];
    for (const project of fileToProject.values()) {
      if (!projects.includes(project)) {
        projects.push(project);
      }
    }

    // Cached projects outlive a run; subsets are rebuilt from this call's paths
    for (const project of projects) {
      project.resetSubset();
      for (const library of project.allLibraries) {
        library.resetSubset();
      }
    }

    for (const [file, project] of fileToProject) {
      if (file !== project.dir && !(isDirectory(file) && canonicalPath(file) === project.dir)) {
        project.addFile(file);
      }
    }

    const libraries = new Set<Project>();
    for (const project of projects) {
      for (const library of project.allLibraries) {
        libraries.add(library);
      }
    }
    const roots = projects.filter((project) => !libraries.has(project));

    this.checkUniqueDirectories(roots);

    logger.debug(`[ProjectResolver] Resolved ${roots.length} root projects`, {
      paths: paths.length,
      discovered: projects.length,
    });

    return roots;
  }

  // -------------------------------------------------------------------------
  // Search
  // -------------------------------------------------------------------------

  private resolveDirectory(dir: string, rootDir: string, fileToProject: Map<string, Project>): void {
    if (isProjectDir(dir)) {
      this.register(fileToProject, dir, dir, rootDir);
      return;
    }

    // Pointed at a folder inside a project, such as src/ or res/layout/
    let parent = parentOf(dir);
    for (let depth = 0; depth < 2 && parent !== null; depth++) {
      if (isProjectDir(parent)) {
        this.register(fileToProject, dir, parent, parent);
        return;
      }
      parent = parentOf(parent);
    }

    this.searchDownwards(dir, rootDir, fileToProject);
  }

  private searchDownwards(dir: string, rootDir: string, fileToProject: Map<string, Project>): void {
    if (this.signal.aborted) {
      return;
    }

    if (isProjectDir(dir)) {
      this.register(fileToProject, dir, dir, rootDir);
      return;
    }

    for (const child of listDirectories(dir)) {
      this.searchDownwards(child, rootDir, fileToProject);
    }
  }

  private resolveFile(file: string, fileToProject: Map<string, Project>): void {
    let parent = parentOf(file);
    while (parent !== null) {
      if (isProjectDir(parent)) {
        this.register(fileToProject, file, parent, parent);
        return;
      }
      parent = parentOf(parent);
    }

    logger.debug(`[ProjectResolver] No project found above ${file}`);
  }

  private register(
    fileToProject: Map<string, Project>,
    file: string,
    projectDir: string,
    rootDir: string
  ): void {
    fileToProject.set(file, this.client.getProject(projectDir, rootDir));
  }

  // -------------------------------------------------------------------------
  // Consistency
  // -------------------------------------------------------------------------

  private checkUniqueDirectories(roots: readonly Project[]): void {
    if (!this.options.assertions) {
      return;
    }

    const byDir = new Map<string, Project>();
    for (const project of roots.flatMap((root) => [root, ...root.allLibraries])) {
      const existing = byDir.get(project.dir);
      lintAssert(
        true,
        existing === undefined || existing === project,
        () => `Project cache returned two instances for ${project.dir}`
      );
      byDir.set(project.dir, project);
    }
  }
}
