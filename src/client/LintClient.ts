/**
 * Lint Client
 *
 * The embedding tool's side of the engine: where findings go, where
 * diagnostics go, and where projects, configurations and parsers come
 * from. Subclasses implement `report` and override the parser getters for
 * the file kinds they can parse.
 */

import type { Context } from "../context/Context.js";
import type { Configuration } from "../config/Configuration.js";
import { FileConfiguration } from "../config/FileConfiguration.js";
import type { Project } from "../project/Project.js";
import { ProjectCache } from "../project/ProjectCache.js";
import type { Issue } from "../registry/Issue.js";
import type { Location } from "../types/index.js";
import type { ClassReader, DomParser, JavaParser } from "../types/parsers.js";
import { logger } from "../utils/logger.js";

export abstract class LintClient {
  private projectCache: ProjectCache | null = null;

  /**
   * Receive a finding. The engine hands reports to a `FilteringLintClient`
   * first, so disabled and ignored issues never arrive here.
   */
  abstract report(
    context: Context,
    issue: Issue,
    location: Location | null,
    message: string,
    data: unknown
  ): void;

  /**
   * Record a non-fatal diagnostic.
   */
  log(error: Error | null, message: string, context?: Context): void {
    const logContext = context ? { file: context.file } : undefined;
    if (error) {
      logger.error(`${message}: ${error.message}`, logContext);
    } else {
      logger.warn(message, logContext);
    }
  }

  getConfiguration(project: Project): Configuration {
    return FileConfiguration.load(project.dir);
  }

  /**
   * Look up the project rooted at `dir`. Repeated calls for the same
   * directory return the same instance.
   */
  getProject(dir: string, referenceDir: string): Project {
    if (this.projectCache === null) {
      this.projectCache = new ProjectCache(this);
    }
    return this.projectCache.getProject(dir, referenceDir);
  }

  getDomParser(): DomParser | null {
    return null;
  }

  getJavaParser(): JavaParser | null {
    return null;
  }

  getClassReader(): ClassReader | null {
    return null;
  }
}
