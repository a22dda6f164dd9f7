import type { LintClient } from "../client/LintClient.js";
import { canonicalPath } from "../utils/fileUtils.js";
import { FileProject } from "./FileProject.js";
import type { Project } from "./Project.js";

/**
 * Hands out one `FileProject` per canonical directory.
 */
export class ProjectCache {
  private readonly projects = new Map<string, Project>();

  constructor(private readonly client: LintClient) {}

  getProject(dir: string, referenceDir: string): Project {
    const key = canonicalPath(dir);

    const cached = this.projects.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const project = new FileProject(this.client, key, referenceDir);
    this.projects.set(key, project);
    return project;
  }

  get size(): number {
    return this.projects.size;
  }
}
