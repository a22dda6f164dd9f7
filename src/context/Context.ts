/**
 * Analysis Contexts
 *
 * A context ties together the engine, the project being scanned, the main
 * project the run is for, and the file under analysis. A fresh context is
 * created for every file, manifest and configuration file visited and
 * discarded once its detectors have returned.
 */

import type { LintClient } from "../client/LintClient.js";
import type { Configuration } from "../config/Configuration.js";
import type { IDetector } from "../detectors/IDetector.js";
import type { LintEngine } from "../engine/LintEngine.js";
import type { Project } from "../project/Project.js";
import type { Issue } from "../registry/Issue.js";
import type { ResourceFolderType } from "../resources/ResourceFolderType.js";
import type { Scope, ScopeSet } from "../scope/Scope.js";
import type {
  ClassNode,
  CompilationUnit,
  Location,
  MarkupDocument,
} from "../types/index.js";

export class Context {
  constructor(
    readonly engine: LintEngine,
    readonly project: Project,
    /** The project the user asked to check; `null` for project-level contexts */
    readonly mainProject: Project | null,
    readonly file: string
  ) {}

  get client(): LintClient {
    return this.engine.client;
  }

  get configuration(): Configuration {
    return this.project.configuration;
  }

  get scope(): ScopeSet {
    return this.engine.getScope();
  }

  get phase(): number {
    return this.engine.getPhase();
  }

  /** The project findings are ultimately reported for */
  get rootProject(): Project {
    return this.mainProject ?? this.project;
  }

  isEnabled(issue: Issue): boolean {
    return this.configuration.isEnabled(issue);
  }

  isInScope(scope: Scope): boolean {
    return this.scope.contains(scope);
  }

  report(issue: Issue, location: Location | null, message: string, data?: unknown): void {
    this.client.report(this, issue, location, message, data);
  }

  requestRepeat(detector: IDetector, scope?: ScopeSet | null): void {
    this.engine.requestRepeat(detector, scope);
  }
}

export class XmlContext extends Context {
  /** Set by the visitor once the file has been parsed */
  document: MarkupDocument | null = null;

  constructor(
    engine: LintEngine,
    project: Project,
    mainProject: Project | null,
    file: string,
    /** `null` for the manifest */
    readonly folderType: ResourceFolderType | null
  ) {
    super(engine, project, mainProject, file);
  }
}

export class JavaContext extends Context {
  /** Set by the visitor once the file has been parsed */
  compilationUnit: CompilationUnit | null = null;
}

export class ClassContext extends Context {
  constructor(
    engine: LintEngine,
    project: Project,
    mainProject: Project | null,
    file: string,
    /** The jar the class came from, or `null` for a class-output directory */
    readonly jarFile: string | null,
    readonly binDir: string,
    readonly bytes: Buffer,
    readonly classNode: ClassNode
  ) {
    super(engine, project, mainProject, file);
  }
}
