/**
 * Lint Engine
 *
 * Entry point for a lint run. Resolves the given paths into projects,
 * works out the scope, and checks each project in turn: project hooks,
 * file detectors over the project and its libraries, then any extra
 * phases detectors asked for.
 *
 * Runs are synchronous and single-threaded. `cancel()` may be called from
 * a detector or listener at any time; the run stops at the next unit of
 * work, reports `LINT_CANCELED` once and fires `CANCELED`.
 */

import { FilteringLintClient } from "../client/FilteringLintClient.js";
import type { LintClient } from "../client/LintClient.js";
import {
  MAX_PHASES,
  resolveEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
} from "../config/engineConfig.js";
import { Context } from "../context/Context.js";
import type { IDetector } from "../detectors/IDetector.js";
import type { Project } from "../project/Project.js";
import { CANCELED_MESSAGE, LINT_CANCELED } from "../registry/builtinIssues.js";
import type { Issue } from "../registry/Issue.js";
import type { IssueRegistry } from "../registry/IssueRegistry.js";
import { inferScope } from "../scope/inferScope.js";
import { checkSingleFile, ScopeSet } from "../scope/Scope.js";
import { isSuppressedInBytecode, isSuppressedInSource } from "../suppression/suppression.js";
import type { ClassNode, FieldNode, MethodNode, SourceNode } from "../types/index.js";
import { formatDuration, logger } from "../utils/logger.js";
import { DetectorScheduler } from "./DetectorScheduler.js";
import { EventNotifier, EventType, type LintListener } from "./events.js";
import { FileDispatcher } from "./FileDispatcher.js";
import { ProjectResolver } from "./ProjectResolver.js";

/** Collaborators of one `analyze` call */
interface RunState {
  scheduler: DetectorScheduler;
  dispatcher: FileDispatcher;
  signal: AbortSignal;
  /** Whether `LINT_CANCELED` has been reported in this run */
  canceledReported: boolean;
}

/**
 * @example
 * ```ts
 * const engine = new LintEngine(new IssueRegistry(ISSUES), new ConsoleClient());
 * engine.addLintListener((_engine, type, context) => {
 *   if (type === EventType.SCANNING_FILE) console.log(context?.file);
 * });
 * engine.analyze(["/work/app"]);
 * ```
 */
export class LintEngine {
  /** The client detectors report through; filters disabled and ignored issues */
  readonly client: LintClient;

  private readonly options: EngineOptions;
  private readonly notifier: EventNotifier;

  private controller = new AbortController();
  private scope: ScopeSet = ScopeSet.ALL;
  private scheduler: DetectorScheduler | null = null;

  constructor(
    private readonly registry: IssueRegistry,
    client: LintClient,
    options: EngineOptionsInput = {}
  ) {
    this.client = new FilteringLintClient(client);
    this.options = resolveEngineOptions(options);
    this.notifier = new EventNotifier(this);
  }

  // -------------------------------------------------------------------------
  // Main Analysis
  // -------------------------------------------------------------------------

  /**
   * Check the projects found at `files`.
   *
   * @param files - project directories, folders inside projects, or files
   * @param scope - categories to check; inferred from `files` when `null`
   */
  analyze(files: readonly string[], scope: ScopeSet | null = null): void {
    this.controller = new AbortController();
    const signal = this.controller.signal;
    const startTime = Date.now();

    this.scope = scope ?? ScopeSet.ALL;
    const projects = new ProjectResolver(this.client, signal, this.options).resolve(files);
    if (signal.aborted) {
      return;
    }
    if (projects.length === 0) {
      this.client.log(null, `No projects found for ${files.join(", ")}`);
      return;
    }

    this.scope = scope ?? inferScope(projects);

    const scheduler = new DetectorScheduler(this.registry, this.client, this.options);
    const dispatcher = new FileDispatcher(this, scheduler, this.notifier, signal);
    this.scheduler = scheduler;
    const run: RunState = { scheduler, dispatcher, signal, canceledReported: false };

    logger.info(`[LintEngine] Checking ${projects.length} projects`, {
      scope: this.scope.toString(),
    });
    this.notifier.fire(EventType.STARTING);

    let current: Project | undefined = projects[0];
    for (const project of projects) {
      if (signal.aborted) {
        break;
      }
      current = project;

      const detectors = scheduler.computeDetectors(project, this.scope);
      dispatcher.resetVisitorCache();

      if (detectors.length === 0) {
        logger.debug(`[LintEngine] No detectors enabled for ${project.dir}; skipping`);
        continue;
      }

      this.checkProject(run, project);
      if (signal.aborted) {
        break;
      }

      this.runExtraPhases(run, project);
      if (signal.aborted) {
        break;
      }
    }

    if (signal.aborted && current !== undefined) {
      this.reportCanceled(run, new Context(this, current, null, current.dir));
    }

    logger.info(
      `[LintEngine] ${signal.aborted ? "Canceled" : "Completed"} after ${formatDuration(Date.now() - startTime)}`
    );
    this.notifier.fire(signal.aborted ? EventType.CANCELED : EventType.COMPLETED);
  }

  /**
   * Stop the current run at the next unit of work.
   */
  cancel(): void {
    this.controller.abort();
  }

  isCanceled(): boolean {
    return this.controller.signal.aborted;
  }

  // -------------------------------------------------------------------------
  // Detector-facing State
  // -------------------------------------------------------------------------

  getScope(): ScopeSet {
    return this.scope;
  }

  /** The current phase, starting at 1 for each project */
  getPhase(): number {
    return this.scheduler?.currentPhase ?? 1;
  }

  /**
   * Ask for another phase over the current project, restricted to `scope`
   * (everything when omitted). The same detector instance is run again.
   */
  requestRepeat(detector: IDetector, scope?: ScopeSet | null): void {
    if (this.scheduler === null) {
      logger.warn("[LintEngine] requestRepeat called outside of a run");
      return;
    }
    this.scheduler.requestRepeat(detector, scope);
  }

  addLintListener(listener: LintListener): void {
    this.notifier.add(listener);
  }

  removeLintListener(listener: LintListener): void {
    this.notifier.remove(listener);
  }

  // -------------------------------------------------------------------------
  // Suppression
  // -------------------------------------------------------------------------

  /**
   * Whether `issue` is suppressed on a compiled class, method or field.
   * A `null` issue asks whether every issue is suppressed there.
   */
  isSuppressed(issue: Issue | null, element: ClassNode | MethodNode | FieldNode): boolean;
  /**
   * Whether `issue` is suppressed on a source node or one of its enclosing
   * declarations.
   */
  isSuppressed(issue: Issue | null, node: SourceNode): boolean;
  isSuppressed(issue: Issue | null, target: ClassNode | MethodNode | FieldNode | SourceNode): boolean {
    if ("kind" in target) {
      return isSuppressedInSource(issue, target);
    }
    return isSuppressedInBytecode(issue, target);
  }

  // -------------------------------------------------------------------------
  // Project Checking
  // -------------------------------------------------------------------------

  private checkProject(run: RunState, project: Project): void {
    const projectContext = new Context(this, project, null, project.dir);

    this.runProjectChecks(run, project, projectContext);

    if (run.signal.aborted) {
      this.reportCanceled(run, projectContext);
    }
  }

  private reportCanceled(run: RunState, context: Context): void {
    if (run.canceledReported) {
      return;
    }
    run.canceledReported = true;
    this.client.report(context, LINT_CANCELED, null, CANCELED_MESSAGE, null);
  }

  private runProjectChecks(run: RunState, project: Project, projectContext: Context): void {
    const { scheduler, dispatcher, signal } = run;
    const detectors = scheduler.detectors;

    this.notifier.fire(EventType.SCANNING_PROJECT, projectContext);

    for (const detector of detectors) {
      detector.beforeCheckProject(projectContext);
      if (signal.aborted) {
        return;
      }
    }

    dispatcher.runFileDetectors(project, project);
    if (signal.aborted) {
      return;
    }

    if (!checkSingleFile(this.scope)) {
      for (const library of project.directLibraries) {
        const libraryContext = new Context(this, library, project, library.dir);
        this.notifier.fire(EventType.SCANNING_LIBRARY_PROJECT, libraryContext);

        for (const detector of detectors) {
          detector.beforeCheckLibraryProject(libraryContext);
          if (signal.aborted) {
            return;
          }
        }

        dispatcher.runFileDetectors(library, project);
        if (signal.aborted) {
          return;
        }

        for (const detector of detectors) {
          detector.afterCheckLibraryProject(libraryContext);
          if (signal.aborted) {
            return;
          }
        }
      }
    }

    for (const detector of detectors) {
      detector.afterCheckProject(projectContext);
      if (signal.aborted) {
        return;
      }
    }
  }

  /**
   * Run the phases detectors requested for `project`. The scope narrows to
   * what was requested and is restored afterwards, since phases belong to
   * one project.
   */
  private runExtraPhases(run: RunState, project: Project): void {
    const { scheduler, dispatcher, signal } = run;
    if (!scheduler.hasRepeatRequests()) {
      return;
    }

    const originalScope = this.scope;
    try {
      do {
        if (!scheduler.advancePhase()) {
          break;
        }
        this.notifier.fire(EventType.NEW_PHASE, new Context(this, project, null, project.dir));

        this.scope = scheduler.narrowScope(this.scope);
        if (this.scope.isEmpty()) {
          break;
        }

        const detectors = scheduler.computeRepeatingDetectors(project);
        dispatcher.resetVisitorCache();
        if (detectors.length === 0) {
          continue;
        }

        this.checkProject(run, project);
        if (signal.aborted) {
          break;
        }
      } while (scheduler.currentPhase < MAX_PHASES && scheduler.hasRepeatRequests());
    } finally {
      this.scope = originalScope;
    }
  }
}
