/**
 * Detector Scheduler
 *
 * Works out which detectors run over a project and under which scope
 * categories, and tracks the repeat requests that drive extra phases.
 *
 * Phase 1 uses fresh detector instances from the registry. Later phases
 * reuse the instances that asked to be repeated, so a detector can gather
 * data in one phase and act on it in the next.
 */

import type { LintClient } from "../client/LintClient.js";
import { MAX_PHASES, type EngineOptions } from "../config/engineConfig.js";
import {
  describeDetector,
  isClassScanner,
  isJavaScanner,
  isXmlScanner,
  type IDetector,
} from "../detectors/IDetector.js";
import type { Project } from "../project/Project.js";
import type { Issue } from "../registry/Issue.js";
import type { IssueRegistry } from "../registry/IssueRegistry.js";
import { Scope, ScopeSet } from "../scope/Scope.js";
import { lintAssert } from "../utils/assertions.js";
import { logger } from "../utils/logger.js";

const EMPTY_BUCKET: readonly IDetector[] = [];

/** Bucket → capability each of its detectors must have */
const BUCKET_CHECKS: ReadonlyArray<[Scope, (detector: IDetector) => boolean, string]> = [
  [Scope.MANIFEST, isXmlScanner, "markup"],
  [Scope.RESOURCE_FILE, isXmlScanner, "markup"],
  [Scope.ALL_RESOURCE_FILES, isXmlScanner, "markup"],
  [Scope.JAVA_FILE, isJavaScanner, "source"],
  [Scope.ALL_JAVA_FILES, isJavaScanner, "source"],
  [Scope.CLASS_FILE, isClassScanner, "bytecode"],
];

export class DetectorScheduler {
  private applicable: IDetector[] = [];
  private scopeDetectors = new Map<Scope, IDetector[]>();
  private phase = 1;
  private repeatDetectors: Set<IDetector> | null = null;
  private repeatScope: ScopeSet | null = null;

  constructor(
    private readonly registry: IssueRegistry,
    private readonly client: LintClient,
    private readonly options: EngineOptions
  ) {}

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  get detectors(): readonly IDetector[] {
    return this.applicable;
  }

  get currentPhase(): number {
    return this.phase;
  }

  getDetectors(scope: Scope): readonly IDetector[] {
    return this.scopeDetectors.get(scope) ?? EMPTY_BUCKET;
  }

  /**
   * Detectors of two buckets, each once, in first-seen order.
   */
  mergeDetectors(first: Scope, second: Scope): IDetector[] {
    return [...new Set([...this.getDetectors(first), ...this.getDetectors(second)])];
  }

  // -------------------------------------------------------------------------
  // Phase 1
  // -------------------------------------------------------------------------

  /**
   * Ask the registry for the detectors of `project` under `scope` and start
   * the project at phase 1.
   */
  computeDetectors(project: Project, scope: ScopeSet): readonly IDetector[] {
    this.phase = 1;
    this.repeatDetectors = null;
    this.repeatScope = null;

    const selection = this.registry.createDetectors(this.client, project.configuration, scope);
    this.applicable = selection.detectors;
    this.scopeDetectors = selection.scopeDetectors;

    this.validateScopeList();
    return this.applicable;
  }

  // -------------------------------------------------------------------------
  // Repeat Protocol
  // -------------------------------------------------------------------------

  /**
   * Record that `detector` wants another phase over `scope` (everything
   * when omitted). Requests accumulate until the next phase starts.
   */
  requestRepeat(detector: IDetector, scope?: ScopeSet | null): void {
    if (this.repeatDetectors === null) {
      this.repeatDetectors = new Set();
    }
    this.repeatDetectors.add(detector);

    const requested = scope ?? ScopeSet.ALL;
    this.repeatScope = this.repeatScope === null ? requested : this.repeatScope.union(requested);
  }

  hasRepeatRequests(): boolean {
    return this.repeatDetectors !== null;
  }

  /**
   * Move to the next phase. Returns false, leaving the phase unchanged,
   * once the last phase has run.
   */
  advancePhase(): boolean {
    if (this.phase >= MAX_PHASES) {
      return false;
    }
    this.phase++;
    return true;
  }

  /**
   * The part of `scope` the pending repeat requests asked for.
   */
  narrowScope(scope: ScopeSet): ScopeSet {
    return scope.intersect(this.repeatScope ?? ScopeSet.ALL);
  }

  /**
   * Replace the applicable detectors with the ones that requested a
   * repeat and still have an issue enabled in `project`, keeping their
   * instances. Clears the pending requests.
   */
  computeRepeatingDetectors(project: Project): readonly IDetector[] {
    const requested = this.repeatDetectors ?? new Set<IDetector>();
    this.repeatDetectors = null;
    this.repeatScope = null;

    const issuesByImplementation = new Map<unknown, Issue[]>();
    for (const issue of this.registry.getIssues()) {
      if (issue.implementation === null) {
        continue;
      }
      const list = issuesByImplementation.get(issue.implementation);
      if (list === undefined) {
        issuesByImplementation.set(issue.implementation, [issue]);
      } else {
        list.push(issue);
      }
    }

    const configuration = project.configuration;
    const detectors: IDetector[] = [];
    const scopeDetectors = new Map<Scope, IDetector[]>();

    for (const detector of requested) {
      const enabled = (issuesByImplementation.get(detector.constructor) ?? []).filter((issue) =>
        configuration.isEnabled(issue)
      );
      if (enabled.length === 0) {
        continue;
      }

      detectors.push(detector);
      const detectorScope = enabled.reduce(
        (union, issue) => union.union(issue.scope),
        ScopeSet.EMPTY
      );
      for (const category of detectorScope) {
        const bucket = scopeDetectors.get(category);
        if (bucket === undefined) {
          scopeDetectors.set(category, [detector]);
        } else {
          bucket.push(detector);
        }
      }
    }

    this.applicable = detectors;
    this.scopeDetectors = scopeDetectors;

    logger.debug(
      `[DetectorScheduler] Phase ${this.phase}: repeating ${detectors.length} of ${requested.size} requested detectors`
    );

    this.validateScopeList();
    return this.applicable;
  }

  // -------------------------------------------------------------------------
  // Consistency
  // -------------------------------------------------------------------------

  private validateScopeList(): void {
    if (!this.options.assertions) {
      return;
    }

    for (const [scope, hasCapability, capability] of BUCKET_CHECKS) {
      for (const detector of this.getDetectors(scope)) {
        lintAssert(
          true,
          hasCapability(detector),
          () => `${describeDetector(detector)} is registered for ${scope} but is not a ${capability} scanner`
        );
      }
    }
  }
}
