/**
 * Issue Registry
 *
 * Holds the known issues and turns them into detector instances for a run.
 * Detectors are instantiated once per detector class, however many of the
 * class's issues are enabled, and filed under every scope category their
 * enabled issues need.
 */

import type { LintClient } from "../client/LintClient.js";
import type { Configuration } from "../config/Configuration.js";
import type { DetectorClass, IDetector } from "../detectors/IDetector.js";
import { Scope, ScopeSet } from "../scope/Scope.js";
import { logger } from "../utils/logger.js";
import type { Issue } from "./Issue.js";

// ============================================================================
// Types
// ============================================================================

export interface DetectorSelection {
  /** Detectors in issue registration order */
  detectors: IDetector[];
  /** Detectors interested in each scope category */
  scopeDetectors: Map<Scope, IDetector[]>;
}

// ============================================================================
// Registry Class
// ============================================================================

/**
 * @example
 * ```ts
 * const registry = new IssueRegistry([HARDCODED_TEXT, UNUSED_RESOURCES]);
 * const { detectors, scopeDetectors } = registry.createDetectors(
 *   client,
 *   project.configuration,
 *   ScopeSet.ALL
 * );
 * ```
 */
export class IssueRegistry {
  private readonly issues = new Map<string, Issue>();

  constructor(issues: Iterable<Issue> = []) {
    for (const issue of issues) {
      this.register(issue);
    }
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  register(issue: Issue): void {
    if (this.issues.has(issue.id)) {
      logger.warn(`[IssueRegistry] Overwriting existing issue: ${issue.id}`);
    }
    this.issues.set(issue.id, issue);
  }

  unregister(id: string): boolean {
    return this.issues.delete(id);
  }

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  getIssues(): Issue[] {
    return Array.from(this.issues.values());
  }

  getIssue(id: string): Issue | undefined {
    return this.issues.get(id);
  }

  // -------------------------------------------------------------------------
  // Detector Creation
  // -------------------------------------------------------------------------

  /**
   * Instantiate the detectors for the issues that are enabled in
   * `configuration` and can run under `scope`.
   *
   * Detector constructors are not guarded; a constructor that throws fails
   * the run.
   */
  createDetectors(
    _client: LintClient,
    configuration: Configuration,
    scope: ScopeSet
  ): DetectorSelection {
    const scopes = new Map<DetectorClass, ScopeSet>();

    for (const issue of this.issues.values()) {
      const detectorClass = issue.implementation;
      if (detectorClass === null || !configuration.isEnabled(issue) || !scope.admits(issue.scope)) {
        continue;
      }
      scopes.set(detectorClass, (scopes.get(detectorClass) ?? ScopeSet.EMPTY).union(issue.scope));
    }

    const detectors: IDetector[] = [];
    const scopeDetectors = new Map<Scope, IDetector[]>();

    for (const [detectorClass, detectorScope] of scopes) {
      const detector = new detectorClass();
      detectors.push(detector);

      for (const category of detectorScope) {
        const bucket = scopeDetectors.get(category);
        if (bucket === undefined) {
          scopeDetectors.set(category, [detector]);
        } else {
          bucket.push(detector);
        }
      }
    }

    logger.debug(`[IssueRegistry] Created ${detectors.length} detectors for scope ${scope}`);

    return { detectors, scopeDetectors };
  }
}
