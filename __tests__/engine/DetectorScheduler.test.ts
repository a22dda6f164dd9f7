/**
 * Detector Scheduler Tests
 *
 * Tests for detector buckets, the repeat protocol and phase bookkeeping
 * using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import { BaseClassDetector, BaseJavaDetector, BaseXmlDetector } from "../../src/detectors/BaseDetector.js";
import { DetectorScheduler } from "../../src/engine/DetectorScheduler.js";
import { createIssue, type IssueDefinition } from "../../src/registry/Issue.js";
import { IssueRegistry } from "../../src/registry/IssueRegistry.js";
import { Scope, ScopeSet } from "../../src/scope/Scope.js";
import { Category, Severity } from "../../src/types/index.js";
import { LintAssertionError } from "../../src/utils/assertions.js";
import { RecordingClient, stubProject } from "../helpers/fakes.js";

class LayoutDetector extends BaseXmlDetector {}
class IncludeDetector extends BaseXmlDetector {}
class CallDetector extends BaseJavaDetector {}
class MisfiledDetector extends BaseXmlDetector {}
class UnregisteredDetector extends BaseClassDetector {}

function issue(id: string, scope: ScopeSet, implementation: IssueDefinition["implementation"]) {
  return createIssue({
    id,
    briefDescription: id,
    category: Category.CORRECTNESS,
    priority: 5,
    severity: Severity.WARNING,
    scope,
    implementation,
  });
}

const ISSUES = [
  issue("LayoutSingle", ScopeSet.of(Scope.RESOURCE_FILE), LayoutDetector),
  issue("IncludeAll", ScopeSet.of(Scope.ALL_RESOURCE_FILES), IncludeDetector),
  issue("LayoutAll", ScopeSet.of(Scope.ALL_RESOURCE_FILES), LayoutDetector),
  issue("Calls", ScopeSet.of(Scope.JAVA_FILE), CallDetector),
];

const project = stubProject("/work/app");

function createScheduler(issues = ISSUES, assertions = true): DetectorScheduler {
  return new DetectorScheduler(new IssueRegistry(issues), new RecordingClient(), { assertions });
}

describe("DetectorScheduler", () => {
  // ==========================================================================
  // Buckets
  // ==========================================================================

  describe("buckets", () => {
    it("should merge two buckets without duplicates in first-seen order", () => {
      // Given: A detector in both resource buckets and one in the aggregate bucket only
      const scheduler = createScheduler();

      // When: Computing detectors for every scope
      const detectors = scheduler.computeDetectors(project, ScopeSet.ALL);
      const [layout, include] = detectors;

      // Then: The merged list holds each detector once
      expect(layout).toBeInstanceOf(LayoutDetector);
      expect(include).toBeInstanceOf(IncludeDetector);
      expect(scheduler.getDetectors(Scope.RESOURCE_FILE)).toEqual([layout]);
      expect(scheduler.getDetectors(Scope.ALL_RESOURCE_FILES)).toEqual([layout, include]);
      expect(scheduler.mergeDetectors(Scope.RESOURCE_FILE, Scope.ALL_RESOURCE_FILES)).toEqual([
        layout,
        include,
      ]);
      expect(scheduler.getDetectors(Scope.CLASS_FILE)).toEqual([]);
    });

    it("should start each project at phase 1 with no pending repeats", () => {
      const scheduler = createScheduler();
      const [layout] = scheduler.computeDetectors(project, ScopeSet.ALL);
      if (layout === undefined) throw new Error("expected a detector");
      scheduler.requestRepeat(layout);
      scheduler.advancePhase();

      scheduler.computeDetectors(project, ScopeSet.ALL);

      expect(scheduler.currentPhase).toBe(1);
      expect(scheduler.hasRepeatRequests()).toBe(false);
    });
  });

  // ==========================================================================
  // Repeat Protocol
  // ==========================================================================

  describe("repeats", () => {
    it("should keep the instance that asked to be repeated", () => {
      // Given: The source detector asks for another pass over source files
      const scheduler = createScheduler();
      const detectors = scheduler.computeDetectors(project, ScopeSet.ALL);
      const calls = detectors.find((detector) => detector instanceof CallDetector);
      if (calls === undefined) throw new Error("expected a source detector");
      scheduler.requestRepeat(calls, ScopeSet.of(Scope.JAVA_FILE));

      // When: Moving to the next phase
      expect(scheduler.advancePhase()).toBe(true);
      const narrowed = scheduler.narrowScope(ScopeSet.ALL);
      const repeating = scheduler.computeRepeatingDetectors(project);

      // Then: Only that instance runs, over source files only
      expect(scheduler.currentPhase).toBe(2);
      expect(narrowed.values()).toEqual([Scope.JAVA_FILE]);
      expect(repeating).toEqual([calls]);
      expect(repeating[0]).toBe(calls);
      expect(scheduler.getDetectors(Scope.JAVA_FILE)).toEqual([calls]);
      expect(scheduler.getDetectors(Scope.RESOURCE_FILE)).toEqual([]);
      expect(scheduler.hasRepeatRequests()).toBe(false);
    });

    it("should union the scopes of several requests", () => {
      const scheduler = createScheduler();
      const [layout, , calls] = scheduler.computeDetectors(project, ScopeSet.ALL);
      if (layout === undefined || calls === undefined) throw new Error("expected detectors");

      scheduler.requestRepeat(layout, ScopeSet.of(Scope.RESOURCE_FILE));
      scheduler.requestRepeat(calls, ScopeSet.of(Scope.JAVA_FILE));

      expect(scheduler.narrowScope(ScopeSet.ALL).values()).toEqual([
        Scope.RESOURCE_FILE,
        Scope.JAVA_FILE,
      ]);
    });

    it("should narrow to the current scope when no scope is requested", () => {
      const scheduler = createScheduler();
      const [layout] = scheduler.computeDetectors(project, ScopeSet.ALL);
      if (layout === undefined) throw new Error("expected a detector");

      scheduler.requestRepeat(layout);

      expect(scheduler.narrowScope(ScopeSet.of(Scope.MANIFEST)).values()).toEqual([Scope.MANIFEST]);
    });

    it("should drop repeat requests from detectors without enabled issues", () => {
      const scheduler = createScheduler();
      scheduler.computeDetectors(project, ScopeSet.ALL);
      scheduler.requestRepeat(new UnregisteredDetector());

      scheduler.advancePhase();

      expect(scheduler.computeRepeatingDetectors(project)).toEqual([]);
    });

    it("should stop advancing at the last phase", () => {
      const scheduler = createScheduler();
      scheduler.computeDetectors(project, ScopeSet.ALL);

      expect(scheduler.advancePhase()).toBe(true);
      expect(scheduler.advancePhase()).toBe(true);
      expect(scheduler.advancePhase()).toBe(false);
      expect(scheduler.currentPhase).toBe(3);
    });
  });

  // ==========================================================================
  // Consistency
  // ==========================================================================

  describe("validation", () => {
    const misfiled = [issue("Misfiled", ScopeSet.of(Scope.CLASS_FILE), MisfiledDetector)];

    it("should reject a detector filed under a scope it cannot scan", () => {
      // Given: A markup detector registered for compiled classes
      const scheduler = createScheduler(misfiled);

      // When/Then: Computing detectors fails the check
      expect(() => scheduler.computeDetectors(project, ScopeSet.ALL)).toThrow(LintAssertionError);
      expect(() => scheduler.computeDetectors(project, ScopeSet.ALL)).toThrow(
        "MisfiledDetector is registered for class-file but is not a bytecode scanner"
      );
    });

    it("should skip the check when assertions are off", () => {
      const scheduler = createScheduler(misfiled, false);

      expect(scheduler.computeDetectors(project, ScopeSet.ALL)).toHaveLength(1);
    });
  });
});
