/**
 * Issue Registry Tests
 *
 * Tests for issue registration and detector selection
 * using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import { FileConfiguration } from "../../src/config/FileConfiguration.js";
import { BaseJavaDetector, BaseXmlDetector } from "../../src/detectors/BaseDetector.js";
import { createIssue } from "../../src/registry/Issue.js";
import { IssueRegistry } from "../../src/registry/IssueRegistry.js";
import { PARSER_ERROR } from "../../src/registry/builtinIssues.js";
import { Scope, ScopeSet } from "../../src/scope/Scope.js";
import { Category, Severity } from "../../src/types/index.js";
import { RecordingClient } from "../helpers/fakes.js";

class DuplicateIdDetector extends BaseXmlDetector {}
class UnusedImportDetector extends BaseJavaDetector {}
class OptInDetector extends BaseJavaDetector {}

const DUPLICATE_ID = createIssue({
  id: "DuplicateId",
  briefDescription: "Duplicate ids in one layout",
  category: Category.CORRECTNESS,
  priority: 7,
  severity: Severity.WARNING,
  scope: ScopeSet.of(Scope.RESOURCE_FILE),
  implementation: DuplicateIdDetector,
});

const DUPLICATE_INCLUDED_ID = createIssue({
  id: "DuplicateIncludedIds",
  briefDescription: "Duplicate ids across layouts",
  category: Category.CORRECTNESS,
  priority: 6,
  severity: Severity.WARNING,
  scope: ScopeSet.of(Scope.ALL_RESOURCE_FILES),
  implementation: DuplicateIdDetector,
});

const UNUSED_IMPORT = createIssue({
  id: "UnusedImport",
  briefDescription: "Unused import",
  category: Category.PERFORMANCE,
  priority: 2,
  severity: Severity.INFORMATIONAL,
  scope: ScopeSet.of(Scope.JAVA_FILE),
  implementation: UnusedImportDetector,
});

const OPT_IN = createIssue({
  id: "OptIn",
  briefDescription: "Only when configured",
  category: Category.USABILITY,
  priority: 1,
  severity: Severity.WARNING,
  scope: ScopeSet.of(Scope.JAVA_FILE),
  implementation: OptInDetector,
  enabledByDefault: false,
});

const ISSUES = [DUPLICATE_ID, DUPLICATE_INCLUDED_ID, UNUSED_IMPORT, OPT_IN, PARSER_ERROR];

describe("IssueRegistry", () => {
  const client = new RecordingClient();
  const configuration = new FileConfiguration("/work/app");

  // ==========================================================================
  // Lookup
  // ==========================================================================

  describe("lookup", () => {
    it("should return issues in registration order", () => {
      const registry = new IssueRegistry(ISSUES);

      expect(registry.getIssues().map((issue) => issue.id)).toEqual([
        "DuplicateId",
        "DuplicateIncludedIds",
        "UnusedImport",
        "OptIn",
        "ParserError",
      ]);
      expect(registry.getIssue("UnusedImport")).toBe(UNUSED_IMPORT);
      expect(registry.getIssue("Missing")).toBeUndefined();
    });

    it("should replace an issue registered twice", () => {
      const registry = new IssueRegistry([UNUSED_IMPORT]);
      const replacement = createIssue({
        id: "UnusedImport",
        briefDescription: "Replacement",
        category: Category.PERFORMANCE,
        priority: 2,
        severity: Severity.ERROR,
        scope: ScopeSet.of(Scope.JAVA_FILE),
        implementation: UnusedImportDetector,
      });

      registry.register(replacement);

      expect(registry.getIssues()).toEqual([replacement]);
      expect(registry.unregister("UnusedImport")).toBe(true);
      expect(registry.unregister("UnusedImport")).toBe(false);
    });

    it("should reject priorities outside 1-10", () => {
      expect(() =>
        createIssue({
          id: "Bad",
          briefDescription: "Bad",
          category: Category.LINT,
          priority: 11,
          severity: Severity.WARNING,
          scope: ScopeSet.EMPTY,
          implementation: null,
        })
      ).toThrow(RangeError);
    });
  });

  // ==========================================================================
  // Detector Creation
  // ==========================================================================

  describe("createDetectors()", () => {
    it("should create one detector per class and file it under every scope", () => {
      // Given: Two issues sharing a detector class
      const registry = new IssueRegistry(ISSUES);

      // When: Creating detectors for every scope
      const { detectors, scopeDetectors } = registry.createDetectors(
        client,
        configuration,
        ScopeSet.ALL
      );

      // Then: The shared class has one instance in both resource buckets
      expect(detectors).toHaveLength(2);
      const [duplicateId, unusedImport] = detectors;
      expect(duplicateId).toBeInstanceOf(DuplicateIdDetector);
      expect(unusedImport).toBeInstanceOf(UnusedImportDetector);
      expect(scopeDetectors.get(Scope.RESOURCE_FILE)).toEqual([duplicateId]);
      expect(scopeDetectors.get(Scope.ALL_RESOURCE_FILES)).toEqual([duplicateId]);
      expect(scopeDetectors.get(Scope.JAVA_FILE)).toEqual([unusedImport]);
      expect(scopeDetectors.has(Scope.CLASS_FILE)).toBe(false);
    });

    it("should skip issues whose scope is not admitted", () => {
      // Given: Only manifest scope
      const registry = new IssueRegistry(ISSUES);

      // When: Creating detectors
      const { detectors, scopeDetectors } = registry.createDetectors(
        client,
        configuration,
        ScopeSet.of(Scope.MANIFEST)
      );

      // Then: Nothing applies
      expect(detectors).toEqual([]);
      expect(scopeDetectors.size).toBe(0);
    });

    it("should admit aggregate issues under the single-file scope", () => {
      const registry = new IssueRegistry(ISSUES);

      const { detectors } = registry.createDetectors(
        client,
        configuration,
        ScopeSet.of(Scope.RESOURCE_FILE)
      );

      expect(detectors).toHaveLength(1);
      expect(detectors[0]).toBeInstanceOf(DuplicateIdDetector);
    });

    it("should include issues enabled by the configuration", () => {
      // Given: A configuration enabling the opt-in issue
      const registry = new IssueRegistry(ISSUES);
      const enabling = new FileConfiguration("/work/app", {
        issues: { OptIn: { severity: Severity.WARNING } },
      });

      // When: Creating detectors for source files
      const { detectors } = registry.createDetectors(
        client,
        enabling,
        ScopeSet.of(Scope.JAVA_FILE)
      );

      // Then: Both source detectors are created
      expect(detectors.map((detector) => detector.constructor)).toEqual([
        UnusedImportDetector,
        OptInDetector,
      ]);
    });
  });
});
