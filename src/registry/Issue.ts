/**
 * Issue definitions.
 *
 * An issue is the unit users enable, disable and suppress. Each one is
 * bound to the detector class that finds it; several issues may share a
 * detector class, in which case a single detector instance serves them all.
 */

import type { DetectorClass } from "../detectors/IDetector.js";
import type { ScopeSet } from "../scope/Scope.js";
import type { Category, Severity } from "../types/index.js";

export interface Issue {
  readonly id: string;
  readonly briefDescription: string;
  readonly explanation: string;
  readonly category: Category;
  /** 1 (lowest) to 10 (highest) */
  readonly priority: number;
  readonly defaultSeverity: Severity;
  /** Artifact categories the detector needs to see to find this issue */
  readonly scope: ScopeSet;
  /** `null` for reserved issues no detector reports */
  readonly implementation: DetectorClass | null;
  readonly enabledByDefault: boolean;
  readonly moreInfo: readonly string[];
}

export interface IssueDefinition {
  id: string;
  briefDescription: string;
  explanation?: string;
  category: Category;
  priority: number;
  severity: Severity;
  scope: ScopeSet;
  implementation: DetectorClass | null;
  enabledByDefault?: boolean;
  moreInfo?: string[];
}

export function createIssue(definition: IssueDefinition): Issue {
  if (definition.priority < 1 || definition.priority > 10) {
    throw new RangeError(`Issue ${definition.id}: priority must be between 1 and 10`);
  }

  return Object.freeze({
    id: definition.id,
    briefDescription: definition.briefDescription,
    explanation: definition.explanation ?? definition.briefDescription,
    category: definition.category,
    priority: definition.priority,
    defaultSeverity: definition.severity,
    scope: definition.scope,
    implementation: definition.implementation,
    enabledByDefault: definition.enabledByDefault ?? true,
    moreInfo: Object.freeze([...(definition.moreInfo ?? [])]),
  });
}
