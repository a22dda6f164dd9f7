/**
 * Suppression Lookup
 *
 * Answers whether a finding is suppressed at a given place, from either
 * the annotations the bytecode reader found on a class, method or field,
 * or the annotations on the declarations enclosing a source node.
 *
 * A suppression lists issue ids or `all`, compared case-insensitively. A
 * `null` issue asks whether everything is suppressed and matches `all`
 * only.
 */

import type { Issue } from "../registry/Issue.js";
import type {
  AnnotatedElement,
  AnnotationArgument,
  AnnotationValue,
  SourceNode,
} from "../types/index.js";
import { SUPPRESS_ALL, SUPPRESS_LINT, SUPPRESS_LINT_VMSIG, SUPPRESS_WARNINGS } from "../utils/constants.js";

const VALUE_ELEMENT = "value";

function matchesSuppression(issue: Issue | null, id: string): boolean {
  const lower = id.toLowerCase();
  if (lower === SUPPRESS_ALL) {
    return true;
  }
  return issue !== null && lower === issue.id.toLowerCase();
}

// ============================================================================
// Bytecode
// ============================================================================

function argumentMatches(issue: Issue | null, value: AnnotationArgument): boolean {
  if (typeof value === "string") {
    return matchesSuppression(issue, value);
  }
  if (typeof value === "object") {
    return value.some((element) => argumentMatches(issue, element));
  }
  return false;
}

/**
 * Whether a class, method or field carries a suppression annotation
 * covering `issue`.
 */
export function isSuppressedInBytecode(issue: Issue | null, element: AnnotatedElement): boolean {
  for (const annotation of element.annotations ?? []) {
    if (!annotation.desc.endsWith(SUPPRESS_LINT_VMSIG)) {
      continue;
    }

    for (const entry of annotation.values ?? []) {
      if (entry.name === VALUE_ELEMENT && argumentMatches(issue, entry.value)) {
        return true;
      }
    }
  }

  return false;
}

// ============================================================================
// Source
// ============================================================================

function annotationValueMatches(issue: Issue | null, value: AnnotationValue): boolean {
  switch (value.kind) {
    case "string":
      return matchesSuppression(issue, value.value);
    case "array":
      return value.elements.some(
        (element) => element.kind === "string" && matchesSuppression(issue, element.value)
      );
    case "expression":
      return false;
  }
}

function isSuppressionAnnotation(typeName: string): boolean {
  return typeName.endsWith(SUPPRESS_LINT) || typeName.endsWith(SUPPRESS_WARNINGS);
}

/**
 * Whether `node` or one of its enclosing variable, method or class
 * declarations carries a suppression annotation covering `issue`.
 */
export function isSuppressedInSource(issue: Issue | null, node: SourceNode): boolean {
  let current: SourceNode | null = node;

  while (current !== null) {
    switch (current.kind) {
      case "variable":
      case "method":
      case "class":
        for (const annotation of current.modifiers?.annotations ?? []) {
          if (!isSuppressionAnnotation(annotation.typeName)) {
            continue;
          }
          for (const element of annotation.elements) {
            if (element.value !== null && annotationValueMatches(issue, element.value)) {
              return true;
            }
          }
        }
        break;
      case "node":
        break;
    }

    current = current.parent;
  }

  return false;
}
