import { ScopeSet } from "../scope/Scope.js";
import { Category, Severity } from "../types/index.js";
import { createIssue } from "./Issue.js";

/**
 * Reported by parsers when a file cannot be parsed. Exempt from the
 * "detector reported a disabled issue" diagnostic.
 */
export const PARSER_ERROR = createIssue({
  id: "ParserError",
  briefDescription: "Parser Errors",
  explanation:
    "Lint will ignore any files that contain fatal parsing errors. These may contain other errors, or contain code which affects issues in other files.",
  category: Category.CORRECTNESS,
  priority: 10,
  severity: Severity.ERROR,
  scope: ScopeSet.EMPTY,
  implementation: null,
});

/** Placeholder issue carried by the report synthesized for a canceled run */
export const LINT_CANCELED = createIssue({
  id: "Lint",
  briefDescription: "Lint canceled",
  category: Category.LINT,
  priority: 1,
  severity: Severity.INFORMATIONAL,
  scope: ScopeSet.EMPTY,
  implementation: null,
});

export const CANCELED_MESSAGE = "Lint canceled by user";
