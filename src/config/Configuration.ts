import type { Context } from "../context/Context.js";
import type { Issue } from "../registry/Issue.js";
import type { Location, Severity } from "../types/index.js";

/**
 * Per-project issue configuration: which issues are enabled, which reports
 * are ignored, and at what severity the rest are reported.
 */
export interface Configuration {
  isEnabled(issue: Issue): boolean;

  isIgnored(
    context: Context,
    issue: Issue,
    location: Location | null,
    message: string,
    data: unknown
  ): boolean;

  getSeverity(issue: Issue): Severity;
}
