import type { Context } from "../context/Context.js";
import type { Configuration } from "../config/Configuration.js";
import type { Project } from "../project/Project.js";
import { PARSER_ERROR } from "../registry/builtinIssues.js";
import type { Issue } from "../registry/Issue.js";
import { Severity, type Location } from "../types/index.js";
import type { ClassReader, DomParser, JavaParser } from "../types/parsers.js";
import { LintClient } from "./LintClient.js";

/**
 * Sits between the engine and the embedding tool's client. Reports for
 * disabled issues, ignored locations and `ignore` severity are dropped;
 * everything else is forwarded unchanged.
 */
export class FilteringLintClient extends LintClient {
  constructor(private readonly delegate: LintClient) {
    super();
  }

  report(
    context: Context,
    issue: Issue,
    location: Location | null,
    message: string,
    data: unknown
  ): void {
    const configuration = context.configuration;

    if (!configuration.isEnabled(issue)) {
      if (issue !== PARSER_ERROR) {
        this.delegate.log(null, `Incorrect detector reported disabled issue ${issue.id}`);
      }
      return;
    }

    if (configuration.isIgnored(context, issue, location, message, data)) {
      return;
    }

    if (configuration.getSeverity(issue) === Severity.IGNORE) {
      return;
    }

    this.delegate.report(context, issue, location, message, data);
  }

  log(error: Error | null, message: string, context?: Context): void {
    this.delegate.log(error, message, context);
  }

  getConfiguration(project: Project): Configuration {
    return this.delegate.getConfiguration(project);
  }

  getProject(dir: string, referenceDir: string): Project {
    return this.delegate.getProject(dir, referenceDir);
  }

  getDomParser(): DomParser | null {
    return this.delegate.getDomParser();
  }

  getJavaParser(): JavaParser | null {
    return this.delegate.getJavaParser();
  }

  getClassReader(): ClassReader | null {
    return this.delegate.getClassReader();
  }
}
