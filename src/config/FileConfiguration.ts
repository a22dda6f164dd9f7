/**
 * File-backed Configuration
 *
 * Reads issue settings from `lint.json`, `lint.yml` or `lint.yaml` in the
 * project directory:
 *
 * ```yaml
 * issues:
 *   HardcodedText:
 *     severity: error
 *   UnusedResources:
 *     ignore:
 *       - res/values/generated.xml
 *       - res/raw/
 *   all:
 *     ignore:
 *       - "src/**\/Generated*"
 * ```
 *
 * The `all` entry applies to every issue; a specific entry wins over it.
 */

import { z } from "zod";
import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join, relative, sep } from "node:path";
import { parse as parseYaml } from "yaml";
import { ClassContext, type Context } from "../context/Context.js";
import type { Issue } from "../registry/Issue.js";
import { Severity, type Location } from "../types/index.js";
import { SUPPRESS_ALL } from "../utils/constants.js";
import { logger } from "../utils/logger.js";
import type { Configuration } from "./Configuration.js";

// ============================================================================
// Schema Definitions
// ============================================================================

const IssueSettingsSchema = z.object({
  severity: z.nativeEnum(Severity).optional(),
  ignore: z.array(z.string()).optional(),
});

const ConfigFileSchema = z.object({
  issues: z.record(IssueSettingsSchema).default({}),
});

export type IssueSettings = z.infer<typeof IssueSettingsSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const CONFIG_FILE_NAMES = ["lint.json", "lint.yml", "lint.yaml"] as const;

// ============================================================================
// Pattern Matching
// ============================================================================

function escapeRegex(text: string): string {
  return text.replace(/[.+^${}()|[\]\\]/g, "\\$&");
}

/**
 * Match a project-relative path against an ignore pattern: a trailing `/`
 * means a directory prefix, `*` and `?` are wildcards, anything else must
 * name the file or one of its parent directories.
 */
export function matchesIgnorePattern(relativePath: string, pattern: string): boolean {
  const normalizedPath = relativePath.split(sep).join("/");
  const normalizedPattern = pattern.replace(/\\/g, "/");

  if (normalizedPattern.endsWith("/")) {
    return normalizedPath.startsWith(normalizedPattern);
  }

  if (normalizedPattern.includes("*") || normalizedPattern.includes("?")) {
    const source = escapeRegex(normalizedPattern).replace(/\*+/g, ".*").replace(/\?/g, ".");
    return new RegExp(`^${source}$`).test(normalizedPath);
  }

  return normalizedPath === normalizedPattern || normalizedPath.startsWith(`${normalizedPattern}/`);
}

/**
 * The file a report is filed against. Classes read from a jar carry their
 * entry name, so they are matched by the jar's path.
 */
function reportedPath(context: Context, location: Location | null): string {
  const file = location?.file ?? context.file;
  if (!isAbsolute(file) && context instanceof ClassContext && context.jarFile !== null) {
    return context.jarFile;
  }
  return file;
}

// ============================================================================
// Configuration
// ============================================================================

export class FileConfiguration implements Configuration {
  constructor(
    private readonly projectDir: string,
    private readonly settings: ConfigFile = { issues: {} },
    private readonly parent: Configuration | null = null
  ) {}

  /**
   * Load the configuration of a project directory. A missing file yields
   * defaults; an unreadable or invalid one is logged and yields defaults.
   */
  static load(projectDir: string, parent: Configuration | null = null): FileConfiguration {
    const configPath = CONFIG_FILE_NAMES.map((name) => join(projectDir, name)).find((path) =>
      existsSync(path)
    );

    if (configPath === undefined) {
      return new FileConfiguration(projectDir, undefined, parent);
    }

    try {
      const content = readFileSync(configPath, "utf-8");
      const parsed: unknown = configPath.endsWith(".json")
        ? JSON.parse(content)
        : parseYaml(content);
      const settings = ConfigFileSchema.parse(parsed ?? {});

      logger.debug(`[FileConfiguration] Loaded ${configPath}`, {
        issues: Object.keys(settings.issues).length,
      });
      return new FileConfiguration(projectDir, settings, parent);
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        logger.error(`[FileConfiguration] Invalid config ${configPath}: ${issues}`);
      } else {
        logger.error(
          `[FileConfiguration] Failed to load ${configPath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      return new FileConfiguration(projectDir, undefined, parent);
    }
  }

  isEnabled(issue: Issue): boolean {
    const severity = this.explicitSeverity(issue);
    if (severity !== undefined) {
      return severity !== Severity.IGNORE;
    }
    if (this.parent) {
      return this.parent.isEnabled(issue);
    }
    return issue.enabledByDefault && issue.defaultSeverity !== Severity.IGNORE;
  }

  isIgnored(
    context: Context,
    issue: Issue,
    location: Location | null,
    message: string,
    data: unknown
  ): boolean {
    const patterns = [
      ...(this.settings.issues[issue.id]?.ignore ?? []),
      ...(this.settings.issues[SUPPRESS_ALL]?.ignore ?? []),
    ];

    if (patterns.length > 0) {
      const relativePath = relative(this.projectDir, reportedPath(context, location));
      if (patterns.some((pattern) => matchesIgnorePattern(relativePath, pattern))) {
        return true;
      }
    }

    return this.parent?.isIgnored(context, issue, location, message, data) ?? false;
  }

  getSeverity(issue: Issue): Severity {
    return this.explicitSeverity(issue) ?? this.parent?.getSeverity(issue) ?? issue.defaultSeverity;
  }

  private explicitSeverity(issue: Issue): Severity | undefined {
    return (
      this.settings.issues[issue.id]?.severity ?? this.settings.issues[SUPPRESS_ALL]?.severity
    );
  }
}
