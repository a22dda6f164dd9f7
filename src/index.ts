/**
 * Lint Orchestrator
 *
 * Scheduling, scope resolution and dispatch for pluggable lint detectors
 * over manifests, resource files, source files, compiled classes and the
 * shrinker configuration.
 */

// Engine
export { LintEngine } from "./engine/LintEngine.js";
export { EventType, EventNotifier, type LintListener } from "./engine/events.js";
export { ProjectResolver, isProjectDir } from "./engine/ProjectResolver.js";
export { DetectorScheduler } from "./engine/DetectorScheduler.js";
export { FileDispatcher } from "./engine/FileDispatcher.js";

// Scope
export { Scope, ScopeSet, checkSingleFile } from "./scope/Scope.js";
export { inferScope } from "./scope/inferScope.js";

// Contexts
export { Context, XmlContext, JavaContext, ClassContext } from "./context/Context.js";

// Detectors
export {
  ALL,
  DetectorCapability,
  describeDetector,
  isClassScanner,
  isJavaScanner,
  isXmlScanner,
  type ClassDetector,
  type ClassScanner,
  type DetectorClass,
  type IDetector,
  type JavaDetector,
  type JavaScanner,
  type NameFilter,
  type XmlDetector,
  type XmlScanner,
} from "./detectors/IDetector.js";
export {
  BaseClassDetector,
  BaseDetector,
  BaseJavaDetector,
  BaseXmlDetector,
} from "./detectors/BaseDetector.js";

// Registry
export { createIssue, type Issue, type IssueDefinition } from "./registry/Issue.js";
export { IssueRegistry, type DetectorSelection } from "./registry/IssueRegistry.js";
export { CANCELED_MESSAGE, LINT_CANCELED, PARSER_ERROR } from "./registry/builtinIssues.js";

// Projects
export type { Project } from "./project/Project.js";
export { FileProject, parseProperties } from "./project/FileProject.js";
export { ProjectCache } from "./project/ProjectCache.js";

// Resources
export { ResourceFolderType, getFolderType } from "./resources/ResourceFolderType.js";

// Configuration
export type { Configuration } from "./config/Configuration.js";
export {
  CONFIG_FILE_NAMES,
  FileConfiguration,
  matchesIgnorePattern,
  type ConfigFile,
  type IssueSettings,
} from "./config/FileConfiguration.js";
export {
  EngineOptionsSchema,
  MAX_PHASES,
  resolveEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
} from "./config/engineConfig.js";

// Clients
export { LintClient } from "./client/LintClient.js";
export { FilteringLintClient } from "./client/FilteringLintClient.js";

// Suppression
export { isSuppressedInBytecode, isSuppressedInSource } from "./suppression/suppression.js";

// Visitors
export { XmlVisitor } from "./visitors/XmlVisitor.js";
export { JavaVisitor } from "./visitors/JavaVisitor.js";

// Types
export * from "./types/index.js";
export type { ClassReader, DomParser, JavaParser } from "./types/parsers.js";
export { type Result, type Ok, type Err, ok, err, tryCatchSync } from "./types/result.js";

// Utilities
export { logger, type LogLevel } from "./utils/logger.js";
export { LintAssertionError } from "./utils/assertions.js";
export type { FileReadError } from "./utils/fileUtils.js";
