/**
 * Detector Interface
 *
 * A detector is a pluggable check. The engine only sequences calls into it:
 * project hooks, library-project hooks, per-file hooks, and the scanner
 * callbacks for whichever capabilities the detector declares.
 *
 * Capabilities are declared as a tag set and probed with the type guards
 * at the bottom of this file before any scanner callback is invoked.
 */

import type { ClassContext, Context, JavaContext, XmlContext } from "../context/Context.js";
import type { ResourceFolderType } from "../resources/ResourceFolderType.js";
import type {
  ClassNode,
  CompilationUnit,
  MarkupAttribute,
  MarkupDocument,
  MarkupElement,
  SourceNode,
} from "../types/index.js";

// ============================================================================
// Capabilities
// ============================================================================

export enum DetectorCapability {
  /** Markup (manifest and resource XML) scanner */
  XML = "xml",
  /** Source AST scanner */
  JAVA = "java",
  /** Bytecode scanner */
  CLASS = "class",
}

/** Subscribe to every element or attribute name */
export const ALL = "all";

export type NameFilter = readonly string[] | typeof ALL | null;

// ============================================================================
// Core Interface
// ============================================================================

export interface IDetector {
  readonly capabilities: ReadonlySet<DetectorCapability>;

  beforeCheckProject(context: Context): void;
  afterCheckProject(context: Context): void;

  /** Called before a library project is checked on behalf of `context.mainProject` */
  beforeCheckLibraryProject(context: Context): void;
  afterCheckLibraryProject(context: Context): void;

  beforeCheckFile(context: Context): void;
  afterCheckFile(context: Context): void;

  appliesTo(context: Context, file: string): boolean;

  /** Whole-file check for files visited without a scanner (the shrinker config) */
  run(context: Context): void;
}

/** Detectors are identified by their class; the registry instantiates them */
export type DetectorClass = new () => IDetector;

// ============================================================================
// Scanner Interfaces
// ============================================================================

export interface XmlScanner {
  /** Whether resource files in folders of this type are of interest */
  appliesToFolder(folderType: ResourceFolderType): boolean;

  /** Element tag names to receive in `visitElement` */
  getApplicableElements(): NameFilter;

  /** Attribute local names to receive in `visitAttribute` */
  getApplicableAttributes(): NameFilter;

  visitDocument(context: XmlContext, document: MarkupDocument): void;
  visitElement(context: XmlContext, element: MarkupElement): void;
  visitAttribute(context: XmlContext, element: MarkupElement, attribute: MarkupAttribute): void;
}

export interface JavaScanner {
  /** Node type names to receive in `visitNode` */
  getApplicableNodeTypes(): readonly string[] | null;

  visitCompilationUnit(context: JavaContext, unit: CompilationUnit): void;
  visitNode(context: JavaContext, node: SourceNode): void;
}

export interface ClassScanner {
  checkClass(context: ClassContext, classNode: ClassNode): void;
}

export type XmlDetector = IDetector & XmlScanner;
export type JavaDetector = IDetector & JavaScanner;
export type ClassDetector = IDetector & ClassScanner;

// ============================================================================
// Capability Probing
// ============================================================================

export function isXmlScanner(detector: IDetector): detector is XmlDetector {
  return detector.capabilities.has(DetectorCapability.XML) && "visitDocument" in detector;
}

export function isJavaScanner(detector: IDetector): detector is JavaDetector {
  return detector.capabilities.has(DetectorCapability.JAVA) && "visitCompilationUnit" in detector;
}

export function isClassScanner(detector: IDetector): detector is ClassDetector {
  return detector.capabilities.has(DetectorCapability.CLASS) && "checkClass" in detector;
}

export function describeDetector(detector: IDetector): string {
  return detector.constructor.name;
}
