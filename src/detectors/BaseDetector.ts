/**
 * Base classes for detectors. Every hook defaults to a no-op so that a
 * detector only overrides what it needs.
 *
 * @example
 * ```ts
 * class HardcodedTextDetector extends BaseXmlDetector {
 *   getApplicableAttributes() {
 *     return ["text"];
 *   }
 *
 *   visitAttribute(context: XmlContext, element: MarkupElement, attribute: MarkupAttribute) {
 *     if (!attribute.value.startsWith("@")) {
 *       context.report(HARDCODED_TEXT, { file: context.file }, "Hardcoded string");
 *     }
 *   }
 * }
 * ```
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
import {
  DetectorCapability,
  type ClassScanner,
  type IDetector,
  type JavaScanner,
  type NameFilter,
  type XmlScanner,
} from "./IDetector.js";

export abstract class BaseDetector implements IDetector {
  readonly capabilities: ReadonlySet<DetectorCapability> = new Set<DetectorCapability>();

  beforeCheckProject(_context: Context): void {}

  afterCheckProject(_context: Context): void {}

  beforeCheckLibraryProject(_context: Context): void {}

  afterCheckLibraryProject(_context: Context): void {}

  beforeCheckFile(_context: Context): void {}

  afterCheckFile(_context: Context): void {}

  appliesTo(_context: Context, _file: string): boolean {
    return true;
  }

  run(_context: Context): void {}
}

/** Detector for the manifest and resource XML files */
export abstract class BaseXmlDetector extends BaseDetector implements XmlScanner {
  readonly capabilities: ReadonlySet<DetectorCapability> = new Set([
    DetectorCapability.XML,
  ]);

  appliesToFolder(_folderType: ResourceFolderType): boolean {
    return true;
  }

  getApplicableElements(): NameFilter {
    return null;
  }

  getApplicableAttributes(): NameFilter {
    return null;
  }

  visitDocument(_context: XmlContext, _document: MarkupDocument): void {}

  visitElement(_context: XmlContext, _element: MarkupElement): void {}

  visitAttribute(_context: XmlContext, _element: MarkupElement, _attribute: MarkupAttribute): void {}
}

/** Detector for source files */
export abstract class BaseJavaDetector extends BaseDetector implements JavaScanner {
  readonly capabilities: ReadonlySet<DetectorCapability> = new Set([
    DetectorCapability.JAVA,
  ]);

  getApplicableNodeTypes(): readonly string[] | null {
    return null;
  }

  visitCompilationUnit(_context: JavaContext, _unit: CompilationUnit): void {}

  visitNode(_context: JavaContext, _node: SourceNode): void {}
}

/** Detector for compiled classes */
export abstract class BaseClassDetector extends BaseDetector implements ClassScanner {
  readonly capabilities: ReadonlySet<DetectorCapability> = new Set([
    DetectorCapability.CLASS,
  ]);

  checkClass(_context: ClassContext, _classNode: ClassNode): void {}
}
