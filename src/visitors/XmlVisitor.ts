/**
 * XML Visitor
 *
 * Runs a fixed list of markup detectors over one file at a time. The
 * element and attribute dispatch tables are computed once per visitor,
 * which is why the file dispatcher reuses a visitor across folders when
 * the detector list has not changed.
 */

import type { XmlContext } from "../context/Context.js";
import { ALL, type XmlDetector } from "../detectors/IDetector.js";
import type { MarkupAttribute, MarkupElement } from "../types/index.js";
import type { DomParser } from "../types/parsers.js";

function localName(name: string): string {
  const colon = name.indexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
}

function addTo(table: Map<string, XmlDetector[]>, name: string, detector: XmlDetector): void {
  const list = table.get(name);
  if (list === undefined) {
    table.set(name, [detector]);
  } else {
    list.push(detector);
  }
}

export class XmlVisitor {
  private readonly elementDetectors = new Map<string, XmlDetector[]>();
  private readonly attributeDetectors = new Map<string, XmlDetector[]>();
  private readonly allElementDetectors: XmlDetector[] = [];
  private readonly allAttributeDetectors: XmlDetector[] = [];

  constructor(
    private readonly parser: DomParser,
    readonly detectors: readonly XmlDetector[]
  ) {
    for (const detector of detectors) {
      const elements = detector.getApplicableElements();
      if (elements === ALL) {
        this.allElementDetectors.push(detector);
      } else if (elements !== null) {
        for (const element of elements) {
          addTo(this.elementDetectors, element, detector);
        }
      }

      const attributes = detector.getApplicableAttributes();
      if (attributes === ALL) {
        this.allAttributeDetectors.push(detector);
      } else if (attributes !== null) {
        for (const attribute of attributes) {
          addTo(this.attributeDetectors, attribute, detector);
        }
      }
    }
  }

  /**
   * Parse the context's file, unless a document was already parsed for it,
   * and run every detector over it. Files that do not parse are skipped.
   */
  visitFile(context: XmlContext): void {
    if (context.document === null) {
      context.document = this.parser.parseXml(context);
    }
    const document = context.document;
    if (document === null) {
      return;
    }

    for (const detector of this.detectors) {
      detector.beforeCheckFile(context);
    }

    for (const detector of this.detectors) {
      detector.visitDocument(context, document);
    }

    if (
      document.root !== null &&
      (this.elementDetectors.size > 0 ||
        this.attributeDetectors.size > 0 ||
        this.allElementDetectors.length > 0 ||
        this.allAttributeDetectors.length > 0)
    ) {
      this.visitElement(context, document.root);
    }

    for (const detector of this.detectors) {
      detector.afterCheckFile(context);
    }
  }

  private visitElement(context: XmlContext, element: MarkupElement): void {
    for (const detector of this.elementDetectors.get(element.tagName) ?? []) {
      detector.visitElement(context, element);
    }
    for (const detector of this.allElementDetectors) {
      detector.visitElement(context, element);
    }

    for (const attribute of element.attributes) {
      this.visitAttribute(context, element, attribute);
    }

    for (const child of element.children) {
      this.visitElement(context, child);
    }
  }

  private visitAttribute(
    context: XmlContext,
    element: MarkupElement,
    attribute: MarkupAttribute
  ): void {
    for (const detector of this.attributeDetectors.get(localName(attribute.name)) ?? []) {
      detector.visitAttribute(context, element, attribute);
    }
    for (const detector of this.allAttributeDetectors) {
      detector.visitAttribute(context, element, attribute);
    }
  }
}
