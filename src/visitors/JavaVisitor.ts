import type { JavaContext } from "../context/Context.js";
import type { JavaDetector } from "../detectors/IDetector.js";
import type { SourceNode } from "../types/index.js";
import type { JavaParser } from "../types/parsers.js";

/**
 * Runs a fixed list of source detectors over one compilation unit at a
 * time, dispatching nodes by type name in pre-order.
 */
export class JavaVisitor {
  private readonly nodeDetectors = new Map<string, JavaDetector[]>();

  constructor(
    private readonly parser: JavaParser,
    readonly detectors: readonly JavaDetector[]
  ) {
    for (const detector of detectors) {
      for (const type of detector.getApplicableNodeTypes() ?? []) {
        const list = this.nodeDetectors.get(type);
        if (list === undefined) {
          this.nodeDetectors.set(type, [detector]);
        } else {
          list.push(detector);
        }
      }
    }
  }

  visitFile(context: JavaContext): void {
    const unit = this.parser.parseJava(context);
    if (unit === null) {
      return;
    }
    context.compilationUnit = unit;

    for (const detector of this.detectors) {
      detector.beforeCheckFile(context);
    }

    for (const detector of this.detectors) {
      detector.visitCompilationUnit(context, unit);
    }

    if (this.nodeDetectors.size > 0) {
      this.visitNode(context, unit.root);
    }

    for (const detector of this.detectors) {
      detector.afterCheckFile(context);
    }
  }

  private visitNode(context: JavaContext, node: SourceNode): void {
    for (const detector of this.nodeDetectors.get(node.type) ?? []) {
      detector.visitNode(context, node);
    }
    for (const child of node.children) {
      this.visitNode(context, child);
    }
  }
}
