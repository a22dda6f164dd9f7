import type { JavaContext, XmlContext } from "../context/Context.js";
import type { ClassNode } from "./bytecode.js";
import type { CompilationUnit } from "./ast.js";
import type { MarkupDocument } from "./markup.js";

/**
 * Parsers are supplied by the embedding tool through its `LintClient`. A
 * parser that cannot make sense of a file returns `null` (and may report
 * `PARSER_ERROR` through the context); it should not throw.
 */

export interface DomParser {
  parseXml(context: XmlContext): MarkupDocument | null;
}

export interface JavaParser {
  parseJava(context: JavaContext): CompilationUnit | null;
}

export interface ClassReader {
  /**
   * Build the structural representation of a compiled class.
   *
   * @throws when the bytes are not a valid class file
   */
  read(bytes: Buffer): ClassNode;
}
