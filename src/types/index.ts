/**
 * Core types for the lint engine
 */

export enum Severity {
  FATAL = "fatal",
  ERROR = "error",
  WARNING = "warning",
  INFORMATIONAL = "informational",
  IGNORE = "ignore",
}

export enum Category {
  LINT = "Lint",
  CORRECTNESS = "Correctness",
  SECURITY = "Security",
  PERFORMANCE = "Performance",
  USABILITY = "Usability",
  ACCESSIBILITY = "Accessibility",
  I18N = "Internationalization",
}

export interface Position {
  line: number;
  column: number;
}

export interface Location {
  file: string;
  start?: Position;
  end?: Position;
}

export type {
  MarkupAttribute,
  MarkupElement,
  MarkupDocument,
} from "./markup.js";

export type {
  Annotation,
  AnnotationElement,
  AnnotationValue,
  ClassDeclaration,
  CompilationUnit,
  DeclarationNode,
  MethodDeclaration,
  Modifiers,
  PlainNode,
  SourceNode,
  VariableDefinition,
} from "./ast.js";

export type {
  AnnotatedElement,
  AnnotationArgument,
  AnnotationEntry,
  AnnotationNode,
  ClassNode,
  FieldNode,
  MethodNode,
} from "./bytecode.js";
