/**
 * Source AST
 *
 * The engine only cares about a handful of node kinds: the three
 * declaration kinds that can carry suppression annotations, and every
 * other node as an opaque `"node"` with a type name for visitor dispatch.
 */

// ============================================================================
// Annotations
// ============================================================================

export type AnnotationValue =
  | { kind: "string"; value: string }
  | { kind: "array"; elements: readonly AnnotationValue[] }
  | { kind: "expression"; text: string };

export interface AnnotationElement {
  /** `null` for the implicit `value` element */
  name: string | null;
  value: AnnotationValue | null;
}

export interface Annotation {
  /** Type name as written in source, possibly qualified */
  typeName: string;
  elements: readonly AnnotationElement[];
}

export interface Modifiers {
  annotations: readonly Annotation[];
}

// ============================================================================
// Nodes
// ============================================================================

interface NodeBase {
  /** Node type name used for visitor dispatch, e.g. `MethodInvocation` */
  type: string;
  parent: SourceNode | null;
  children: readonly SourceNode[];
}

export interface VariableDefinition extends NodeBase {
  kind: "variable";
  name: string;
  modifiers: Modifiers | null;
}

export interface MethodDeclaration extends NodeBase {
  kind: "method";
  name: string;
  modifiers: Modifiers | null;
}

export interface ClassDeclaration extends NodeBase {
  kind: "class";
  name: string;
  modifiers: Modifiers | null;
}

export interface PlainNode extends NodeBase {
  kind: "node";
}

export type SourceNode = VariableDefinition | MethodDeclaration | ClassDeclaration | PlainNode;

export type DeclarationNode = VariableDefinition | MethodDeclaration | ClassDeclaration;

export interface CompilationUnit {
  packageName: string | null;
  root: SourceNode;
}
