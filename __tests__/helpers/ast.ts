/**
 * Builders for source trees with parent links.
 */

import type {
  Annotation,
  AnnotationValue,
  ClassDeclaration,
  MethodDeclaration,
  PlainNode,
  SourceNode,
  VariableDefinition,
} from "../../src/types/index.js";

function attach<T extends SourceNode>(node: T): T {
  for (const child of node.children) {
    child.parent = node;
  }
  return node;
}

export function plainNode(type: string, children: SourceNode[] = []): PlainNode {
  const node: PlainNode = { kind: "node", type, parent: null, children };
  return attach(node);
}

export function variableDecl(
  name: string,
  annotations: Annotation[] = [],
  children: SourceNode[] = []
): VariableDefinition {
  const node: VariableDefinition = {
    kind: "variable",
    type: "VariableDefinition",
    name,
    modifiers: { annotations },
    parent: null,
    children,
  };
  return attach(node);
}

export function methodDecl(
  name: string,
  annotations: Annotation[] = [],
  children: SourceNode[] = []
): MethodDeclaration {
  const node: MethodDeclaration = {
    kind: "method",
    type: "MethodDeclaration",
    name,
    modifiers: { annotations },
    parent: null,
    children,
  };
  return attach(node);
}

export function classDecl(
  name: string,
  annotations: Annotation[] = [],
  children: SourceNode[] = []
): ClassDeclaration {
  const node: ClassDeclaration = {
    kind: "class",
    type: "ClassDeclaration",
    name,
    modifiers: { annotations },
    parent: null,
    children,
  };
  return attach(node);
}

function literal(value: string): AnnotationValue {
  return { kind: "string", value };
}

/**
 * `@<typeName>("id")` for one id, `@<typeName>({"a", "b"})` for several.
 */
export function annotation(typeName: string, ...ids: string[]): Annotation {
  const value: AnnotationValue =
    ids.length === 1 ? literal(ids.join("")) : { kind: "array", elements: ids.map(literal) };
  return { typeName, elements: [{ name: null, value }] };
}
