/**
 * Structural class-file representation produced by the embedding tool's
 * bytecode reader.
 */

export type AnnotationArgument = string | number | boolean | readonly AnnotationArgument[];

export interface AnnotationEntry {
  name: string;
  value: AnnotationArgument;
}

export interface AnnotationNode {
  /** Type descriptor, e.g. `Landroid/annotation/SuppressLint;` */
  desc: string;
  values?: readonly AnnotationEntry[];
}

export interface MethodNode {
  name: string;
  desc: string;
  annotations?: readonly AnnotationNode[];
}

export interface FieldNode {
  name: string;
  desc: string;
  annotations?: readonly AnnotationNode[];
}

export interface ClassNode {
  /** Internal name, e.g. `com/example/Foo` */
  name: string;
  superName?: string | null;
  sourceFile?: string | null;
  annotations?: readonly AnnotationNode[];
  methods: readonly MethodNode[];
  fields: readonly FieldNode[];
}

export type AnnotatedElement = ClassNode | MethodNode | FieldNode;
