/**
 * Parsed markup (XML) trees, as handed to the engine by the embedding
 * tool's DOM parser.
 */

export interface MarkupAttribute {
  /** Qualified name, e.g. `android:layout_width` */
  name: string;
  value: string;
}

export interface MarkupElement {
  tagName: string;
  attributes: readonly MarkupAttribute[];
  children: readonly MarkupElement[];
}

export interface MarkupDocument {
  root: MarkupElement | null;
}
