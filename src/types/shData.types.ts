import type { EscapedText } from "../utils/valueEscaper";

export type XmlScalar = string | number | boolean;

/**
 * Per-field presence policy.
 *
 * REQUIRED            - value must exist; rendering fails otherwise
 * OPTIONAL_EMIT_EMPTY - absent value renders an empty element (mandatory-but-nullable)
 * OPTIONAL_OMIT       - absent value drops the element
 */
export enum FieldPresence {
  REQUIRED = "required",
  OPTIONAL_EMIT_EMPTY = "optional-emit-empty",
  OPTIONAL_OMIT = "optional-omit",
}

export interface LeafNodeSpec<R> {
  readonly kind: "leaf";
  readonly name: string;
  readonly presence: FieldPresence;
  readonly value: (record: R) => XmlScalar | undefined;
}

export interface RepeatedNodeSpec<R> {
  readonly kind: "repeated";
  readonly name: string;
  readonly presence: FieldPresence;
  readonly values: (record: R) => readonly XmlScalar[];
}

export interface BlockNodeSpec<R> {
  readonly kind: "block";
  readonly name: string;
  // Without a condition the block is always rendered
  readonly condition?: (record: R) => boolean;
  readonly children: readonly SchemaNode<R>[];
}

export type SchemaNode<R> = LeafNodeSpec<R> | RepeatedNodeSpec<R> | BlockNodeSpec<R>;

export interface DocumentSchema<R> {
  readonly name: string;
  readonly root: BlockNodeSpec<R>;
}

/**
 * Nodes appended to the children of the block found at `target`
 * (slash separated element path, e.g. "Sh-Data/Sh-IMS-Data").
 */
export interface SchemaExtension<R> {
  readonly name: string;
  readonly description: string;
  readonly target: string;
  readonly nodes: readonly SchemaNode<R>[];
}

export interface FieldPolicyEntry {
  path: string;
  kind: SchemaNode<unknown>["kind"];
  presence: FieldPresence | null;
  conditional: boolean;
}

export interface RenderedElement {
  readonly name: string;
  readonly path: string;
  readonly children: readonly RenderedElement[];
  readonly text?: EscapedText;
}

export interface RenderedDocument<R> {
  readonly schema: DocumentSchema<R>;
  readonly root: RenderedElement;
}

export interface AssemblerOptions {
  prettyPrint: boolean;
  indent: number;
  verifyWellFormed: boolean;
}
