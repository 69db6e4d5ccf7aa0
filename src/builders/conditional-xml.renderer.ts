import { ValidationError } from "../errors/shData.errors";
import {
  BlockNodeSpec,
  DocumentSchema,
  FieldPolicyEntry,
  FieldPresence,
  LeafNodeSpec,
  RenderedDocument,
  RenderedElement,
  RepeatedNodeSpec,
  SchemaNode,
  XmlScalar,
} from "../types/shData.types";
import { EscapedText } from "../utils/valueEscaper";

// An empty string does not satisfy a required field
const isEmptyRequired = (value: XmlScalar, presence: FieldPresence): boolean =>
  value === "" && presence === FieldPresence.REQUIRED;

const missingRequired = (path: string): ValidationError =>
  new ValidationError(`Required field ${path} has no value`, [
    { field: path, message: "required value is missing" },
  ]);

/**
 * Maps a record onto a fixed document schema.
 *
 * Blocks are visited in schema order; a block whose condition fails is
 * dropped together with its subtree, and its children are never evaluated.
 * Leaves follow their FieldPresence policy. Every value goes through
 * EscapedText, so the produced tree holds no raw input.
 */
export class ConditionalXmlRenderer<R> {
  constructor(private readonly schema: DocumentSchema<R>) {}

  render(record: R): RenderedDocument<R> {
    const root = this.schema.root;
    return {
      schema: this.schema,
      root: this.renderBlock(root, record, root.name),
    };
  }

  private renderNode(node: SchemaNode<R>, record: R, parentPath: string): RenderedElement[] {
    const path = `${parentPath}/${node.name}`;

    switch (node.kind) {
      case "block": {
        if (node.condition && !node.condition(record)) return [];
        const element = this.renderBlock(node, record, path);
        // A conditional block left with nothing inside is not emitted
        if (node.condition && element.children.length === 0) return [];
        return [element];
      }
      case "leaf":
        return this.renderLeaf(node, record, path);
      case "repeated":
        return this.renderRepeated(node, record, path);
    }
  }

  private renderBlock(node: BlockNodeSpec<R>, record: R, path: string): RenderedElement {
    return {
      name: node.name,
      path,
      children: node.children.flatMap((child) => this.renderNode(child, record, path)),
    };
  }

  private renderLeaf(node: LeafNodeSpec<R>, record: R, path: string): RenderedElement[] {
    const value = node.value(record);
    if (value === undefined || isEmptyRequired(value, node.presence)) {
      return this.renderAbsent(node, path);
    }
    return [{ name: node.name, path, children: [], text: EscapedText.of(value, path) }];
  }

  private renderRepeated(node: RepeatedNodeSpec<R>, record: R, path: string): RenderedElement[] {
    const values = node.values(record);
    if (values.length === 0) return this.renderAbsent(node, path);
    return values.map((value, index) => {
      const itemPath = `${path}[${index}]`;
      if (isEmptyRequired(value, node.presence)) throw missingRequired(itemPath);
      return { name: node.name, path, children: [], text: EscapedText.of(value, itemPath) };
    });
  }

  private renderAbsent(
    node: LeafNodeSpec<R> | RepeatedNodeSpec<R>,
    path: string,
  ): RenderedElement[] {
    switch (node.presence) {
      case FieldPresence.REQUIRED:
        throw missingRequired(path);
      case FieldPresence.OPTIONAL_EMIT_EMPTY:
        return [{ name: node.name, path, children: [] }];
      case FieldPresence.OPTIONAL_OMIT:
        return [];
    }
  }
}

/**
 * Flatten a schema into its presence policy table, in document order.
 */
export const describeFieldPolicies = <R>(schema: DocumentSchema<R>): FieldPolicyEntry[] => {
  const entries: FieldPolicyEntry[] = [];

  const visit = (node: SchemaNode<R>, parentPath: string | null, conditional: boolean): void => {
    const path = parentPath === null ? node.name : `${parentPath}/${node.name}`;
    if (node.kind === "block") {
      const isConditional = conditional || node.condition !== undefined;
      entries.push({ path, kind: node.kind, presence: null, conditional: isConditional });
      node.children.forEach((child) => visit(child, path, isConditional));
      return;
    }
    entries.push({ path, kind: node.kind, presence: node.presence, conditional });
  };

  visit(schema.root, null, false);
  return entries;
};
