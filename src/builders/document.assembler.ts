import { Parser } from "xml2js";
import { XML_DECLARATION } from "../constants/ShDataConstant";
import { AssemblyError } from "../errors/shData.errors";
import { isXmlName } from "../utils/valueEscaper";
import {
  AssemblerOptions,
  BlockNodeSpec,
  FieldPresence,
  RenderedDocument,
  RenderedElement,
  SchemaNode,
} from "../types/shData.types";

const DEFAULT_OPTIONS: AssemblerOptions = {
  prettyPrint: true,
  indent: 4,
  verifyWellFormed: true,
};

const assertElementName = (element: RenderedElement): void => {
  if (!isXmlName(element.name)) {
    throw new AssemblyError(`Element name '${element.name}' at ${element.path} is not a valid XML name`);
  }
};

/**
 * Serializes a rendered tree into the final XML string.
 * The tree is first checked against the schema it was rendered from; any
 * mismatch is a renderer defect and surfaces as AssemblyError.
 */
export class DocumentAssembler {
  private readonly options: AssemblerOptions;

  constructor(options: Partial<AssemblerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  assemble<R>(document: RenderedDocument<R>): string {
    this.verifyBlock(document.schema.root, document.root);

    const newline = this.options.prettyPrint ? "\n" : "";
    const xml = `${XML_DECLARATION}${newline}${this.serialize(document.root, 0)}`;

    if (this.options.verifyWellFormed) {
      this.assertWellFormed(xml);
    }
    return xml;
  }

  // ============================================================================
  // Tree contract
  // ============================================================================

  private verifyBlock<R>(spec: BlockNodeSpec<R>, element: RenderedElement): void {
    assertElementName(element);
    if (element.name !== spec.name) {
      throw new AssemblyError(
        `Expected <${spec.name}> at ${element.path}, found <${element.name}>`,
      );
    }
    if (element.text !== undefined) {
      throw new AssemblyError(`Block ${element.path} must not carry text`);
    }

    let cursor = 0;
    for (const childSpec of spec.children) {
      let count = 0;
      while (element.children[cursor + count]?.name === childSpec.name) count++;
      const matched = element.children.slice(cursor, cursor + count);
      cursor += count;
      this.verifyChild(childSpec, matched, `${element.path}/${childSpec.name}`);
    }

    const unexpected = element.children[cursor];
    if (unexpected !== undefined) {
      throw new AssemblyError(
        `Unexpected element <${unexpected.name}> under ${element.path}`,
      );
    }
  }

  private verifyChild<R>(
    spec: SchemaNode<R>,
    matched: readonly RenderedElement[],
    path: string,
  ): void {
    if (spec.kind === "block") {
      if (matched.length > 1) {
        throw new AssemblyError(`Block ${path} rendered ${matched.length} times`);
      }
      const [block] = matched;
      if (block === undefined) {
        if (spec.condition === undefined) {
          throw new AssemblyError(`Required block ${path} is missing`);
        }
        return;
      }
      this.verifyBlock(spec, block);
      return;
    }

    if (spec.kind === "leaf" && matched.length > 1) {
      throw new AssemblyError(`Field ${path} rendered ${matched.length} times`);
    }
    if (matched.length === 0 && spec.presence !== FieldPresence.OPTIONAL_OMIT) {
      throw new AssemblyError(`Field ${path} (${spec.presence}) is missing`);
    }

    for (const element of matched) {
      assertElementName(element);
      if (element.children.length > 0) {
        throw new AssemblyError(`Field ${path} must not contain child elements`);
      }
      const empty = element.text === undefined || element.text.value === "";
      if (
        (element.text === undefined && spec.presence !== FieldPresence.OPTIONAL_EMIT_EMPTY) ||
        (empty && spec.presence === FieldPresence.REQUIRED)
      ) {
        throw new AssemblyError(`Field ${path} (${spec.presence}) was rendered empty`);
      }
    }
  }

  // ============================================================================
  // Serialization
  // ============================================================================

  private serialize(element: RenderedElement, depth: number): string {
    const { prettyPrint, indent } = this.options;
    const pad = prettyPrint ? " ".repeat(indent * depth) : "";
    const newline = prettyPrint ? "\n" : "";

    if (element.children.length > 0) {
      const inner = element.children
        .map((child) => this.serialize(child, depth + 1))
        .join(newline);
      return `${pad}<${element.name}>${newline}${inner}${newline}${pad}</${element.name}>`;
    }
    if (element.text === undefined || element.text.value === "") {
      return `${pad}<${element.name}/>`;
    }
    return `${pad}<${element.name}>${element.text.value}</${element.name}>`;
  }

  private assertWellFormed(xml: string): void {
    // xml2js parses synchronously unless `async` is set, so the callback
    // has run by the time parseString returns
    const outcome: { error?: Error | null } = {};
    try {
      new Parser({ strict: true }).parseString(xml, (error: Error | null) => {
        // First report wins; sax keeps going after an error
        if (outcome.error === undefined) outcome.error = error;
      });
    } catch (error) {
      if (outcome.error === undefined) {
        outcome.error = error instanceof Error ? error : new Error(String(error));
      }
    }

    if (outcome.error === undefined) {
      throw new AssemblyError("Well-formedness check did not complete");
    }
    if (outcome.error !== null) {
      throw new AssemblyError(
        `Assembled document is not well-formed: ${outcome.error.message}`,
      );
    }
  }
}
