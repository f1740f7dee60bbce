import { DOMParser } from "@xmldom/xmldom";
import * as cheerio from "cheerio";
import { type AnyNode, isTag, isText } from "domhandler";

type ElementNode = {
  kind: "element";
  name: string;
  attributes: Readonly<Record<string, string>>;
  parent: number | null;
  children: readonly number[];
};

type TextNode = {
  kind: "text";
  text: string;
  parent: number | null;
};

type TreeNode = ElementNode | TextNode;

/**
 * Immutable parsed document. Nodes live in one array, stored in document
 * pre-order, and refer to each other by index.
 */
class DocumentTree {
  constructor(
    private readonly nodes: readonly TreeNode[],
    private readonly topLevel: readonly number[],
  ) {}

  get size(): number {
    return this.nodes.length;
  }

  node(index: number): TreeNode {
    const node = this.nodes[index];
    if (!node) {
      throw new RangeError(`No node at index ${index}`);
    }
    return node;
  }

  element(index: number): ElementNode {
    const node = this.node(index);
    if (node.kind !== "element") {
      throw new TypeError(`Node ${index} is not an element`);
    }
    return node;
  }

  /**
   * The outermost element of the document, or null for a document without one.
   */
  root(): number | null {
    return this.topLevel.find((index) => this.node(index).kind === "element") ?? null;
  }

  /** Nodes sharing the parent of `index`, itself included. */
  siblings(index: number): readonly number[] {
    const parent = this.node(index).parent;
    return parent === null ? this.topLevel : this.element(parent).children;
  }

  /**
   * 1 + the number of preceding siblings with the same tag name.
   */
  siblingOrdinal(index: number): number {
    const { name } = this.element(index);
    let ordinal = 1;
    for (const sibling of this.siblings(index)) {
      if (sibling === index) return ordinal;
      const node = this.node(sibling);
      if (node.kind === "element" && node.name === name) ordinal++;
    }
    throw new Error(`Node ${index} is missing from its parent's children`);
  }

  childElements(index: number): number[] {
    return this.element(index).children.filter((child) => this.node(child).kind === "element");
  }

  attribute(index: number, name: string): string | undefined {
    return this.element(index).attributes[name];
  }

  *ancestors(index: number): Generator<number> {
    let current = this.node(index).parent;
    while (current !== null) {
      yield current;
      current = this.node(current).parent;
    }
  }

  *textNodes(): Generator<number> {
    for (let index = 0; index < this.nodes.length; index++) {
      if (this.node(index).kind === "text") yield index;
    }
  }
}

type SourceNode =
  | { kind: "element"; name: string; attributes: Record<string, string> }
  | { kind: "text"; text: string };

/**
 * Reads a foreign DOM into the arena. `describe` returns null for nodes that
 * carry no content (comments, doctypes, processing instructions).
 */
function buildTree<T>(
  topLevel: T[],
  children: (node: T) => T[],
  describe: (node: T) => SourceNode | null,
): DocumentTree {
  const nodes: TreeNode[] = [];
  const topLevelIndices: number[] = [];
  const childLists = new Map<number, number[]>();
  const pending: Array<{ node: T; parent: number | null }> = topLevel
    .map((node) => ({ node, parent: null }))
    .reverse();

  let next = pending.pop();
  while (next) {
    const { node, parent } = next;
    const described = describe(node);
    if (described) {
      const index = nodes.length;
      if (described.kind === "element") {
        const childList: number[] = [];
        childLists.set(index, childList);
        nodes.push({ ...described, parent, children: childList });
        const nested = children(node);
        for (let i = nested.length - 1; i >= 0; i--) {
          pending.push({ node: nested[i], parent: index });
        }
      } else {
        nodes.push({ ...described, parent });
      }
      const siblings = parent === null ? topLevelIndices : childLists.get(parent);
      siblings?.push(index);
    }
    next = pending.pop();
  }

  return new DocumentTree(nodes, topLevelIndices);
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isDomElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function listChildren(node: Node): Node[] {
  const result: Node[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (child) result.push(child);
  }
  return result;
}

function describeXmlNode(node: Node): SourceNode | null {
  if (isDomElement(node)) {
    const attributes: Record<string, string> = {};
    for (let i = 0; i < node.attributes.length; i++) {
      const attr = node.attributes.item(i);
      if (attr) attributes[attr.name] = attr.value;
    }
    // Compare by local name so that opf:package and package read alike
    return { kind: "element", name: node.localName || node.tagName, attributes };
  }
  if (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) {
    return { kind: "text", text: node.nodeValue ?? "" };
  }
  return null;
}

/**
 * Parses an XML document (container or package descriptor).
 * Errors and fatal errors reported by the parser are thrown; warnings are
 * passed to `onWarning`.
 */
function parseXmlTree(
  source: string,
  fileName: string,
  onWarning: (message: string) => void = () => {},
): DocumentTree {
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg) => onWarning(`XML parser warning in "${fileName}": ${msg}`),
      error: (msg) => {
        throw new Error(`XML parsing error in "${fileName}": ${msg}`);
      },
      fatalError: (msg) => {
        throw new Error(`Fatal XML parsing error in "${fileName}": ${msg}`);
      },
    },
  });

  const doc = parser.parseFromString(source.replace(/^\uFEFF/, ""), "text/xml");
  if (!doc) {
    throw new Error(`Failed to parse XML document "${fileName}"`);
  }

  return buildTree<Node>(listChildren(doc), listChildren, describeXmlNode);
}

function describeHtmlNode(node: AnyNode): SourceNode | null {
  if (isTag(node)) {
    return { kind: "element", name: node.name, attributes: { ...node.attribs } };
  }
  if (isText(node)) {
    return { kind: "text", text: node.data };
  }
  return null;
}

function htmlChildren(node: AnyNode): AnyNode[] {
  return isTag(node) ? node.children : [];
}

/**
 * Parses a content document as tolerant HTML. The tree follows the source
 * markup: no html, head or body elements are implied, and `<a/>` closes
 * itself as it does in XHTML.
 */
function parseHtmlTree(source: string): DocumentTree {
  const $ = cheerio.load(source, {
    xml: { xmlMode: false, decodeEntities: true, recognizeSelfClosing: true },
  });
  const document = $.root()[0];
  return buildTree<AnyNode>(document.children, htmlChildren, describeHtmlNode);
}

export { DocumentTree, parseHtmlTree, parseXmlTree };
export type { ElementNode, TextNode, TreeNode };
