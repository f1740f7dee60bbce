import { readFile } from "node:fs/promises";
import { DocumentUnreadableError, InvalidQueryError } from "./errors";
import { type DocumentTree, parseHtmlTree } from "./tree";
import type { ElementStep, StructuralAddress } from "./types";

type TreeMatch = {
  textNode: number;
  nodeText: string;
  matchStart: number;
  matchEnd: number;
  elementPath: ElementStep[];
  indexPath: number[];
};

/** Length in code points, so astral characters count once. */
export function codePointLength(text: string): number {
  let length = 0;
  for (const _ of text) length++;
  return length;
}

/**
 * Code-point offsets of the first occurrence of `query` in `text`.
 */
export function findInText(text: string, query: string): { start: number; end: number } | null {
  const at = text.indexOf(query);
  if (at === -1) return null;
  const start = codePointLength(text.slice(0, at));
  return { start, end: start + codePointLength(query) };
}

/**
 * Ancestor chain of a text node, root to parent. Steps named like the
 * document's outermost element are left out of the index path.
 */
export function traceAncestors(
  tree: DocumentTree,
  textNode: number,
): { elementPath: ElementStep[]; indexPath: number[] } {
  const root = tree.root();
  const rootName = root === null ? null : tree.element(root).name;
  const chain = [...tree.ancestors(textNode)].reverse();
  const elementPath = chain.map((index) => ({
    tagName: tree.element(index).name,
    siblingOrdinal: tree.siblingOrdinal(index),
  }));
  const indexPath = elementPath
    .filter((step) => step.tagName !== rootName)
    .map((step) => step.siblingOrdinal);
  return { elementPath, indexPath };
}

/**
 * First text node, in document order, whose text contains the query. Text
 * outside every element is not searched.
 */
export function locateInTree(tree: DocumentTree, query: string): TreeMatch | null {
  for (const textNode of tree.textNodes()) {
    const node = tree.node(textNode);
    if (node.kind !== "text" || node.parent === null) continue;

    const found = findInText(node.text, query);
    if (!found) continue;

    return {
      textNode,
      nodeText: node.text,
      matchStart: found.start,
      matchEnd: found.end,
      ...traceAncestors(tree, textNode),
    };
  }
  return null;
}

export type LocateTextOptions = {
  onDocument?: (file: string, position: number, total: number) => void;
};

/**
 * Scans the documents in reading order and returns the address of the first
 * match, or null when no document contains the query.
 */
export async function locateText(
  documents: readonly string[],
  query: string,
  options: LocateTextOptions = {},
): Promise<StructuralAddress | null> {
  if (query.length === 0) {
    throw new InvalidQueryError("query must not be empty");
  }

  for (let i = 0; i < documents.length; i++) {
    const file = documents[i];
    options.onDocument?.(file, i + 1, documents.length);

    let tree: DocumentTree;
    try {
      tree = parseHtmlTree(await readFile(file, "utf-8"));
    } catch (error) {
      throw new DocumentUnreadableError(file, error);
    }

    const match = locateInTree(tree, query);
    if (match) {
      return {
        spineIndex: i + 1,
        spineTotal: documents.length,
        matchedFile: file,
        elementPath: match.elementPath,
        indexPath: match.indexPath,
        matchStart: match.matchStart,
        matchEnd: match.matchEnd,
        nodeText: match.nodeText,
      };
    }
  }

  return null;
}
