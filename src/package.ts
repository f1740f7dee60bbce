import { readFile } from "node:fs/promises";
import { MalformedPackageError } from "./errors";
import { type DocumentTree, parseXmlTree } from "./tree";
import type { PackageDescriptor, SpineXmlPosition } from "./types";

/**
 * Position of the spine element among the package element's direct element
 * children. The ordinal is -1 when there is no spine.
 */
export function getSpineXmlPosition(tree: DocumentTree, packageElement: number): SpineXmlPosition {
  const children = tree.childElements(packageElement);
  const spineAt = children.findIndex((child) => tree.element(child).name === "spine");
  return {
    ordinal: spineAt === -1 ? -1 : spineAt + 1,
    total: children.length,
  };
}

function childrenNamed(tree: DocumentTree, parents: number[], name: string): number[] {
  return parents.flatMap((parent) =>
    tree.childElements(parent).filter((child) => tree.element(child).name === name),
  );
}

/**
 * Builds the manifest, spine and spine position from an already parsed
 * package descriptor. `file` is only used in error messages.
 */
export function readPackageTree(tree: DocumentTree, file: string): PackageDescriptor {
  const root = tree.root();
  if (root === null || tree.element(root).name !== "package") {
    throw new MalformedPackageError(file, "root element is not <package>", "package");
  }

  const sections = tree.childElements(root);
  const manifestSections = sections.filter((index) => tree.element(index).name === "manifest");
  const spineSections = sections.filter((index) => tree.element(index).name === "spine");

  // Repeated ids: the last item wins
  const manifest = new Map<string, string>();
  for (const item of childrenNamed(tree, manifestSections, "item")) {
    const id = tree.attribute(item, "id");
    const href = tree.attribute(item, "href");
    if (!id || !href) {
      const missing = !id ? "id" : "href";
      throw new MalformedPackageError(
        file,
        `<item${id ? ` id="${id}"` : ""}> has no ${missing} attribute`,
        "item",
      );
    }
    manifest.set(id, href);
  }

  const spine: string[] = [];
  for (const itemref of childrenNamed(tree, spineSections, "itemref")) {
    const idref = tree.attribute(itemref, "idref");
    if (!idref) {
      throw new MalformedPackageError(
        file,
        `<itemref> number ${spine.length + 1} has no idref attribute`,
        "itemref",
      );
    }
    spine.push(idref);
  }

  return { manifest, spine, spineXmlPosition: getSpineXmlPosition(tree, root) };
}

/**
 * Reads and parses the package descriptor (the .opf file).
 */
export async function parsePackageDescriptor(
  file: string,
  onWarning?: (message: string) => void,
): Promise<PackageDescriptor> {
  let tree: DocumentTree;
  try {
    const source = await readFile(file, "utf-8");
    tree = parseXmlTree(source, file, onWarning);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedPackageError(file, reason, undefined, error);
  }
  return readPackageTree(tree, file);
}
