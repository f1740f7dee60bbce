import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { MalformedContainerError, MissingContainerError } from "./errors";
import { type DocumentTree, parseXmlTree } from "./tree";

export const CONTAINER_PATH = "META-INF/container.xml";

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Joins an archive-relative path (forward slashes) onto a directory on disk.
 * Returns null when the result would leave `root`.
 */
export function resolveInside(root: string, relativePath: string): string | null {
  const resolved = path.resolve(root, ...relativePath.split("/"));
  const fromRoot = path.relative(path.resolve(root), resolved);
  if (fromRoot === "" || fromRoot.startsWith("..") || path.isAbsolute(fromRoot)) {
    return null;
  }
  return resolved;
}

/**
 * Reads META-INF/container.xml under the staging root and returns the
 * absolute path of the package descriptor it declares.
 */
export async function resolvePackagePath(
  stagingRoot: string,
  onWarning?: (message: string) => void,
): Promise<string> {
  const containerFile = path.join(stagingRoot, ...CONTAINER_PATH.split("/"));

  let source: string;
  try {
    source = await readFile(containerFile, "utf-8");
  } catch (error) {
    if (isNodeError(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      throw new MissingContainerError(containerFile, error);
    }
    throw new MalformedContainerError(containerFile, "file could not be read", error);
  }

  let tree: DocumentTree;
  try {
    tree = parseXmlTree(source, CONTAINER_PATH, onWarning);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedContainerError(containerFile, reason, error);
  }

  // The first rootfile with a usable full-path wins
  for (let index = 0; index < tree.size; index++) {
    const node = tree.node(index);
    if (node.kind !== "element" || node.name !== "rootfile") continue;

    const fullPath = node.attributes["full-path"]?.trim();
    if (!fullPath) continue;

    const packagePath = resolveInside(stagingRoot, fullPath);
    if (!packagePath) {
      throw new MalformedContainerError(
        containerFile,
        `rootfile full-path "${fullPath}" points outside the publication`,
      );
    }
    return packagePath;
  }

  throw new MalformedContainerError(containerFile, 'no rootfile element with a "full-path" attribute');
}
