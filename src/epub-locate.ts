import * as os from "node:os";
import * as path from "node:path";
import { resolvePackagePath } from "./container";
import { EpubLocateError, InvalidQueryError } from "./errors";
import { locateText } from "./locator";
import { parsePackageDescriptor } from "./package";
import { resolveSpineDocuments } from "./spine";
import { withStagingArea } from "./staging";
import type { LocateOptions, LocateResult } from "./types";

type ResolvedOptions = Required<LocateOptions>;

export function resolveOptions(options: LocateOptions = {}): ResolvedOptions {
  return {
    tempDir: options.tempDir || os.tmpdir(),
    verbose: options.verbose ?? false,
  };
}

/** Archive entry name (forward slashes) of a file staged under `root`. */
function entryName(root: string, file: string): string {
  return path.relative(root, file).split(path.sep).join("/");
}

/**
 * Runs the locate pipeline over a publication that is already extracted
 * under `root`. Paths in the result are relative to `root`.
 */
export async function locateInPublication(
  root: string,
  query: string,
  options: LocateOptions = {},
): Promise<LocateResult> {
  const { verbose } = resolveOptions(options);
  const onWarning = verbose ? (message: string) => console.warn(message) : undefined;

  if (query.length === 0) {
    throw new InvalidQueryError("query must not be empty");
  }

  const packagePath = await resolvePackagePath(root, onWarning);
  if (verbose) console.log(`package descriptor "${entryName(root, packagePath)}"`);

  const { manifest, spine, spineXmlPosition } = await parsePackageDescriptor(packagePath, onWarning);
  const documents = resolveSpineDocuments(manifest, spine, path.dirname(packagePath));

  const address = await locateText(documents, query, {
    onDocument: (file, position, total) => {
      if (verbose) console.log(`scanning spine document ${position}/${total} "${entryName(root, file)}"`);
    },
  });

  const publication = {
    packagePath: entryName(root, packagePath),
    spineXmlPosition,
    spineDocuments: documents.map((file) => entryName(root, file)),
  };

  if (!address) {
    return { status: "not-found", publication };
  }
  return {
    status: "found",
    address: { ...address, matchedFile: entryName(root, address.matchedFile) },
    publication,
  };
}

/**
 * Finds the first occurrence of `query` in the EPUB at `archivePath`, in
 * reading order, and reports its structural address.
 *
 * @example
 * const result = await locateInEpub("book.epub", "Hello");
 * if (result.status === "found") console.log(result.address.elementPath);
 */
export async function locateInEpub(
  archivePath: string,
  query: string,
  options: LocateOptions = {},
): Promise<LocateResult> {
  const resolved = resolveOptions(options);
  if (resolved.verbose) console.log(`staging "${archivePath}"`);

  try {
    return await withStagingArea(archivePath, (root) => locateInPublication(root, query, resolved), {
      tempDir: resolved.tempDir,
    });
  } catch (error) {
    if (error instanceof EpubLocateError) throw error.withArchive(archivePath);
    throw error;
  }
}
