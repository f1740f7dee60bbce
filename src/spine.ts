import * as path from "node:path";
import { UnresolvedSpineItemError } from "./errors";
import type { Manifest, Spine } from "./types";

/**
 * Turns a manifest href into path segments: the fragment is dropped and
 * percent-escapes are decoded. Malformed escapes are kept as written.
 */
function hrefSegments(href: string): string[] {
  const withoutFragment = href.split("#")[0];
  return withoutFragment.split("/").map((segment) => {
    try {
      return decodeURIComponent(segment);
    } catch {
      return segment;
    }
  });
}

export function resolveSpineItem(manifest: Manifest, id: string, descriptorDir: string): string {
  const href = manifest.get(id);
  if (href === undefined) {
    throw new UnresolvedSpineItemError(id);
  }
  return path.join(descriptorDir, ...hrefSegments(href));
}

/**
 * Maps spine ids, in reading order, to document paths under the package
 * descriptor's directory. An id missing from the manifest is an error.
 */
export function resolveSpineDocuments(manifest: Manifest, spine: Spine, descriptorDir: string): string[] {
  return spine.map((id) => resolveSpineItem(manifest, id, descriptorDir));
}
