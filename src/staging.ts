import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import JSZip from "jszip";
import { resolveInside } from "./container";
import { StagingFailureError } from "./errors";

export type StagingOptions = {
  tempDir?: string;
};

/**
 * Extracts every entry of the archive under `root`. Entry names that would
 * land outside `root` make the archive unusable.
 */
export async function extractArchive(archivePath: string, root: string): Promise<number> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(await readFile(archivePath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StagingFailureError(archivePath, reason, error);
  }

  let extracted = 0;
  for (const entry of Object.values(zip.files)) {
    const target = resolveInside(root, entry.name.replace(/\/+$/, ""));
    if (!target) {
      throw new StagingFailureError(archivePath, `entry "${entry.name}" points outside the archive`);
    }

    try {
      if (entry.dir) {
        await mkdir(target, { recursive: true });
        continue;
      }
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, await entry.async("nodebuffer"));
      extracted++;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StagingFailureError(archivePath, `entry "${entry.name}": ${reason}`, error);
    }
  }
  return extracted;
}

/**
 * Extracts the archive into a fresh temporary directory, runs `fn` on it and
 * removes the directory afterwards, whether `fn` returns or throws.
 */
export async function withStagingArea<T>(
  archivePath: string,
  fn: (root: string) => Promise<T>,
  options: StagingOptions = {},
): Promise<T> {
  const parent = options.tempDir ?? os.tmpdir();
  let root: string;
  try {
    root = await mkdtemp(path.join(parent, "epub-locate-"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StagingFailureError(archivePath, `could not create staging directory: ${reason}`, error);
  }

  try {
    await extractArchive(archivePath, root);
    return await fn(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}
