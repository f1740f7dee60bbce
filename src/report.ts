import type { ElementStep, LocateResult } from "./types";

// e.g. html[1]/body[1]/div[2]/p[3]
export function formatElementPath(path: readonly ElementStep[]): string {
  return path.map((step) => `${step.tagName}[${step.siblingOrdinal}]`).join("/");
}

export function formatIndexPath(path: readonly number[]): string {
  return path.join("/");
}

/**
 * Human-readable report, one field per line.
 */
export function formatReport(result: LocateResult): string {
  if (result.status === "not-found") {
    return "Query not found.";
  }

  const { address, publication } = result;
  return [
    `Matching file: ${address.matchedFile}`,
    `Spine index: ${publication.spineXmlPosition.ordinal}/${address.spineIndex}`,
    `File index: ${formatIndexPath(address.indexPath)}`,
    `Element path: ${formatElementPath(address.elementPath)}`,
    `Match start: ${address.matchStart}`,
    `Match end: ${address.matchEnd}`,
  ].join("\n");
}

export type LocateRecord = {
  found: boolean;
  packagePath: string;
  spineXmlPosition: { ordinal: number; total: number };
  spineDocuments: string[];
  match: {
    spineIndex: number;
    spineTotal: number;
    matchedFile: string;
    elementPath: string;
    indexPath: string;
    elementSteps: ElementStep[];
    indexSteps: number[];
    matchStart: number;
    matchEnd: number;
  } | null;
};

/**
 * Plain record for JSON output.
 */
export function toJson(result: LocateResult): LocateRecord {
  const { publication } = result;
  const record: LocateRecord = {
    found: result.status === "found",
    packagePath: publication.packagePath,
    spineXmlPosition: { ...publication.spineXmlPosition },
    spineDocuments: [...publication.spineDocuments],
    match: null,
  };

  if (result.status === "found") {
    const { address } = result;
    record.match = {
      spineIndex: address.spineIndex,
      spineTotal: address.spineTotal,
      matchedFile: address.matchedFile,
      elementPath: formatElementPath(address.elementPath),
      indexPath: formatIndexPath(address.indexPath),
      elementSteps: address.elementPath.map((step) => ({ ...step })),
      indexSteps: [...address.indexPath],
      matchStart: address.matchStart,
      matchEnd: address.matchEnd,
    };
  }
  return record;
}
