export { CONTAINER_PATH, resolvePackagePath } from "./container";
export { locateInEpub, locateInPublication, resolveOptions } from "./epub-locate";
export {
  DocumentUnreadableError,
  EpubLocateError,
  InvalidQueryError,
  MalformedContainerError,
  MalformedPackageError,
  MissingContainerError,
  StagingFailureError,
  UnresolvedSpineItemError,
} from "./errors";
export { locateText } from "./locator";
export { getSpineXmlPosition, parsePackageDescriptor } from "./package";
export { formatElementPath, formatIndexPath, formatReport, toJson } from "./report";
export type { LocateRecord } from "./report";
export { resolveSpineDocuments } from "./spine";
export { withStagingArea } from "./staging";
export { DocumentTree, parseHtmlTree, parseXmlTree } from "./tree";
export type * from "./types";
