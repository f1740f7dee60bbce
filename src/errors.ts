/**
 * Base class for every failure raised while locating text in a publication.
 */
export class EpubLocateError extends Error {
  /**
   * @param message - The error message.
   * @param code - Stable identifier for the failure kind.
   * @param cause - The underlying error, if any.
   */
  constructor(
    message: string,
    public readonly code: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "EpubLocateError";
  }

  /** Archive the failure belongs to, once known. */
  archivePath?: string;

  withArchive(archivePath: string): this {
    this.archivePath ??= archivePath;
    return this;
  }
}

/**
 * The archive could not be read or extracted.
 */
export class StagingFailureError extends EpubLocateError {
  constructor(
    public readonly archive: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Failed to stage archive "${archive}": ${reason}`, "STAGING_FAILURE", cause);
    this.name = "StagingFailureError";
    this.archivePath = archive;
  }
}

export class MissingContainerError extends EpubLocateError {
  constructor(public readonly file: string, cause?: unknown) {
    super(`Container descriptor not found at "${file}"`, "MISSING_CONTAINER", cause);
    this.name = "MissingContainerError";
  }
}

export class MalformedContainerError extends EpubLocateError {
  constructor(
    public readonly file: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Malformed container descriptor "${file}": ${reason}`, "MALFORMED_CONTAINER", cause);
    this.name = "MalformedContainerError";
  }
}

/**
 * The package descriptor is unreadable or lacks a required element or attribute.
 * `element` names the offending element when there is one.
 */
export class MalformedPackageError extends EpubLocateError {
  constructor(
    public readonly file: string,
    reason: string,
    public readonly element?: string,
    cause?: unknown,
  ) {
    super(`Malformed package descriptor "${file}": ${reason}`, "MALFORMED_PACKAGE", cause);
    this.name = "MalformedPackageError";
  }
}

export class UnresolvedSpineItemError extends EpubLocateError {
  constructor(public readonly id: string) {
    super(`Spine references id "${id}" which is not in the manifest`, "UNRESOLVED_SPINE_ITEM");
    this.name = "UnresolvedSpineItemError";
  }
}

export class DocumentUnreadableError extends EpubLocateError {
  constructor(public readonly file: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Failed to read spine document "${file}"${detail}`, "DOCUMENT_UNREADABLE", cause);
    this.name = "DocumentUnreadableError";
  }
}

export class InvalidQueryError extends EpubLocateError {
  constructor(reason: string) {
    super(`Invalid query: ${reason}`, "INVALID_QUERY");
    this.name = "InvalidQueryError";
  }
}
