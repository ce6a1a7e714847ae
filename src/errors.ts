/**
 * Resource viewer errors.
 */

export type ResourceViewerErrorCode =
  | "INVALID_OBJECT"
  | "NO_QUERYER"
  | "CHILD_LOOKUP"
  | "CONFIGURATION"
  | "CANCELLED"
  | "MANIFEST_PARSE"
  | "SUPERSEDED";

export class ResourceViewerError extends Error {
  constructor(
    public readonly code: ResourceViewerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ResourceViewerError";
  }
}

/** Object lacks the identity metadata needed to form a key. */
export class InvalidObjectError extends ResourceViewerError {
  constructor(public readonly missing: string[]) {
    super("INVALID_OBJECT", `Object is missing identity fields: ${missing.join(", ")}`);
    this.name = "InvalidObjectError";
  }
}

export class NoQueryerConfiguredError extends ResourceViewerError {
  constructor() {
    super("NO_QUERYER", "no queryer set");
    this.name = "NoQueryerConfiguredError";
  }
}

export class ChildLookupError extends ResourceViewerError {
  constructor(
    public readonly objectId: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("CHILD_LOOKUP", `Failed to fetch children of ${objectId}: ${reason}`, { cause });
    this.name = "ChildLookupError";
  }
}

export class ConfigurationError extends ResourceViewerError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

export class ContextCancelledError extends ResourceViewerError {
  constructor(reason?: unknown) {
    const detail = reason instanceof Error ? `: ${reason.message}` : "";
    super("CANCELLED", `Traversal cancelled${detail}`, { cause: reason });
    this.name = "ContextCancelledError";
  }
}

export class ManifestParseError extends ResourceViewerError {
  constructor(message: string) {
    super("MANIFEST_PARSE", message);
    this.name = "ManifestParseError";
  }
}

/** A traversal finished after its key was invalidated, cleared, evicted or re-requested. */
export class SupersededResolutionError extends ResourceViewerError {
  constructor(public readonly objectKey: string) {
    super("SUPERSEDED", `Resolution of ${objectKey} was superseded; result discarded`);
    this.name = "SupersededResolutionError";
  }
}

/** Throw a ContextCancelledError when the signal has fired. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new ContextCancelledError(signal.reason);
}
