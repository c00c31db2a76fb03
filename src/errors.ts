/**
 * Error types raised while building the patch package.
 *
 * Every failure is fatal for the run: the CLI logs the message once and exits
 * with a non-zero code. `context` carries the path / identifier for the log.
 */

export type PatchErrorKind =
  | "MalformedSourceDocument"
  | "NodeNotFound"
  | "AmbiguousNode"
  | "CatalogResolution"
  | "IOFailure"
  | "Package"
  | "Config";

export class PatchError extends Error {
  readonly kind: PatchErrorKind;
  readonly context: Record<string, unknown>;

  constructor(kind: PatchErrorKind, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PatchError";
    this.kind = kind;
    this.context = context;
  }
}

/** A required top-level element is missing, or the file cannot be tokenized. */
export class MalformedSourceDocumentError extends PatchError {
  constructor(readonly source: string, detail: string, options?: { cause?: unknown }) {
    super("MalformedSourceDocument", `Malformed model behavior file '${source}': ${detail}`, { source }, options);
    this.name = "MalformedSourceDocumentError";
  }
}

export class NodeNotFoundError extends PatchError {
  constructor(readonly nodeId: string, detail = `no Component with ID '${nodeId}'`) {
    super("NodeNotFound", detail, { nodeId });
    this.name = "NodeNotFoundError";
  }
}

export class AmbiguousNodeError extends PatchError {
  constructor(readonly nodeId: string, readonly matches: number) {
    super("AmbiguousNode", `${matches} Components share the ID '${nodeId}'`, { nodeId, matches });
    this.name = "AmbiguousNodeError";
  }
}

export interface RecordFailure {
  /** Position of the record in the catalog */
  index: number;
  error: NodeNotFoundError | AmbiguousNodeError;
}

/** Raised once per file when one or more catalog records did not resolve. */
export class CatalogResolutionError extends PatchError {
  constructor(readonly failures: RecordFailure[], source?: string) {
    const where = source ? ` in '${source}'` : "";
    const lines = failures.map(f => `record #${f.index}: ${f.error.message}`);
    super(
      "CatalogResolution",
      `${failures.length} modification record(s) failed${where}: ${lines.join("; ")}`,
      { source, failures: failures.length },
    );
    this.name = "CatalogResolutionError";
  }
}

export class IOFailureError extends PatchError {
  constructor(readonly path: string, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("IOFailure", `Cannot ${operation} '${path}': ${reason}`, { path, operation }, { cause });
    this.name = "IOFailureError";
  }
}

/** The vendor package is missing, has the wrong version, or cannot be located. */
export class PackageError extends PatchError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("Package", message, context);
    this.name = "PackageError";
  }
}

export class ConfigError extends PatchError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("Config", message, context);
    this.name = "ConfigError";
  }
}
