import type { QueryMode } from "../types/archive.js";

/** The archive reader process exited non-zero, was killed, or could not start. */
export class ArchiveQueryError extends Error {
  readonly mode: QueryMode;
  /** Process exit code; null when there is none (signal, timeout, spawn failure). */
  readonly exitCode: number | null;

  constructor(mode: QueryMode, exitCode: number | null, options?: { cause?: unknown }) {
    super(`xcresulttool ${mode} failed with exit code ${exitCode ?? "unknown"}`, options);
    this.name = "ArchiveQueryError";
    this.mode = mode;
    this.exitCode = exitCode;
  }
}

/** The archive reader succeeded but did not print JSON. */
export class ArchiveResponseError extends Error {
  readonly mode: QueryMode;

  constructor(mode: QueryMode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveResponseError";
    this.mode = mode;
  }
}

/** The test tree response has no usable `testNodes` list. */
export class ArchiveStructureError extends Error {
  constructor(message = "Unable to parse test nodes from xcresult.") {
    super(message);
    this.name = "ArchiveStructureError";
  }
}
