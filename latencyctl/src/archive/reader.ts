import type { QueryMode, QueryParams } from "../types/archive.js";

/**
 * Read-only access to a test-result archive.
 *
 * Resolves with the parsed JSON document, rejects with `ArchiveQueryError` when the
 * reader fails and `ArchiveResponseError` when its output is not JSON.
 */
export interface ArchiveReader {
  query(archivePath: string, mode: QueryMode, params?: QueryParams): Promise<unknown>;
}
