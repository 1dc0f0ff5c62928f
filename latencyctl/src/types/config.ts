/** Configuration types — layered config system. */
export type ArchiveReaderConfig = {
  /** Command prefix; mode and flags are appended. */
  command: string[];
  timeout_ms: number;
  max_buffer_bytes: number;
};

export type ExtractionConfig = {
  concurrency: number;
};

export type LatencyConfig = {
  schema_version: string;
  archive_reader: ArchiveReaderConfig;
  extraction: ExtractionConfig;
};
