/** Latency report emitted by `latencyctl extract`. */
/** Metric name → value. A Map, so every name the marker allows is an ordinary key. */
export type MetricMapping = Map<string, number>;

export type ExtractionError = {
  test_id: string;
  error: string;
};

export type ExtractionReport = {
  readonly xcresult_path: string;
  readonly tests_scanned: number;
  readonly metric_count: number;
  /** Keys in code-unit order. */
  readonly metrics: ReadonlyMap<string, number>;
  readonly errors: readonly ExtractionError[];
};
