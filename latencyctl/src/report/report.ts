import { isRecord } from "../types/archive.js";
import type { ExtractionError, ExtractionReport, MetricMapping } from "../types/report.js";

/** Copy a mapping with its keys in code-unit order ("10" < "9" < "b"). */
export function sortMetrics(metrics: ReadonlyMap<string, number>): MetricMapping {
  return new Map([...metrics].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** Assemble the frozen report for one extraction run. */
export function buildReport(input: {
  archivePath: string;
  testsScanned: number;
  metrics: ReadonlyMap<string, number>;
  errors: ExtractionError[];
}): ExtractionReport {
  const metrics: ReadonlyMap<string, number> = sortMetrics(input.metrics);
  return Object.freeze({
    xcresult_path: input.archivePath,
    tests_scanned: input.testsScanned,
    metric_count: metrics.size,
    metrics,
    errors: Object.freeze(input.errors.map((e) => Object.freeze({ ...e }))),
  });
}

function writeValue(value: unknown, indent: string, current: string): string {
  let entries: Array<[string, unknown]>;
  if (value instanceof Map) {
    // Map order is kept as is; `sortMetrics` has already ordered it.
    entries = [...value.entries()].map(([k, v]): [string, unknown] => [String(k), v]);
  } else if (isRecord(value)) {
    entries = Object.keys(value)
      .sort()
      .map((k): [string, unknown] => [k, value[k]]);
  } else if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const inner = current + indent;
    const items = value.map((v) => writeValue(v, indent, inner));
    if (!indent) return `[${items.join(",")}]`;
    return `[\n${items.map((i) => inner + i).join(",\n")}\n${current}]`;
  } else {
    return JSON.stringify(value) ?? "null";
  }

  const present = entries.filter(([, v]) => v !== undefined);
  if (present.length === 0) return "{}";
  const inner = current + indent;
  const parts = present.map(([k, v]) => `${JSON.stringify(k)}${indent ? ": " : ":"}${writeValue(v, indent, inner)}`);
  if (!indent) return `{${parts.join(",")}}`;
  return `{\n${parts.map((p) => inner + p).join(",\n")}\n${current}}`;
}

/**
 * JSON text with object keys written from a sorted key list, so integer-like
 * keys do not jump ahead the way they do in plain objects. Maps keep their own
 * order. Compact unless `pretty`, which indents by two spaces.
 */
export function stringifyCanonical(value: unknown, pretty = false): string {
  return writeValue(value, pretty ? "  " : "", "");
}

/** Serialize a report with every key sorted. */
export function serializeReport(report: ExtractionReport, pretty = false): string {
  return stringifyCanonical(report, pretty);
}
