import type { ProgressEvent } from "../core/extractor.js";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

/** One stderr line per diagnostic. */
export function formatDiagnostic(d: Diagnostic, format: OutputFormat): string {
  if (format === "jsonl") return JSON.stringify(d);
  return d.level === "info" ? d.message : `${d.level}: ${d.message}`;
}

export function progressDiagnostic(event: ProgressEvent): Diagnostic {
  switch (event.type) {
    case "tests_collected":
      return diag("info", "TESTS_COLLECTED", `collected ${event.count} test case(s)`, { details: { count: event.count } });
    case "test_scanned":
      return diag("info", "TEST_SCANNED", `scanned ${event.testId} (${event.metrics} metric(s))`, {
        details: { test_id: event.testId, metrics: event.metrics },
      });
    case "test_failed":
      return diag("warn", "TEST_FAILED", `${event.testId}: ${event.error}`, {
        details: { test_id: event.testId },
      });
  }
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}
