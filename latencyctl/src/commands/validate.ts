import fs from "node:fs";
import path from "node:path";
import { stringifyCanonical } from "../report/report.js";
import { createRegistry } from "../schema/registry.js";
import { isRecord } from "../types/archive.js";
import { diag, type Diagnostic } from "./diagnostics.js";

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

const REPORT_SCHEMA = "latency-report";

/** Cross-field checks the schema cannot express. */
function checkConsistency(report: Record<string, unknown>, text: string, reportPath: string): Diagnostic[] {
  const errors: Diagnostic[] = [];
  const metrics = report.metrics;
  if (!isRecord(metrics)) return errors;

  const count = Object.keys(metrics).length;
  if (report.metric_count !== count) {
    errors.push(
      diag("error", "REPORT_METRIC_COUNT_MISMATCH", `metric_count=${String(report.metric_count)} but metrics has ${count} key(s)`, {
        path: reportPath,
        details: { expected: count, actual: report.metric_count },
      }),
    );
  }

  // Parsed objects lose the written key order, so compare against the text itself.
  const body = text.trimEnd();
  if (body !== stringifyCanonical(report) && body !== stringifyCanonical(report, true)) {
    errors.push(diag("error", "REPORT_NOT_CANONICAL", "report keys are not sorted or the layout is not compact or 2-space indented", { path: reportPath }));
  }

  return errors;
}

/**
 * Validate a written latency report against its JSON Schema.
 */
export async function validateReport(opts: { reportPath: string; schemaDir?: string }): Promise<ValidateResult> {
  const reportPath = path.resolve(opts.reportPath);

  if (!fs.existsSync(reportPath)) {
    return { ok: false, errors: [diag("error", "REPORT_MISSING", `Report not found: ${reportPath}`, { path: reportPath })] };
  }

  const text = fs.readFileSync(reportPath, "utf8");
  let report: unknown;
  try {
    report = JSON.parse(text);
  } catch (e) {
    return {
      ok: false,
      errors: [
        diag("error", "REPORT_JSON_INVALID", `Invalid JSON report (${path.relative(process.cwd(), reportPath)}): ${e instanceof Error ? e.message : String(e)}`, {
          path: reportPath,
        }),
      ],
    };
  }

  const registry = await createRegistry(opts.schemaDir);
  const { valid, errors: schemaErrors } = await registry.validate(REPORT_SCHEMA, report);
  if (!valid) {
    return {
      ok: false,
      errors: [
        diag("error", "REPORT_INVALID", `Report invalid (${path.relative(process.cwd(), reportPath)}): ${schemaErrors ?? "unknown error"}`, {
          path: reportPath,
        }),
      ],
    };
  }

  const errors = isRecord(report) ? checkConsistency(report, text, reportPath) : [];
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true };
}
