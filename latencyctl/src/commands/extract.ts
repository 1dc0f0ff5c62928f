import fs from "node:fs";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { ExtractionOrchestrator, type ProgressEvent } from "../core/extractor.js";
import { ArchiveQueryError, ArchiveResponseError, ArchiveStructureError } from "../archive/errors.js";
import type { ArchiveReader } from "../archive/reader.js";
import { XcresultTool } from "../archive/xcresulttool.js";
import { serializeReport } from "../report/report.js";
import { writeReport, type WrittenReport } from "../report/writer.js";
import type { ExtractionReport } from "../types/report.js";
import type { LatencyConfig } from "../types/config.js";
import { expandHome } from "../util/paths.js";
import { diag, type Diagnostic } from "./diagnostics.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ExtractCommandOptions = {
  xcresult: string;
  out?: string;
  pretty?: boolean;
  configDir?: string;
  env?: string;
  concurrency?: number;
  /** Defaults to `xcresulttool` configured from `archive_reader`. */
  reader?: ArchiveReader;
  onProgress?: (event: ProgressEvent) => void;
};

export type ExtractCommandResult =
  | { ok: true; report: ExtractionReport; json: string; written?: WrittenReport }
  | { ok: false; error: Diagnostic; exitCode: ExitCode };

type ConfigResult = { ok: true; config: LatencyConfig } | { ok: false; error: Diagnostic };

async function resolveConfig(configDir?: string, env?: string): Promise<ConfigResult> {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(env, configDir);
  } catch (e) {
    return { ok: false, error: diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${e instanceof Error ? e.message : String(e)}`) };
  }

  const res = await validateConfig(raw);
  if (!res.valid) {
    return { ok: false, error: diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors}`) };
  }
  return { ok: true, config: res.config };
}

/**
 * Extract latency metrics from one archive and serialize the report.
 *
 * Writes nothing to stdout or stderr; the caller prints `json` and diagnostics.
 */
export async function extract(opts: ExtractCommandOptions): Promise<ExtractCommandResult> {
  const xcresultPath = expandHome(opts.xcresult);

  if (!fs.existsSync(xcresultPath)) {
    return {
      ok: false,
      error: diag("error", "XCRESULT_MISSING", `xcresult path does not exist: ${xcresultPath}`, { path: xcresultPath }),
      exitCode: EXIT.EXTRACTION_FAILED,
    };
  }

  const cfg = await resolveConfig(opts.configDir, opts.env);
  if (!cfg.ok) return { ok: false, error: cfg.error, exitCode: EXIT.INVALID_ARGS };

  const concurrency = opts.concurrency ?? cfg.config.extraction.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    return {
      ok: false,
      error: diag("error", "CONCURRENCY_INVALID", `Concurrency must be a positive integer, got ${concurrency}`),
      exitCode: EXIT.INVALID_ARGS,
    };
  }

  const orchestrator = new ExtractionOrchestrator(opts.reader ?? new XcresultTool(cfg.config.archive_reader), {
    concurrency,
    onProgress: opts.onProgress,
  });

  let report: ExtractionReport;
  try {
    report = await orchestrator.extract(xcresultPath);
  } catch (e) {
    if (e instanceof ArchiveQueryError) {
      return {
        ok: false,
        error: diag(
          "error",
          "XCRESULTTOOL_FAILED",
          `failed running xcresulttool (exit ${e.exitCode ?? "unknown"}) for ${xcresultPath}`,
          { path: xcresultPath, details: { mode: e.mode, exit_code: e.exitCode } },
        ),
        exitCode: EXIT.EXTRACTION_FAILED,
      };
    }
    if (e instanceof ArchiveResponseError || e instanceof ArchiveStructureError) {
      return {
        ok: false,
        error: diag("error", "RESPONSE_INVALID", e.message, { path: xcresultPath }),
        exitCode: EXIT.EXTRACTION_FAILED,
      };
    }
    throw e;
  }

  const json = serializeReport(report, opts.pretty ?? false);
  const written = opts.out ? writeReport(expandHome(opts.out), json) : undefined;

  return { ok: true, report, json, written };
}
