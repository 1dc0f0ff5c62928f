#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { extract } from "./commands/extract.js";
import { validateReport } from "./commands/validate.js";
import { formatDiagnostic, isOutputFormat, progressDiagnostic, diag, type OutputFormat } from "./commands/diagnostics.js";
import { EXIT } from "./commands/exit-codes.js";

const program = new Command();

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) throw new InvalidArgumentError("Expected human or jsonl.");
  return value;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

program
  .name("latencyctl")
  .description("Extract UI test latency metrics from .xcresult bundles")
  .version("0.1.0");

program
  .command("extract", { isDefault: true })
  .description("Extract 'Latency metric ...' values from an .xcresult bundle")
  .requiredOption("--xcresult <path>", "Path to an .xcresult bundle produced by xcodebuild test")
  .option("--out <path>", "Also write the JSON report to this file")
  .option("--pretty", "Pretty-print JSON output")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
  .option("--concurrency <n>", "Activity queries in flight at once", parsePositiveInt)
  .option("--verbose", "Report per-test progress on stderr")
  .option("--format <format>", "Diagnostic format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: {
      xcresult: string;
      out?: string;
      pretty?: boolean;
      config?: string;
      env?: string;
      concurrency?: number;
      verbose?: boolean;
      format: OutputFormat;
    }) => {
      const res = await extract({
        xcresult: opts.xcresult,
        out: opts.out,
        pretty: opts.pretty,
        configDir: opts.config,
        env: opts.env,
        concurrency: opts.concurrency,
        onProgress: opts.verbose
          ? (event) => process.stderr.write(formatDiagnostic(progressDiagnostic(event), opts.format) + "\n")
          : undefined,
      });

      if (!res.ok) {
        process.stderr.write(formatDiagnostic(res.error, opts.format) + "\n");
        process.exit(res.exitCode);
      }

      if (opts.verbose && res.written) {
        const { path, bytes, sha256 } = res.written;
        process.stderr.write(
          formatDiagnostic(diag("info", "REPORT_WRITTEN", `wrote ${path} (${bytes} bytes, sha256 ${sha256})`, { path, details: { bytes, sha256 } }), opts.format) +
            "\n",
        );
      }

      process.stdout.write(res.json + "\n");
    }
  );

program
  .command("validate")
  .description("Validate a latency report written by extract")
  .argument("<report>", "Path to the report JSON")
  .option("--schemas <path>", "Path to schema directory")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (report: string, opts: { schemas?: string; format: OutputFormat }) => {
    const res = await validateReport({ reportPath: report, schemaDir: opts.schemas });

    if (!res.ok) {
      for (const err of res.errors) process.stderr.write(formatDiagnostic(err, opts.format) + "\n");
      process.exit(EXIT.REPORT_INVALID);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`error: ${message}\n`);
  process.exit(EXIT.EXTRACTION_FAILED);
});
