import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { isRecord, type QueryMode, type QueryParams } from "../types/archive.js";
import type { ArchiveReaderConfig } from "../types/config.js";
import type { ArchiveReader } from "./reader.js";
import { ArchiveQueryError, ArchiveResponseError } from "./errors.js";

const pExecFile = promisify(execFile);

export type ExecFileFn = (
  file: string,
  args: string[],
  options: { timeout: number; maxBuffer: number },
) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFileFn = (file, args, options) =>
  pExecFile(file, args, { ...options, encoding: "utf8", shell: false });

export const DEFAULT_READER_CONFIG: ArchiveReaderConfig = {
  command: ["xcrun", "xcresulttool", "get", "test-results"],
  timeout_ms: 120000,
  max_buffer_bytes: 100 * 1024 * 1024,
};

/** Build the argument list for one query (without the command prefix). */
export function buildQueryArgs(archivePath: string, mode: QueryMode, params?: QueryParams): string[] {
  const args = [mode, "--path", archivePath];
  if (mode === "activities") {
    if (!params?.testId) throw new Error("activities query requires a test id");
    args.push("--test-id", params.testId);
  }
  args.push("--compact");
  return args;
}

/** Pull a numeric exit code off an execFile rejection. */
function exitCodeOf(err: unknown): number | null {
  if (isRecord(err) && typeof err.code === "number") return err.code;
  return null;
}

/**
 * `xcrun xcresulttool get test-results` wrapper.
 * Runs without a shell; one attempt per query.
 */
export class XcresultTool implements ArchiveReader {
  private readonly config: ArchiveReaderConfig;
  private readonly exec: ExecFileFn;

  constructor(config: ArchiveReaderConfig = DEFAULT_READER_CONFIG, exec?: ExecFileFn) {
    if (config.command.length === 0) {
      throw new Error("archive_reader.command must not be empty");
    }
    this.config = config;
    this.exec = exec ?? defaultExec;
  }

  async query(archivePath: string, mode: QueryMode, params?: QueryParams): Promise<unknown> {
    const [file, ...prefix] = this.config.command;
    const args = [...prefix, ...buildQueryArgs(archivePath, mode, params)];

    let stdout: string;
    try {
      ({ stdout } = await this.exec(file, args, {
        timeout: this.config.timeout_ms,
        maxBuffer: this.config.max_buffer_bytes,
      }));
    } catch (e) {
      throw new ArchiveQueryError(mode, exitCodeOf(e), { cause: e });
    }

    try {
      const parsed: unknown = JSON.parse(stdout);
      return parsed;
    } catch (e) {
      throw new ArchiveResponseError(mode, `Invalid JSON from xcresulttool ${mode}: ${e instanceof Error ? e.message : String(e)}`, {
        cause: e,
      });
    }
  }
}
