import { collectTestIds } from "../collector/test-node-collector.js";
import { scanActivities } from "../scanner/metric-scanner.js";
import { buildReport } from "../report/report.js";
import { ArchiveQueryError, ArchiveStructureError } from "../archive/errors.js";
import type { ArchiveReader } from "../archive/reader.js";
import { isRecord } from "../types/archive.js";
import type { ExtractionError, ExtractionReport, MetricMapping } from "../types/report.js";
import { mapInOrder } from "./concurrency.js";

export type ProgressEvent =
  | { type: "tests_collected"; count: number }
  | { type: "test_scanned"; testId: string; metrics: number }
  | { type: "test_failed"; testId: string; error: string };

export type ExtractorOptions = {
  /** Activity queries in flight at once. Defaults to 1 (strictly sequential). */
  concurrency?: number;
  onProgress?: (event: ProgressEvent) => void;
};

type TestOutcome =
  | { ok: true; testId: string; metrics: MetricMapping }
  | { ok: false; testId: string; error: string };

/**
 * Extraction orchestrator — test tree → test ids → activity trees → one report.
 *
 * Only the top-level tree query is fatal. A failed activities query becomes an
 * entry in `errors` and the run continues. Nothing is retried.
 *
 * Each test scans into its own mapping; mappings are merged in test id order,
 * so duplicate metric names resolve to the value from the last test in that
 * order whatever the concurrency.
 */
export class ExtractionOrchestrator {
  private readonly reader: ArchiveReader;
  private readonly concurrency: number;
  private readonly onProgress?: (event: ProgressEvent) => void;

  constructor(reader: ArchiveReader, opts: ExtractorOptions = {}) {
    this.reader = reader;
    this.concurrency = opts.concurrency ?? 1;
    this.onProgress = opts.onProgress;
  }

  async extract(archivePath: string): Promise<ExtractionReport> {
    const testsPayload = await this.reader.query(archivePath, "tests");
    const testNodes = isRecord(testsPayload) ? testsPayload.testNodes : undefined;
    if (!Array.isArray(testNodes)) {
      throw new ArchiveStructureError();
    }

    const testIds = collectTestIds(testNodes);
    this.emit({ type: "tests_collected", count: testIds.length });

    const outcomes = await mapInOrder(testIds, this.concurrency, (testId) => this.scanTest(archivePath, testId));

    const metrics: MetricMapping = new Map();
    const errors: ExtractionError[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        for (const [name, value] of outcome.metrics) metrics.set(name, value);
      } else {
        errors.push({ test_id: outcome.testId, error: outcome.error });
      }
    }

    return buildReport({ archivePath, testsScanned: testIds.length, metrics, errors });
  }

  private async scanTest(archivePath: string, testId: string): Promise<TestOutcome> {
    let payload: unknown;
    try {
      payload = await this.reader.query(archivePath, "activities", { testId });
    } catch (e) {
      if (!(e instanceof ArchiveQueryError)) throw e;
      this.emit({ type: "test_failed", testId, error: e.message });
      return { ok: false, testId, error: e.message };
    }

    const metrics: MetricMapping = new Map();
    const testRuns = isRecord(payload) ? payload.testRuns : undefined;
    if (Array.isArray(testRuns)) {
      for (const run of testRuns) {
        if (isRecord(run) && Array.isArray(run.activities)) {
          scanActivities(run.activities, metrics);
        }
      }
    }

    this.emit({ type: "test_scanned", testId, metrics: metrics.size });
    return { ok: true, testId, metrics };
  }

  private emit(event: ProgressEvent): void {
    this.onProgress?.(event);
  }
}
