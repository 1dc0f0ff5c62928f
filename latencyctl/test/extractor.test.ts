import { describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ExtractionOrchestrator, type ProgressEvent } from "../src/core/extractor.js";
import { ArchiveQueryError, ArchiveResponseError, ArchiveStructureError } from "../src/archive/errors.js";
import { FakeArchiveReader, activitiesWith, testsWith } from "./fake_reader.js";

const FIXTURES = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../fixtures");
const ARCHIVE = "/tmp/Run.xcresult";

function fixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(FIXTURES, name), "utf8"));
}

describe("ExtractionOrchestrator", () => {
  it("extracts metrics from every run of every test case", async () => {
    const reader = new FakeArchiveReader(fixture("tests-response.json"), {
      "test://com.example.app/AppUITests/LaunchLatencyTests/testColdLaunchLatency": fixture("activities-response.json"),
    });

    const report = await new ExtractionOrchestrator(reader).extract(ARCHIVE);

    expect(report).toEqual({
      xcresult_path: ARCHIVE,
      tests_scanned: 3,
      metric_count: 3,
      metrics: new Map([
        ["reopen_to_tabbar", 1.102],
        ["startup_to_tabbar", 4.821],
        ["tab_switch", 0.35],
      ]),
      errors: [],
    });
  });

  it("queries the tree once, then each test id once in collection order", async () => {
    const reader = new FakeArchiveReader(testsWith("test://a", "test://b"));
    await new ExtractionOrchestrator(reader).extract(ARCHIVE);

    expect(reader.calls).toEqual([
      { archivePath: ARCHIVE, mode: "tests", testId: undefined },
      { archivePath: ARCHIVE, mode: "activities", testId: "test://b" },
      { archivePath: ARCHIVE, mode: "activities", testId: "test://a" },
    ]);
  });

  it("records a failed activities query and keeps going", async () => {
    // Collection order is c, b, a.
    const reader = new FakeArchiveReader(testsWith("test://a", "test://b", "test://c"), {
      "test://c": activitiesWith("Latency metric first=1.5s"),
      "test://b": new ArchiveQueryError("activities", 65),
      "test://a": activitiesWith("Latency metric third=3.5s"),
    });

    const report = await new ExtractionOrchestrator(reader).extract(ARCHIVE);

    expect(report.tests_scanned).toBe(3);
    expect(report.metrics).toEqual(
      new Map([
        ["first", 1.5],
        ["third", 3.5],
      ]),
    );
    expect(report.metric_count).toBe(2);
    expect(report.errors).toEqual([{ test_id: "test://b", error: "xcresulttool activities failed with exit code 65" }]);
    expect(reader.calls.map((c) => c.testId)).toEqual([undefined, "test://c", "test://b", "test://a"]);
  });

  it("lets the last test in collection order win a duplicate metric name", async () => {
    const reader = new FakeArchiveReader(testsWith("test://a", "test://b"), {
      "test://b": activitiesWith("Latency metric x=1.0s"),
      "test://a": activitiesWith("Latency metric x=2.0s"),
    });

    const report = await new ExtractionOrchestrator(reader).extract(ARCHIVE);
    expect(report.metrics).toEqual(new Map([["x", 2]]));
    expect(report.metric_count).toBe(1);
  });

  it("keeps sequential results when queries run concurrently and finish out of order", async () => {
    const reader = new FakeArchiveReader(
      testsWith("test://a", "test://b", "test://c"),
      {
        "test://c": activitiesWith("Latency metric x=1.0s", "Latency metric only_c=0.1s"),
        "test://b": new ArchiveQueryError("activities", 1),
        "test://a": activitiesWith("Latency metric x=3.0s"),
      },
      { "test://c": 30, "test://b": 15, "test://a": 0 },
    );

    const report = await new ExtractionOrchestrator(reader, { concurrency: 3 }).extract(ARCHIVE);

    expect(report.metrics).toEqual(
      new Map([
        ["only_c", 0.1],
        ["x", 3],
      ]),
    );
    expect(report.errors).toEqual([{ test_id: "test://b", error: "xcresulttool activities failed with exit code 1" }]);
  });

  it("skips responses without a testRuns list", async () => {
    const reader = new FakeArchiveReader(testsWith("test://a", "test://b", "test://c"), {
      "test://a": { testRuns: "none" },
      "test://b": { testRuns: [null, { activities: "none" }, {}] },
      "test://c": [],
    });

    const report = await new ExtractionOrchestrator(reader).extract(ARCHIVE);
    expect(report.tests_scanned).toBe(3);
    expect(report.metrics.size).toBe(0);
    expect(report.errors).toEqual([]);
  });

  it("emits metric keys sorted regardless of discovery order", async () => {
    const reader = new FakeArchiveReader(testsWith("test://a"), {
      "test://a": activitiesWith("Latency metric zeta=1.0s", "Latency metric alpha=2.0s", "Latency metric Mid=3.0s"),
    });

    const report = await new ExtractionOrchestrator(reader).extract(ARCHIVE);
    expect([...report.metrics.keys()]).toEqual(["Mid", "alpha", "zeta"]);
  });

  it("merges a metric named __proto__ like any other", async () => {
    const reader = new FakeArchiveReader(testsWith("test://a", "test://b"), {
      "test://b": activitiesWith("Latency metric __proto__=1.0s"),
      "test://a": activitiesWith("Latency metric __proto__=1.5s", "Latency metric b=1s"),
    });

    const report = await new ExtractionOrchestrator(reader).extract(ARCHIVE);
    expect(report.metrics.get("__proto__")).toBe(1.5);
    expect(report.metric_count).toBe(2);
  });

  it("returns an empty report for an empty test tree", async () => {
    const report = await new ExtractionOrchestrator(new FakeArchiveReader({ testNodes: [] })).extract(ARCHIVE);
    expect(report).toEqual({ xcresult_path: ARCHIVE, tests_scanned: 0, metric_count: 0, metrics: new Map(), errors: [] });
  });

  it("fails when testNodes is missing or not a list", async () => {
    await expect(new ExtractionOrchestrator(new FakeArchiveReader({})).extract(ARCHIVE)).rejects.toThrow(ArchiveStructureError);
    await expect(new ExtractionOrchestrator(new FakeArchiveReader({ testNodes: {} })).extract(ARCHIVE)).rejects.toThrow(
      "Unable to parse test nodes from xcresult.",
    );
    await expect(new ExtractionOrchestrator(new FakeArchiveReader([])).extract(ARCHIVE)).rejects.toThrow(ArchiveStructureError);
  });

  it("propagates a failed test tree query", async () => {
    const reader = new FakeArchiveReader(new ArchiveQueryError("tests", 70));
    await expect(new ExtractionOrchestrator(reader).extract(ARCHIVE)).rejects.toMatchObject({ mode: "tests", exitCode: 70 });
  });

  it("aborts on an unparseable activities response", async () => {
    const reader = new FakeArchiveReader(testsWith("test://a"), {
      "test://a": new ArchiveResponseError("activities", "Invalid JSON from xcresulttool activities"),
    });
    await expect(new ExtractionOrchestrator(reader).extract(ARCHIVE)).rejects.toThrow(ArchiveResponseError);
  });

  it("reports progress through onProgress", async () => {
    const events: ProgressEvent[] = [];
    const reader = new FakeArchiveReader(testsWith("test://a", "test://b"), {
      "test://b": new ArchiveQueryError("activities", 2),
      "test://a": activitiesWith("Latency metric x=1.0s", "Latency metric y=2.0s"),
    });

    await new ExtractionOrchestrator(reader, { onProgress: (e) => events.push(e) }).extract(ARCHIVE);

    expect(events).toEqual([
      { type: "tests_collected", count: 2 },
      { type: "test_failed", testId: "test://b", error: "xcresulttool activities failed with exit code 2" },
      { type: "test_scanned", testId: "test://a", metrics: 2 },
    ]);
  });

  it("returns a frozen report", async () => {
    const report = await new ExtractionOrchestrator(new FakeArchiveReader(testsWith())).extract(ARCHIVE);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.errors)).toBe(true);
  });
});
