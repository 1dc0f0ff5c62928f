import { isRecord, type ActivityNode } from "../types/archive.js";
import type { MetricMapping } from "../types/report.js";

/** Marker logged by UI tests, e.g. "Latency metric startup_to_tabbar=4.821s". */
export const METRIC_PATTERN = /Latency metric ([A-Za-z0-9_]+)=([0-9]+(?:\.[0-9]+)?)s/;

export type MetricMarker = {
  name: string;
  value: number;
};

/** Parse the first metric marker in a title, or null. */
export function parseMetricMarker(title: string): MetricMarker | null {
  const m = METRIC_PATTERN.exec(title);
  if (!m) return null;
  return { name: m[1], value: parseFloat(m[2]) };
}

/**
 * Scan an activity forest and write every metric marker into `sink`.
 *
 * A name seen more than once keeps the last value scanned.
 */
export function scanActivities(activities: unknown, sink: MetricMapping): void {
  if (!Array.isArray(activities)) return;

  const stack: ActivityNode[] = activities.filter(isRecord);

  while (stack.length > 0) {
    const activity = stack.pop();
    if (!activity) break;

    if (typeof activity.title === "string") {
      const marker = parseMetricMarker(activity.title);
      if (marker) sink.set(marker.name, marker.value);
    }

    if (Array.isArray(activity.childActivities)) {
      for (const child of activity.childActivities) {
        if (isRecord(child)) stack.push(child);
      }
    }
  }
}
