/** Shapes returned by `xcresulttool get test-results`. Every field is optional. */
export type ResultNode = {
  nodeType?: unknown;
  nodeIdentifier?: unknown;
  nodeIdentifierURL?: unknown;
  children?: unknown;
};

export type ActivityNode = {
  title?: unknown;
  childActivities?: unknown;
};

export type QueryMode = "tests" | "activities";

export type QueryParams = {
  testId?: string;
};

/** Narrow an arbitrary JSON value to a plain object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
