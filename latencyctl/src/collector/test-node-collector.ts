import { isRecord, type ResultNode } from "../types/archive.js";

export const TEST_CASE_NODE_TYPE = "Test Case";

/**
 * Walk a forest of result nodes and return the identifiers of every test case,
 * de-duplicated in first-seen order.
 *
 * Traversal is stack-based (LIFO). Nodes without a usable `children` array are
 * leaves; a test case with neither identifier is skipped. Never throws.
 */
export function collectTestIds(roots: unknown): string[] {
  if (!Array.isArray(roots)) return [];

  const stack: ResultNode[] = roots.filter(isRecord);
  const seen = new Set<string>();
  const testIds: string[] = [];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.nodeType === TEST_CASE_NODE_TYPE) {
      const testId = resolveTestId(node);
      if (testId && !seen.has(testId)) {
        seen.add(testId);
        testIds.push(testId);
      }
    }

    if (Array.isArray(node.children)) {
      for (const child of node.children) {
        if (isRecord(child)) stack.push(child);
      }
    }
  }

  return testIds;
}

/** URL form wins over the plain identifier when both are present. */
export function resolveTestId(node: ResultNode): string | null {
  if (typeof node.nodeIdentifierURL === "string" && node.nodeIdentifierURL.length > 0) {
    return node.nodeIdentifierURL;
  }
  if (typeof node.nodeIdentifier === "string" && node.nodeIdentifier.length > 0) {
    return node.nodeIdentifier;
  }
  return null;
}
