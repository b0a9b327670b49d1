import type { TestReport } from '../types.js';

/**
 * Pretty JSON with object keys sorted at every depth, so equal reports
 * always render to identical text. `toJSON` has already run on a value by
 * the time the replacer sees it.
 */
export function renderJSON(report: TestReport): string {
  return JSON.stringify(report, sortKeys, 2);
}

function sortKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  )) {
    sorted[key] = entry;
  }
  return sorted;
}
