import type { FormatOptions, Report } from './reportTypes.js';
import { compareStrings } from '../../util/index.js';

/**
 * Serialize a Report to a deterministic JSON string.
 * Keys are sorted for stable diffing.
 */
export function toJson(report: Report, pretty: boolean, options?: FormatOptions): string {
  const data = options?.diagnosticsOnly === true
    ? { diagnostics: report.diagnostics, metadata: report.metadata, passed: report.passed }
    : report;
  const sorted = sortKeysDeep(data);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

/** Recursively sort object keys for deterministic output. */
function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => compareStrings(a, b));
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of entries) {
      sorted[key] = sortKeysDeep(child);
    }
    return sorted;
  }
  return value;
}
