import type {
  AggregatedDiagnostics,
  CategoryCounts,
  Diagnostic,
  RuleCategory,
  Severity,
  SeverityCounts,
} from './reportTypes.js';
import { SEVERITIES } from './reportTypes.js';
import { compareStrings } from '../../util/index.js';

export function emptySeverityCounts(): Record<Severity, number> {
  return { error: 0, warning: 0, info: 0 };
}

export function emptyCategoryCounts(): Record<RuleCategory, number> {
  return { syntax: 0, naming: 0, constraints: 0, indexes: 0, rls: 0 };
}

export function countBySeverity(diagnostics: readonly Diagnostic[]): SeverityCounts {
  const counts = emptySeverityCounts();
  for (const d of diagnostics) counts[d.severity]++;
  return counts;
}

export function countByCategory(diagnostics: readonly Diagnostic[]): CategoryCounts {
  const counts = emptyCategoryCounts();
  for (const d of diagnostics) counts[d.category]++;
  return counts;
}

/**
 * Total order on diagnostics: file, line, rule id, then message, table and
 * column so that equal-location findings never depend on input order.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareStrings(a.file, b.file) ||
    a.line - b.line ||
    compareStrings(a.rule, b.rule) ||
    compareStrings(a.message, b.message) ||
    compareStrings(a.table ?? '', b.table ?? '') ||
    compareStrings(a.column ?? '', b.column ?? '')
  );
}

function identity(d: Diagnostic): string {
  return JSON.stringify([d.file, d.line, d.rule, d.message]);
}

/**
 * Merge diagnostic lists from every validator into one ordered sequence.
 * Exact duplicates (same file, line, rule and message) are kept once.
 */
export function aggregateDiagnostics(lists: readonly (readonly Diagnostic[])[]): AggregatedDiagnostics {
  const sorted = lists.flat().sort(compareDiagnostics);
  const seen = new Set<string>();
  const merged: Diagnostic[] = [];
  for (const diagnostic of sorted) {
    const key = identity(diagnostic);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(diagnostic);
  }

  const bySeverity = countBySeverity(merged);
  return {
    diagnostics: merged,
    total: SEVERITIES.reduce((sum, severity) => sum + bySeverity[severity], 0),
    bySeverity,
    byCategory: countByCategory(merged),
  };
}
