import type { Diagnostic } from '../report/reportTypes.js';

/**
 * Check if a diagnostic is suppressed by a suppress entry.
 * Supports RULE:table and RULE:table.column patterns; the table part is the
 * name shown in diagnostics, so tables outside `public` are written schema.table.
 */
export function isSuppressed(diagnostic: Diagnostic, suppress: readonly string[]): boolean {
  if (diagnostic.table === null) {
    return false;
  }
  for (const entry of suppress) {
    const colonIdx = entry.indexOf(':');
    const rule = entry.slice(0, colonIdx);
    const target = entry.slice(colonIdx + 1);

    if (rule !== diagnostic.rule) {
      continue;
    }
    // RULE:table suppresses every diagnostic of the rule for the table
    if (target === diagnostic.table) {
      return true;
    }
    if (diagnostic.column !== null && target === `${diagnostic.table}.${diagnostic.column}`) {
      return true;
    }
  }
  return false;
}

/** Split diagnostics into kept and suppressed. */
export function applySuppressions(
  diagnostics: readonly Diagnostic[],
  suppress: readonly string[],
): { kept: Diagnostic[]; suppressed: number } {
  if (suppress.length === 0) {
    return { kept: [...diagnostics], suppressed: 0 };
  }
  const kept = diagnostics.filter((d) => !isSuppressed(d, suppress));
  return { kept, suppressed: diagnostics.length - kept.length };
}
