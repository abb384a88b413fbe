import type {
  AggregatedDiagnostics,
  Diagnostic,
  FileReport,
  FileStats,
  Report,
  Severity,
} from './reportTypes.js';
import { countBySeverity } from './aggregate.js';
import type { Schema } from '../ddl/types.js';

/** Inputs to report assembly besides the diagnostics themselves. */
export interface ReportContext {
  readonly files: readonly FileStats[];
  readonly suppressed?: number | undefined;
  readonly timestamp?: string | null | undefined;
}

/** Per-file statement and table counts, in input order. */
export function collectFileStats(schema: Schema): FileStats[] {
  return schema.files.map((file) => ({
    file,
    statements: schema.statements.filter((s) => s.location.file === file).length,
    tables: schema.tables.filter((t) => !t.placeholder && t.location.file === file).length,
  }));
}

function fileReports(files: readonly FileStats[], diagnostics: readonly Diagnostic[]): FileReport[] {
  const stats = [...files];
  for (const d of diagnostics) {
    if (!stats.some((s) => s.file === d.file)) {
      stats.push({ file: d.file, statements: 0, tables: 0 });
    }
  }
  return stats.map((s) => {
    const own = diagnostics.filter((d) => d.file === s.file);
    return { ...s, counts: countBySeverity(own), diagnostics: own };
  });
}

/**
 * Assemble the final report. `passed` is false iff at least one diagnostic
 * has error severity; warnings and info never fail a run.
 */
export function buildReport(aggregated: AggregatedDiagnostics, context: ReportContext): Report {
  const { diagnostics, bySeverity, byCategory } = aggregated;
  const withSeverity = (severity: Severity): Diagnostic[] => diagnostics.filter((d) => d.severity === severity);
  const grouped: Record<Severity, readonly Diagnostic[]> = {
    error: withSeverity('error'),
    warning: withSeverity('warning'),
    info: withSeverity('info'),
  };

  const files = fileReports(context.files, diagnostics);

  return {
    passed: bySeverity.error === 0,
    summary: {
      files: files.length,
      tables: files.reduce((sum, f) => sum + f.tables, 0),
      statements: files.reduce((sum, f) => sum + f.statements, 0),
      total: aggregated.total,
      suppressed: context.suppressed ?? 0,
      bySeverity,
      byCategory,
    },
    diagnostics,
    bySeverity: grouped,
    files,
    metadata: { timestamp: context.timestamp ?? null },
  };
}
