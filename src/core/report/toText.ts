import type { Diagnostic, Report, Severity } from './reportTypes.js';
import { SEVERITIES } from './reportTypes.js';

const SEVERITY_HEADINGS: Readonly<Record<Severity, string>> = {
  error: 'Errors',
  warning: 'Warnings',
  info: 'Info',
};

function field(label: string, value: string | number): string {
  return `${`${label}:`.padEnd(12)}${String(value)}`;
}

function formatDiagnostic(d: Diagnostic): string[] {
  const lines = [`    [${d.rule}] ${d.file}:${String(d.line)} ${d.message}`];
  if (d.fix !== null) {
    lines.push(`      fix: ${d.fix}`);
  }
  return lines;
}

/**
 * Format a Report as human-readable text: a summary header, then diagnostics
 * grouped by severity and, within each severity, by file.
 */
export function toText(report: Report): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push('=== PostgreSQL Schema Lint ===');
  lines.push('');

  if (report.metadata.timestamp !== null) {
    lines.push(field('Timestamp', report.metadata.timestamp));
  }
  lines.push(field('Files', summary.files));
  lines.push(field('Tables', summary.tables));
  lines.push(field('Statements', summary.statements));
  for (const severity of SEVERITIES) {
    lines.push(field(SEVERITY_HEADINGS[severity], summary.bySeverity[severity]));
  }
  if (summary.suppressed > 0) {
    lines.push(field('Suppressed', summary.suppressed));
  }
  lines.push(field('Result', report.passed ? 'PASSED' : 'FAILED'));
  lines.push('');

  if (report.diagnostics.length === 0) {
    lines.push('No diagnostics.');
    lines.push('');
    return lines.join('\n');
  }

  for (const severity of SEVERITIES) {
    const group = report.bySeverity[severity];
    if (group.length === 0) continue;

    lines.push(`--- ${SEVERITY_HEADINGS[severity]} (${String(group.length)}) ---`);
    const files = [...new Set(group.map((d) => d.file))];
    for (const file of files) {
      lines.push(`  ${file}`);
      for (const d of group.filter((g) => g.file === file)) {
        lines.push(...formatDiagnostic(d));
      }
    }
    lines.push('');
  }

  return lines.join('\n');
}
