export type {
  AggregatedDiagnostics,
  CategoryCounts,
  Diagnostic,
  FileReport,
  FileStats,
  FormatOptions,
  OutputFormat,
  Report,
  ReportMetadata,
  ReportSummary,
  RuleCategory,
  RuleId,
  Severity,
  SeverityCounts,
} from './core/report/reportTypes.js';
export { RULE_CATEGORIES, SEVERITIES } from './core/report/reportTypes.js';

export type {
  Column,
  Constraint,
  ConstraintKind,
  ForeignKeyReference,
  Index,
  IndexElement,
  Policy,
  PolicyCommand,
  ReferentialAction,
  Schema,
  SourceDocument,
  SourceLocation,
  StatementKind,
  StatementRecord,
  Table,
} from './core/ddl/types.js';
export type { ExtractionNotice, ExtractionResult } from './core/ddl/extract.js';
export type { CatalogEntry, RuleCatalog } from './core/rules/catalog.js';
export type { RuleDefinition, RuleFinding } from './core/rules/types.js';
export type { Validator } from './core/rules/validate.js';
export type { LintConfig, RuleOverride } from './core/config/schema.js';
export type { ReportContext } from './core/report/buildReport.js';

export { extractSchema } from './core/ddl/extract.js';
export { BUILTIN_RULES, createCatalog } from './core/rules/catalog.js';
export {
  runValidators,
  validateConstraints,
  validateIndexes,
  validateNaming,
  validateRls,
  validateSyntax,
} from './core/rules/validate.js';
export { aggregateDiagnostics } from './core/report/aggregate.js';
export { buildReport, collectFileStats } from './core/report/buildReport.js';
export { toJson } from './core/report/toJson.js';
export { toText } from './core/report/toText.js';
export { ConfigError } from './core/config/errors.js';
export { loadConfigFile, parseConfig } from './core/config/parse.js';

import { readFile } from 'node:fs/promises';
import { extractSchema } from './core/ddl/extract.js';
import { BUILTIN_RULES, createCatalog } from './core/rules/catalog.js';
import type { RuleCatalog } from './core/rules/catalog.js';
import { runValidators } from './core/rules/validate.js';
import { applySuppressions } from './core/config/suppress.js';
import { aggregateDiagnostics } from './core/report/aggregate.js';
import { buildReport, collectFileStats } from './core/report/buildReport.js';
import { loadConfigFile } from './core/config/parse.js';
import type { LintConfig } from './core/config/schema.js';
import type { SourceDocument } from './core/ddl/types.js';
import type { Report } from './core/report/reportTypes.js';

/** Options for the lint function. */
export interface LintOptions {
  readonly config?: LintConfig | undefined;
  readonly noTimestamp?: boolean | undefined;
}

function runPipeline(
  documents: readonly SourceDocument[],
  catalog: RuleCatalog,
  config: LintConfig | undefined,
  noTimestamp: boolean,
): Report {
  const { schema } = extractSchema(documents);

  const diagnostics = runValidators(schema, catalog).flat();
  const { kept, suppressed } = applySuppressions(diagnostics, config?.suppress ?? []);

  return buildReport(aggregateDiagnostics([kept]), {
    files: collectFileStats(schema),
    suppressed,
    timestamp: noTimestamp ? null : new Date().toISOString(),
  });
}

/**
 * Run the full pipeline over in-memory DDL documents:
 * extraction, validation, suppression, aggregation and report assembly.
 * Throws ConfigError before extraction when the configuration is invalid.
 */
export function lint(documents: readonly SourceDocument[], options: LintOptions = {}): Report {
  const catalog = createCatalog(options.config?.rules ?? {});
  return runPipeline(documents, catalog, options.config, options.noTimestamp === true);
}

/** Options for linting files on disk. */
export interface LintFilesOptions {
  readonly paths: readonly string[];
  readonly configPath?: string | undefined;
  readonly noTimestamp?: boolean | undefined;
  /** Called once per input file before it is read. */
  readonly onFile?: ((path: string) => void) | undefined;
}

/**
 * Read the given DDL files (and optional override document) and lint them.
 * The configuration is validated before any input file is read.
 * Files are identified in diagnostics by the path as given.
 */
export async function lintFiles(options: LintFilesOptions): Promise<Report> {
  const config = options.configPath !== undefined ? loadConfigFile(options.configPath) : undefined;
  const catalog = createCatalog(config?.rules ?? {}, BUILTIN_RULES, options.configPath ?? null);

  const documents = await Promise.all(
    options.paths.map(async (path): Promise<SourceDocument> => {
      options.onFile?.(path);
      return { file: path, text: await readFile(path, 'utf-8') };
    }),
  );

  return runPipeline(documents, catalog, config, options.noTimestamp === true);
}
