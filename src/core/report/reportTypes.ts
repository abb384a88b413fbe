/** Severity levels for diagnostics. */
export type Severity = 'error' | 'warning' | 'info';

/** All severities, most severe first. */
export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'];

/** Rule categories, one per validator. */
export type RuleCategory = 'syntax' | 'naming' | 'constraints' | 'indexes' | 'rls';

/** All rule categories in validator order. */
export const RULE_CATEGORIES: readonly RuleCategory[] = [
  'syntax',
  'naming',
  'constraints',
  'indexes',
  'rls',
];

/** Stable rule identifiers. */
export type RuleId =
  | 'SYNTAX_MISSING_SEMICOLON'
  | 'SYNTAX_DEPRECATED_TYPE'
  | 'SYNTAX_UUID_PK_NO_DEFAULT'
  | 'SYNTAX_RESERVED_KEYWORD'
  | 'SYNTAX_KEYWORD_TYPO'
  | 'SYNTAX_SINGLE_QUOTED_IDENTIFIER'
  | 'SYNTAX_UNPARSED_STATEMENT'
  | 'NAMING_UPPERCASE_IDENTIFIER'
  | 'NAMING_CAMEL_CASE'
  | 'NAMING_TABLE_PREFIX'
  | 'NAMING_TABLE_NOT_PLURAL'
  | 'NAMING_CONSTRAINT_UNNAMED'
  | 'NAMING_CONSTRAINT_PREFIX'
  | 'NAMING_INDEX_UNNAMED'
  | 'NAMING_INDEX_UPPERCASE'
  | 'NAMING_INDEX_PREFIX'
  | 'CONSTRAINTS_MISSING_PRIMARY_KEY'
  | 'CONSTRAINTS_MULTIPLE_PRIMARY_KEYS'
  | 'CONSTRAINTS_FK_NO_ON_DELETE'
  | 'CONSTRAINTS_KEY_COLUMN_NULLABLE'
  | 'CONSTRAINTS_MISSING_CHECK'
  | 'CONSTRAINTS_UUID_DEFAULT'
  | 'CONSTRAINTS_EMPTY_STRING_DEFAULT'
  | 'CONSTRAINTS_FK_UNKNOWN_TABLE'
  | 'CONSTRAINTS_UNKNOWN_COLUMN'
  | 'CONSTRAINTS_UNKNOWN_TABLE'
  | 'INDEXES_FK_NOT_INDEXED'
  | 'INDEXES_POLICY_COLUMN_NOT_INDEXED'
  | 'INDEXES_DUPLICATE'
  | 'INDEXES_JSONB_NOT_GIN'
  | 'INDEXES_TSVECTOR_NOT_GIN'
  | 'INDEXES_ARRAY_NOT_GIN'
  | 'INDEXES_UNKNOWN_COLUMN'
  | 'INDEXES_UNKNOWN_TABLE'
  | 'RLS_NOT_ENABLED'
  | 'RLS_ENABLED_NO_POLICIES'
  | 'RLS_NO_SELECT_POLICY'
  | 'RLS_MISSING_COMMAND_POLICY'
  | 'RLS_POLICY_NO_ROLES'
  | 'RLS_POLICY_TO_PUBLIC'
  | 'RLS_POLICY_MISSING_WITH_CHECK'
  | 'RLS_POLICY_CURRENT_USER'
  | 'RLS_UNWRAPPED_AUTH_FUNCTION'
  | 'RLS_POLICY_MULTIPLE_SUBSELECTS'
  | 'RLS_UNKNOWN_TABLE';

/** A single validation finding. */
export interface Diagnostic {
  readonly rule: RuleId;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly message: string;
  readonly file: string;
  readonly line: number;
  readonly table: string | null;
  readonly column: string | null;
  readonly fix: string | null;
}

/** Diagnostic counts keyed by severity. */
export type SeverityCounts = Readonly<Record<Severity, number>>;

/** Diagnostic counts keyed by rule category. */
export type CategoryCounts = Readonly<Record<RuleCategory, number>>;

/** Output of the aggregator: ordered, de-duplicated diagnostics plus counts. */
export interface AggregatedDiagnostics {
  readonly diagnostics: readonly Diagnostic[];
  readonly total: number;
  readonly bySeverity: SeverityCounts;
  readonly byCategory: CategoryCounts;
}

/** Per-file input statistics collected from the extracted schema. */
export interface FileStats {
  readonly file: string;
  readonly statements: number;
  readonly tables: number;
}

/** Per-file slice of a report. */
export interface FileReport extends FileStats {
  readonly counts: SeverityCounts;
  readonly diagnostics: readonly Diagnostic[];
}

/** Report summary block. */
export interface ReportSummary {
  readonly files: number;
  readonly tables: number;
  readonly statements: number;
  readonly total: number;
  readonly suppressed: number;
  readonly bySeverity: SeverityCounts;
  readonly byCategory: CategoryCounts;
}

/** Metadata about the lint run. */
export interface ReportMetadata {
  readonly timestamp: string | null;
}

/** The complete, render-ready lint report. */
export interface Report {
  readonly passed: boolean;
  readonly summary: ReportSummary;
  readonly diagnostics: readonly Diagnostic[];
  readonly bySeverity: Readonly<Record<Severity, readonly Diagnostic[]>>;
  readonly files: readonly FileReport[];
  readonly metadata: ReportMetadata;
}

/** Output format options. */
export type OutputFormat = 'json' | 'text';

/** Options controlling formatter output. */
export interface FormatOptions {
  readonly diagnosticsOnly?: boolean | undefined;
}
