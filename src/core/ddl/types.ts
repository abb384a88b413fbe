/** Where a statement or schema object was declared. */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
}

/** A named DDL input document. */
export interface SourceDocument {
  readonly file: string;
  readonly text: string;
}

/** A column of a table. */
export interface Column {
  /** Spelling as written (quotes removed). */
  readonly name: string;
  /** Folded lookup key: lower-cased unless the identifier was quoted. */
  readonly key: string;
  readonly quoted: boolean;
  readonly type: string;
  readonly nullable: boolean;
  readonly defaultExpression: string | null;
  readonly identity: boolean;
  readonly ordinal: number;
  readonly location: SourceLocation;
}

export type ConstraintKind = 'primary_key' | 'foreign_key' | 'unique' | 'check';

export type ReferentialAction =
  | 'none_specified'
  | 'cascade'
  | 'restrict'
  | 'no_action'
  | 'set_null'
  | 'set_default';

/** Target of a foreign key. */
export interface ForeignKeyReference {
  readonly schema: string;
  readonly table: string;
  /** Folded `schema.table` key. */
  readonly tableKey: string;
  readonly columns: readonly string[];
  readonly onDelete: ReferentialAction;
  readonly onUpdate: ReferentialAction;
}

/**
 * A table constraint. Unnamed constraints get a synthetic `id` (prefixed with
 * `$`) so they stay addressable while `name` remains null.
 */
export interface Constraint {
  readonly id: string;
  readonly name: string | null;
  readonly kind: ConstraintKind;
  /** Folded column keys, in declaration order. */
  readonly columns: readonly string[];
  readonly reference: ForeignKeyReference | null;
  readonly expression: string | null;
  readonly inline: boolean;
  readonly location: SourceLocation;
}

export type IndexElement =
  | { readonly kind: 'column'; readonly column: string }
  | { readonly kind: 'expression'; readonly expression: string };

export interface Index {
  readonly id: string;
  readonly name: string | null;
  readonly elements: readonly IndexElement[];
  readonly using: string;
  readonly unique: boolean;
  readonly predicate: string | null;
  readonly location: SourceLocation;
}

export type PolicyCommand = 'select' | 'insert' | 'update' | 'delete' | 'all';

export interface Policy {
  readonly name: string;
  readonly command: PolicyCommand;
  readonly permissive: boolean;
  /** Empty when the policy has no `TO` clause. */
  readonly roles: readonly string[];
  readonly using: string | null;
  readonly withCheck: string | null;
  readonly location: SourceLocation;
}

export interface Table {
  readonly name: string;
  readonly schema: string;
  /** Folded `schema.table` key. */
  readonly key: string;
  readonly quoted: boolean;
  readonly columns: readonly Column[];
  readonly constraints: readonly Constraint[];
  readonly indexes: readonly Index[];
  readonly policies: readonly Policy[];
  readonly rlsEnabled: boolean;
  readonly rlsForced: boolean;
  /** True when only ALTER/INDEX/POLICY statements mention the table. */
  readonly placeholder: boolean;
  readonly location: SourceLocation;
}

export type StatementKind =
  | 'create_table'
  | 'alter_table'
  | 'create_index'
  | 'create_policy'
  | 'other'
  | 'unparsed';

/** Line-accounting record kept for every top-level statement. */
export interface StatementRecord {
  readonly kind: StatementKind;
  /** Leading keywords, upper-cased (e.g. `CREATE TABLE`, `GRANT`). */
  readonly keyword: string;
  /** Statement text with comments blanked. */
  readonly text: string;
  readonly location: SourceLocation;
  readonly terminated: boolean;
  /** Why the statement could not be classified or extracted. */
  readonly issue: string | null;
}

/** Immutable result of extraction. */
export interface Schema {
  readonly files: readonly string[];
  readonly tables: readonly Table[];
  readonly statements: readonly StatementRecord[];
}
