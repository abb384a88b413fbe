import type { Column, Constraint, Index, Schema, SourceLocation, StatementRecord, Table } from '../ddl/types.js';
import type { RuleFinding } from './types.js';

/** Table name as shown in diagnostics: schema-qualified unless it lives in `public`. */
export function displayName(table: Pick<Table, 'schema' | 'name'>): string {
  return table.schema === 'public' ? table.name : `${table.schema}.${table.name}`;
}

/** Tables created by a CREATE TABLE statement. */
export function definedTables(schema: Schema): readonly Table[] {
  return schema.tables.filter((table) => !table.placeholder);
}

/** Tables that are only referenced, never created. */
export function placeholderTables(schema: Schema): readonly Table[] {
  return schema.tables.filter((table) => table.placeholder);
}

export function finding(
  table: Table | null,
  location: SourceLocation,
  message: string,
  options: { column?: string | null; fix?: string | null } = {},
): RuleFinding {
  return {
    message,
    location,
    table: table !== null ? displayName(table) : null,
    column: options.column ?? null,
    fix: options.fix ?? null,
  };
}

/** Location of a character offset inside a statement's text. */
export function statementLocation(statement: StatementRecord, offset: number): SourceLocation {
  let line = statement.location.line;
  const end = Math.min(offset, statement.text.length);
  for (let i = 0; i < end; i++) {
    if (statement.text.charCodeAt(i) === 10) line++;
  }
  return { file: statement.location.file, line };
}

/** Leading type name of a column, lower-cased, without modifiers or array brackets. */
export function baseType(column: Column): string {
  const match = /^[^\s([]+(?:\s+precision|\s+varying)?/i.exec(column.type.trim());
  return (match?.[0] ?? '').replace(/"/g, '').toLowerCase();
}

/** Column keys of an index up to its first expression element. */
export function leadingColumns(index: Index): string[] {
  const columns: string[] = [];
  for (const element of index.elements) {
    if (element.kind !== 'column') break;
    columns.push(element.column);
  }
  return columns;
}

/**
 * Column lists of every index PostgreSQL maintains for the table: explicit
 * indexes (partial ones included) plus the ones backing primary-key and
 * unique constraints.
 */
export function indexedColumnLists(table: Table): readonly (readonly string[])[] {
  const fromIndexes = table.indexes.map(leadingColumns);
  const fromConstraints = table.constraints
    .filter((c) => c.kind === 'primary_key' || c.kind === 'unique')
    .map((c) => c.columns);
  return [...fromIndexes, ...fromConstraints];
}

/**
 * Check if `columns` is a leftmost prefix of `indexed`.
 * e.g. [a] is a prefix of [a, b], [a, b] is a prefix of [a, b, c].
 */
export function isLeftmostPrefix(columns: readonly string[], indexed: readonly string[]): boolean {
  if (columns.length === 0 || columns.length > indexed.length) {
    return false;
  }
  return columns.every((column, i) => indexed[i] === column);
}

export function isCovered(table: Table, columns: readonly string[]): boolean {
  return indexedColumnLists(table).some((indexed) => isLeftmostPrefix(columns, indexed));
}

const KIND_PREFIX: Readonly<Record<Constraint['kind'], string>> = {
  primary_key: 'pk',
  foreign_key: 'fk',
  unique: 'uq',
  check: 'ck',
};

/** Conventional name for a constraint, e.g. `fk_posts_user_id`. */
export function suggestConstraintName(table: Table, constraint: Constraint): string {
  const parts = [KIND_PREFIX[constraint.kind], table.name.toLowerCase()];
  if (constraint.kind !== 'primary_key') {
    parts.push(...constraint.columns);
  }
  return parts.join('_');
}

/** Conventional name for an index, e.g. `idx_posts_user_id`. */
export function suggestIndexName(table: Table, index: Index): string {
  const columns = leadingColumns(index);
  const prefix = index.unique ? 'uidx' : 'idx';
  return [prefix, table.name.toLowerCase(), ...(columns.length > 0 ? columns : ['expr'])].join('_');
}

export function columnLabel(table: Table, column: string): string {
  return `${displayName(table)}.${column}`;
}
