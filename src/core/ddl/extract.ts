import { splitStatements } from './split.js';
import type { RawStatement } from './split.js';
import { parseStatement } from './statements.js';
import type {
  AlterAction,
  ParsedAlterTable,
  ParsedColumn,
  ParsedConstraint,
  ParsedCreateIndex,
  ParsedCreatePolicy,
  ParsedCreateTable,
} from './statements.js';
import { referencedIdentifiers } from './expressions.js';
import { tableKey } from './cursor.js';
import { compareStrings } from '../../util/index.js';
import type { QualifiedName } from './cursor.js';
import type {
  Column,
  Constraint,
  Index,
  Policy,
  Schema,
  SourceDocument,
  SourceLocation,
  StatementRecord,
  Table,
} from './types.js';

/** A statement the extractor could not model. */
export interface ExtractionNotice {
  readonly location: SourceLocation;
  readonly message: string;
}

export interface ExtractionResult {
  readonly schema: Schema;
  readonly notices: readonly ExtractionNotice[];
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type ColumnAlteration = Extract<AlterAction, { type: 'set_nullable' | 'set_default' }>;

/** A column alteration waiting for its table's CREATE TABLE. */
interface PendingAlteration {
  readonly action: ColumnAlteration;
  /** Index of the ALTER TABLE statement record. */
  readonly statement: number;
}

interface TableBuilder {
  name: string;
  schema: string;
  key: string;
  quoted: boolean;
  placeholder: boolean;
  location: SourceLocation;
  columns: Mutable<Column>[];
  constraints: Constraint[];
  indexes: Index[];
  policies: Policy[];
  rlsEnabled: boolean;
  rlsForced: boolean;
  /** Counter for synthetic constraint and index ids. */
  anonymous: number;
  pending: PendingAlteration[];
  /** Statement index of each column a placeholder gained through ADD COLUMN. */
  addedBy: Map<string, number>;
}

class SchemaBuilder {
  private readonly tables = new Map<string, TableBuilder>();
  readonly statements: StatementRecord[] = [];

  constructor(readonly files: readonly string[]) {}

  /** Look up a table, creating a placeholder for forward references. */
  resolve(name: QualifiedName, location: SourceLocation): TableBuilder {
    const key = tableKey(name.schema, name.name, name.quoted);
    const existing = this.tables.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const table: TableBuilder = {
      name: name.name,
      schema: name.schema ?? 'public',
      key,
      quoted: name.quoted,
      placeholder: true,
      location,
      columns: [],
      constraints: [],
      indexes: [],
      policies: [],
      rlsEnabled: false,
      rlsForced: false,
      anonymous: 0,
      pending: [],
      addedBy: new Map(),
    };
    this.tables.set(key, table);
    return table;
  }

  find(name: QualifiedName): TableBuilder | undefined {
    return this.tables.get(tableKey(name.schema, name.name, name.quoted));
  }

  /** Attach an issue to a statement that was already recorded. */
  flag(statement: number, issue: string): void {
    const record = this.statements[statement];
    if (record === undefined) return;
    this.statements[statement] = { ...record, issue: record.issue === null ? issue : `${record.issue}; ${issue}` };
  }

  build(): ExtractionResult {
    for (const table of this.tables.values()) {
      for (const { action, statement } of table.pending) {
        this.flag(statement, unknownColumnIssue(table, action.column));
      }
      table.pending = [];
    }
    const tables = [...this.tables.values()].map(freezeTable);
    const notices = this.statements.flatMap((statement) =>
      statement.issue !== null ? [{ location: statement.location, message: statement.issue }] : [],
    );
    return { schema: { files: this.files, tables, statements: this.statements }, notices };
  }
}

function lineAt(raw: RawStatement, offset: number): number {
  let line = raw.line;
  const end = Math.min(offset, raw.text.length);
  for (let i = 0; i < end; i++) {
    if (raw.text.charCodeAt(i) === 10) line++;
  }
  return line;
}

function toColumn(parsed: ParsedColumn, ordinal: number, location: SourceLocation): Mutable<Column> {
  return {
    name: parsed.name,
    key: parsed.quoted ? parsed.name : parsed.name.toLowerCase(),
    quoted: parsed.quoted,
    type: parsed.type,
    nullable: parsed.nullable,
    defaultExpression: parsed.defaultExpression,
    identity: parsed.identity,
    ordinal,
    location,
  };
}

function unknownColumnIssue(table: TableBuilder, column: string): string {
  return `ALTER TABLE alters unknown column "${column}" of "${table.name}"`;
}

function existingColumnIssue(table: TableBuilder, column: string): string {
  return `ALTER TABLE adds column "${column}" that "${table.name}" already has`;
}

function alterColumn(column: Mutable<Column>, action: ColumnAlteration): void {
  if (action.type === 'set_nullable') {
    column.nullable = action.nullable;
  } else {
    column.defaultExpression = action.expression;
  }
}

/** Table-level CHECK columns are resolved in `freezeTable`, once every column is known. */
function toConstraint(table: TableBuilder, parsed: ParsedConstraint, location: SourceLocation): Constraint {
  const id = parsed.name ?? `$${parsed.kind}_${++table.anonymous}`;
  return {
    id,
    name: parsed.name,
    kind: parsed.kind,
    columns: parsed.columns,
    reference: parsed.reference,
    expression: parsed.expression,
    inline: parsed.inline,
    location,
  };
}

function applyCreateTable(
  builder: SchemaBuilder,
  raw: RawStatement,
  file: string,
  parsed: ParsedCreateTable,
): string | null {
  const location = { file, line: raw.line };
  const existing = builder.find(parsed.table);
  if (existing !== undefined && !existing.placeholder) {
    const first = existing.location;
    return `duplicate CREATE TABLE for "${parsed.table.name}" (first defined at ${first.file}:${first.line})`;
  }

  const table = builder.resolve(parsed.table, location);
  const earlierColumns = table.columns;
  const earlierConstraints = table.constraints;

  table.name = parsed.table.name;
  table.quoted = parsed.table.quoted;
  table.placeholder = false;
  table.location = location;
  table.columns = parsed.columns.map((column, i) => toColumn(column, i + 1, { file, line: lineAt(raw, column.offset) }));

  for (const column of earlierColumns) {
    if (table.columns.some((c) => c.key === column.key)) {
      const statement = table.addedBy.get(column.key);
      if (statement !== undefined) builder.flag(statement, existingColumnIssue(table, column.name));
      continue;
    }
    table.columns.push({ ...column, ordinal: table.columns.length + 1 });
  }
  table.addedBy.clear();

  table.constraints = parsed.constraints.map((constraint) =>
    toConstraint(table, constraint, { file, line: lineAt(raw, constraint.offset) }),
  );
  table.constraints.push(...earlierConstraints);

  const pending = table.pending;
  table.pending = [];
  for (const { action, statement } of pending) {
    const column = table.columns.find((c) => c.key === action.column);
    if (column === undefined) {
      builder.flag(statement, unknownColumnIssue(table, action.column));
    } else {
      alterColumn(column, action);
    }
  }
  return null;
}

function applyAlterAction(
  table: TableBuilder,
  action: AlterAction,
  raw: RawStatement,
  file: string,
  statement: number,
): string | null {
  switch (action.type) {
    case 'set_rls':
      table.rlsEnabled = action.enabled;
      return null;
    case 'set_force_rls':
      table.rlsForced = action.forced;
      return null;
    case 'add_constraint':
      table.constraints.push(toConstraint(table, action.constraint, { file, line: lineAt(raw, action.constraint.offset) }));
      return null;
    case 'add_column': {
      const location = { file, line: lineAt(raw, action.column.offset) };
      const column = toColumn(action.column, table.columns.length + 1, location);
      if (table.columns.some((c) => c.key === column.key)) {
        return existingColumnIssue(table, column.name);
      }
      table.columns.push(column);
      if (table.placeholder) table.addedBy.set(column.key, statement);
      for (const constraint of action.constraints) {
        table.constraints.push(toConstraint(table, constraint, { file, line: lineAt(raw, constraint.offset) }));
      }
      return null;
    }
    case 'set_nullable':
    case 'set_default': {
      const column = table.columns.find((c) => c.key === action.column);
      if (column === undefined) {
        if (table.placeholder) {
          table.pending.push({ action, statement });
          return null;
        }
        return unknownColumnIssue(table, action.column);
      }
      alterColumn(column, action);
      return null;
    }
  }
}

function applyAlterTable(
  builder: SchemaBuilder,
  raw: RawStatement,
  file: string,
  parsed: ParsedAlterTable,
  statement: number,
): string | null {
  const table = builder.resolve(parsed.table, { file, line: raw.line });
  const issues: string[] = [];
  for (const action of parsed.actions) {
    const issue = applyAlterAction(table, action, raw, file, statement);
    if (issue !== null) issues.push(issue);
  }
  return issues.length > 0 ? issues.join('; ') : null;
}

function applyCreateIndex(builder: SchemaBuilder, raw: RawStatement, file: string, parsed: ParsedCreateIndex): void {
  const location = { file, line: raw.line };
  const table = builder.resolve(parsed.table, location);
  table.indexes.push({
    id: parsed.name ?? `$index_${++table.anonymous}`,
    name: parsed.name,
    elements: parsed.elements,
    using: parsed.using,
    unique: parsed.unique,
    predicate: parsed.predicate,
    location,
  });
}

function applyCreatePolicy(builder: SchemaBuilder, raw: RawStatement, file: string, parsed: ParsedCreatePolicy): void {
  const location = { file, line: raw.line };
  const table = builder.resolve(parsed.table, location);
  table.policies.push({
    name: parsed.name,
    command: parsed.command,
    permissive: parsed.permissive,
    roles: parsed.roles,
    using: parsed.using,
    withCheck: parsed.withCheck,
    location,
  });
}

function byLocation(a: { readonly location: SourceLocation }, b: { readonly location: SourceLocation }): number {
  return compareStrings(a.location.file, b.location.file) || a.location.line - b.location.line;
}

function freezeTable(table: TableBuilder): Table {
  const primaryKeyColumns = new Set(
    table.constraints.filter((c) => c.kind === 'primary_key').flatMap((c) => c.columns),
  );
  const columns: Column[] = table.columns.map((column) =>
    primaryKeyColumns.has(column.key) ? { ...column, nullable: false } : { ...column },
  );
  const constraints = table.constraints.map((constraint): Constraint => {
    if (constraint.kind !== 'check' || constraint.inline || constraint.expression === null) {
      return constraint;
    }
    const referenced = referencedIdentifiers(constraint.expression);
    return { ...constraint, columns: columns.filter((c) => referenced.has(c.key)).map((c) => c.key) };
  });
  return {
    name: table.name,
    schema: table.schema,
    key: table.key,
    quoted: table.quoted,
    columns,
    constraints: constraints.sort(byLocation),
    indexes: [...table.indexes].sort(byLocation),
    policies: [...table.policies].sort(byLocation),
    rlsEnabled: table.rlsEnabled,
    rlsForced: table.rlsForced,
    placeholder: table.placeholder,
    location: table.location,
  };
}

function extractStatement(builder: SchemaBuilder, raw: RawStatement, file: string): void {
  const location = { file, line: raw.line };
  const { head, parsed } = parseStatement(raw.text);
  const statement = builder.statements.length;

  let issue: string | null = null;
  switch (parsed.kind) {
    case 'create_table':
      issue = applyCreateTable(builder, raw, file, parsed);
      break;
    case 'alter_table':
      issue = applyAlterTable(builder, raw, file, parsed, statement);
      break;
    case 'create_index':
      applyCreateIndex(builder, raw, file, parsed);
      break;
    case 'create_policy':
      applyCreatePolicy(builder, raw, file, parsed);
      break;
    case 'unparsed':
      issue = parsed.issue;
      break;
    case 'other':
      break;
  }

  const kind = parsed.kind === 'unparsed' || (issue !== null && parsed.kind === 'create_table') ? 'unparsed' : head.kind;
  builder.statements.push({ kind, keyword: head.keyword, text: raw.text, location, terminated: raw.terminated, issue });
}

/**
 * Build a Schema from DDL documents. Statements the extractor cannot model
 * are recorded with an issue and reported as notices; extraction itself
 * never throws. Apart from which of two CREATE TABLEs for one table counts
 * as the duplicate, the result does not depend on document order.
 */
export function extractSchema(documents: readonly SourceDocument[]): ExtractionResult {
  const builder = new SchemaBuilder(documents.map((doc) => doc.file));
  for (const doc of documents) {
    for (const raw of splitStatements(doc.text)) {
      extractStatement(builder, raw, doc.file);
    }
  }
  return builder.build();
}
