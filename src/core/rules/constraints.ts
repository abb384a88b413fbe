import { z } from 'zod/v4';
import { defineRule, noParams } from './types.js';
import type { RuleDefinition, RuleFinding } from './types.js';
import {
  baseType,
  columnLabel,
  definedTables,
  displayName,
  finding,
  leadingColumns,
  placeholderTables,
} from './helpers.js';
import type { Constraint, Table } from '../ddl/types.js';

const NUMERIC_TYPES = new Set([
  'smallint', 'integer', 'int', 'bigint', 'int2', 'int4', 'int8', 'numeric', 'decimal',
  'real', 'float4', 'float8', 'double precision', 'money',
]);

function describeForeignKey(table: Table, constraint: Constraint): string {
  const target = constraint.reference?.table ?? 'unknown';
  return `Foreign key "${displayName(table)}"(${constraint.columns.join(', ')}) referencing "${target}"`;
}

const missingPrimaryKey = defineRule({
  id: 'CONSTRAINTS_MISSING_PRIMARY_KEY',
  category: 'constraints',
  severity: 'error',
  description: 'Table has no primary key.',
  params: noParams,
  check: (schema) =>
    definedTables(schema)
      .filter((table) => !table.constraints.some((c) => c.kind === 'primary_key'))
      .map((table) =>
        finding(table, table.location, `Table "${displayName(table)}" is missing a primary key.`, {
          fix: 'Add a primary key, e.g. "id uuid PRIMARY KEY DEFAULT gen_random_uuid()".',
        }),
      ),
});

const multiplePrimaryKeys = defineRule({
  id: 'CONSTRAINTS_MULTIPLE_PRIMARY_KEYS',
  category: 'constraints',
  severity: 'error',
  description: 'Table declares more than one primary key.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const keys = table.constraints.filter((c) => c.kind === 'primary_key');
      const extra = keys[1];
      if (extra === undefined) continue;
      findings.push(
        finding(table, extra.location, `Table "${displayName(table)}" declares ${keys.length} primary keys.`, {
          fix: 'Keep one primary key and turn the others into UNIQUE constraints.',
        }),
      );
    }
    return findings;
  },
});

const foreignKeyNoOnDelete = defineRule({
  id: 'CONSTRAINTS_FK_NO_ON_DELETE',
  category: 'constraints',
  severity: 'info',
  description: 'Foreign key has no explicit ON DELETE action.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const constraint of table.constraints) {
        if (constraint.reference === null || constraint.reference.onDelete !== 'none_specified') continue;
        findings.push(
          finding(table, constraint.location, `${describeForeignKey(table, constraint)} has no ON DELETE action.`, {
            column: constraint.columns.length === 1 ? (constraint.columns[0] ?? null) : null,
            fix: 'State the intended behavior with ON DELETE CASCADE, SET NULL or RESTRICT.',
          }),
        );
      }
    }
    return findings;
  },
});

const keyColumnNullable = defineRule({
  id: 'CONSTRAINTS_KEY_COLUMN_NULLABLE',
  category: 'constraints',
  severity: 'warning',
  description: 'Unique or key-like column allows NULL.',
  params: z.strictObject({
    columnNames: z.array(z.string().min(1)).default(['email', 'username', 'slug']),
  }),
  check: (schema, params) => {
    const keyNames = new Set(params.columnNames.map((name) => name.toLowerCase()));
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const uniqueColumns = new Set([
        ...table.constraints.filter((c) => c.kind === 'unique').flatMap((c) => c.columns),
        ...table.indexes.filter((index) => index.unique).flatMap(leadingColumns),
      ]);
      for (const column of table.columns) {
        if (!column.nullable) continue;
        if (!uniqueColumns.has(column.key) && !keyNames.has(column.key)) continue;
        findings.push(
          finding(table, column.location, `Key-like column "${columnLabel(table, column.name)}" allows NULL.`, {
            column: column.name,
            fix: `Add NOT NULL to "${column.name}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const missingCheck = defineRule({
  id: 'CONSTRAINTS_MISSING_CHECK',
  category: 'constraints',
  severity: 'info',
  description: 'Numeric column with a bounded-domain name has no CHECK constraint.',
  params: z.strictObject({
    namePatterns: z.array(z.string().min(1)).default(['price', 'amount', 'quantity', 'balance', 'total', 'rating', 'percent']),
  }),
  check: (schema, params) => {
    const patterns = params.namePatterns.map((p) => p.toLowerCase());
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const checked = new Set(table.constraints.filter((c) => c.kind === 'check').flatMap((c) => c.columns));
      for (const column of table.columns) {
        if (!NUMERIC_TYPES.has(baseType(column)) || checked.has(column.key)) continue;
        if (!patterns.some((pattern) => column.key.includes(pattern))) continue;
        findings.push(
          finding(table, column.location, `Column "${columnLabel(table, column.name)}" has no CHECK constraint bounding its values.`, {
            column: column.name,
            fix: `Consider CONSTRAINT ck_${table.name.toLowerCase()}_${column.key} CHECK (${column.key} >= 0).`,
          }),
        );
      }
    }
    return findings;
  },
});

/** Lower-cased name of a zero-argument call such as `extensions.uuid_generate_v4()`, or null. */
function zeroArgumentCall(expression: string): string | null {
  const match = /^([\w$.]+)\s*\(\s*\)$/.exec(expression.trim());
  return match?.[1]?.toLowerCase() ?? null;
}

const uuidDefault = defineRule({
  id: 'CONSTRAINTS_UUID_DEFAULT',
  category: 'constraints',
  severity: 'warning',
  description: 'UUID column has a DEFAULT that is not a UUID generator call.',
  params: z.strictObject({
    functions: z.array(z.string().min(1)).min(1).default(['gen_random_uuid']),
  }),
  check: (schema, params) => {
    const generators = new Set(params.functions.map((f) => f.toLowerCase()));
    const preferred = params.functions[0] ?? 'gen_random_uuid';
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const column of table.columns) {
        if (baseType(column) !== 'uuid' || column.type.includes('[') || column.defaultExpression === null) continue;
        const call = zeroArgumentCall(column.defaultExpression);
        if (call !== null && (generators.has(call) || generators.has(call.slice(call.lastIndexOf('.') + 1)))) continue;
        findings.push(
          finding(table, column.location, `UUID column "${columnLabel(table, column.name)}" defaults to ${column.defaultExpression}.`, {
            column: column.name,
            fix: `Use DEFAULT ${preferred}().`,
          }),
        );
      }
    }
    return findings;
  },
});

const emptyStringDefault = defineRule({
  id: 'CONSTRAINTS_EMPTY_STRING_DEFAULT',
  category: 'constraints',
  severity: 'warning',
  description: "Column has DEFAULT '' (an empty string).",
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const column of table.columns) {
        if (column.defaultExpression === null || !/^''(?:\s*::\s*[\w\s]+)?$/.test(column.defaultExpression)) continue;
        findings.push(
          finding(table, column.location, `Column "${columnLabel(table, column.name)}" defaults to an empty string.`, {
            column: column.name,
            fix: "Drop DEFAULT '' and store NULL when there is no value.",
          }),
        );
      }
    }
    return findings;
  },
});

const foreignKeyUnknownTable = defineRule({
  id: 'CONSTRAINTS_FK_UNKNOWN_TABLE',
  category: 'constraints',
  severity: 'warning',
  description: 'Foreign key references a table that is not defined in the input.',
  params: z.strictObject({
    externalSchemas: z.array(z.string().min(1)).default(['auth', 'storage', 'extensions']),
  }),
  check: (schema, params) => {
    const known = new Set(definedTables(schema).map((table) => table.key));
    const external = new Set(params.externalSchemas);
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const constraint of table.constraints) {
        const reference = constraint.reference;
        if (reference === null || known.has(reference.tableKey) || external.has(reference.schema)) continue;
        findings.push(
          finding(table, constraint.location, `${describeForeignKey(table, constraint)} points at a table that is not defined.`, {
            column: constraint.columns.length === 1 ? (constraint.columns[0] ?? null) : null,
            fix: `Define table "${reference.table}" or correct the reference.`,
          }),
        );
      }
    }
    return findings;
  },
});

const unknownColumn = defineRule({
  id: 'CONSTRAINTS_UNKNOWN_COLUMN',
  category: 'constraints',
  severity: 'warning',
  description: 'Constraint names a column that does not exist.',
  params: noParams,
  check: (schema) => {
    const tables = new Map(definedTables(schema).map((table) => [table.key, table]));
    const findings: RuleFinding[] = [];
    for (const table of tables.values()) {
      const columns = new Set(table.columns.map((c) => c.key));
      for (const constraint of table.constraints) {
        for (const column of constraint.columns) {
          if (columns.has(column)) continue;
          findings.push(
            finding(table, constraint.location, `Constraint on "${displayName(table)}" names unknown column "${column}".`, {
              column,
            }),
          );
        }
        const reference = constraint.reference;
        const target = reference !== null ? tables.get(reference.tableKey) : undefined;
        if (reference === null || target === undefined) continue;
        const targetColumns = new Set(target.columns.map((c) => c.key));
        for (const column of reference.columns) {
          if (targetColumns.has(column)) continue;
          findings.push(
            finding(table, constraint.location, `Foreign key on "${displayName(table)}" references unknown column "${columnLabel(target, column)}".`, {
              column: constraint.columns.length === 1 ? (constraint.columns[0] ?? null) : null,
            }),
          );
        }
      }
    }
    return findings;
  },
});

const unknownTable = defineRule({
  id: 'CONSTRAINTS_UNKNOWN_TABLE',
  category: 'constraints',
  severity: 'warning',
  description: 'ALTER TABLE adds columns or constraints to a table that is never created.',
  params: noParams,
  check: (schema) =>
    placeholderTables(schema)
      .filter((table) => table.columns.length > 0 || table.constraints.length > 0)
      .map((table) =>
        finding(table, table.location, `ALTER TABLE targets "${displayName(table)}", which is never created.`, {
          fix: `Add a CREATE TABLE statement for "${displayName(table)}" or correct the table name.`,
        }),
      ),
});

export const CONSTRAINT_RULES: readonly RuleDefinition[] = [
  missingPrimaryKey,
  multiplePrimaryKeys,
  foreignKeyNoOnDelete,
  keyColumnNullable,
  missingCheck,
  uuidDefault,
  emptyStringDefault,
  foreignKeyUnknownTable,
  unknownColumn,
  unknownTable,
];
