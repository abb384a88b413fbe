import { defineRule, noParams } from './types.js';
import type { RuleDefinition, RuleFinding } from './types.js';
import {
  baseType,
  columnLabel,
  definedTables,
  displayName,
  finding,
  isCovered,
  placeholderTables,
} from './helpers.js';
import { outerIdentifiers } from '../ddl/expressions.js';
import type { Column, Index, IndexElement, Schema, Table } from '../ddl/types.js';
import { normalizeWhitespace } from '../../util/index.js';

function elementKey(element: IndexElement): string {
  return element.kind === 'column' ? element.column : normalizeWhitespace(element.expression).toLowerCase();
}

/** Identity of an index for duplicate detection: ordered elements and predicate. */
function indexSignature(index: Index): string {
  const predicate = index.predicate !== null ? normalizeWhitespace(index.predicate).toLowerCase() : '';
  return [index.elements.map(elementKey).join(','), predicate].join('|');
}

function indexLabel(index: Index): string {
  return index.name !== null ? `"${index.name}"` : 'unnamed index';
}

const foreignKeyNotIndexed = defineRule({
  id: 'INDEXES_FK_NOT_INDEXED',
  category: 'indexes',
  severity: 'warning',
  description: 'Foreign-key columns are not the leading columns of any index.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const reported = new Set<string>();
      for (const constraint of table.constraints) {
        if (constraint.kind !== 'foreign_key' || constraint.columns.length === 0) continue;
        const key = constraint.columns.join(',');
        if (reported.has(key) || isCovered(table, constraint.columns)) continue;
        reported.add(key);

        const columns = constraint.columns.join(', ');
        const indexName = ['idx', table.name.toLowerCase(), ...constraint.columns].join('_');
        const subject = constraint.columns.length === 1
          ? `Foreign key column "${columnLabel(table, columns)}" has no index.`
          : `Foreign key columns (${columns}) on "${displayName(table)}" have no covering index.`;
        findings.push(
          finding(table, constraint.location, subject, {
            column: constraint.columns.length === 1 ? (constraint.columns[0] ?? null) : null,
            fix: `CREATE INDEX ${indexName} ON ${displayName(table)} (${columns});`,
          }),
        );
      }
    }
    return findings;
  },
});

function policyColumns(table: Table): Map<string, string> {
  const known = new Set(table.columns.map((c) => c.key));
  const firstPolicy = new Map<string, string>();
  for (const policy of table.policies) {
    for (const expression of [policy.using, policy.withCheck]) {
      if (expression === null) continue;
      for (const identifier of outerIdentifiers(expression)) {
        if (known.has(identifier) && !firstPolicy.has(identifier)) {
          firstPolicy.set(identifier, policy.name);
        }
      }
    }
  }
  return firstPolicy;
}

const policyColumnNotIndexed = defineRule({
  id: 'INDEXES_POLICY_COLUMN_NOT_INDEXED',
  category: 'indexes',
  severity: 'warning',
  description: 'Column used in a policy expression has no index.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const [column, policyName] of policyColumns(table)) {
        if (isCovered(table, [column])) continue;
        const policy = table.policies.find((p) => p.name === policyName);
        findings.push(
          finding(table, policy?.location ?? table.location, `Column "${columnLabel(table, column)}" is used by policy "${policyName}" but has no index.`, {
            column,
            fix: `CREATE INDEX idx_${table.name.toLowerCase()}_${column} ON ${displayName(table)} (${column});`,
          }),
        );
      }
    }
    return findings;
  },
});

const duplicateIndex = defineRule({
  id: 'INDEXES_DUPLICATE',
  category: 'indexes',
  severity: 'warning',
  description: 'Two indexes share ordered elements and predicate, whatever their method.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const seen = new Map<string, Index>();
      for (const index of table.indexes) {
        const signature = indexSignature(index);
        const original = seen.get(signature);
        if (original === undefined) {
          seen.set(signature, index);
          continue;
        }
        findings.push(
          finding(table, index.location, `Index ${indexLabel(index)} on "${displayName(table)}" duplicates ${indexLabel(original)}.`, {
            fix: index.name !== null ? `DROP INDEX ${index.name};` : 'Remove the redundant index.',
          }),
        );
      }
    }
    return findings;
  },
});

function isArrayColumn(column: Column): boolean {
  return /\[\s*\d*\s*\]\s*$|\barray\s*$/i.test(column.type.trim());
}

/** Findings for plain columns matching `accepts` that a non-GIN index covers. */
function nonGinFindings(schema: Schema, label: string, accepts: (column: Column) => boolean): RuleFinding[] {
  const findings: RuleFinding[] = [];
  for (const table of definedTables(schema)) {
    const columns = new Map(table.columns.map((c) => [c.key, c]));
    for (const index of table.indexes) {
      if (index.using === 'gin') continue;
      for (const element of index.elements) {
        if (element.kind !== 'column') continue;
        const column = columns.get(element.column);
        if (column === undefined || !accepts(column)) continue;
        findings.push(
          finding(table, index.location, `${label} column "${columnLabel(table, column.name)}" is indexed with ${index.using} by ${indexLabel(index)}.`, {
            column: column.name,
            fix: `Use a GIN index: CREATE INDEX ... ON ${displayName(table)} USING gin (${column.key});`,
          }),
        );
      }
    }
  }
  return findings;
}

const jsonbNotGin = defineRule({
  id: 'INDEXES_JSONB_NOT_GIN',
  category: 'indexes',
  severity: 'info',
  description: 'JSONB column is indexed with a method other than GIN.',
  params: noParams,
  check: (schema) => nonGinFindings(schema, 'JSONB', (column) => baseType(column) === 'jsonb' && !isArrayColumn(column)),
});

const tsvectorNotGin = defineRule({
  id: 'INDEXES_TSVECTOR_NOT_GIN',
  category: 'indexes',
  severity: 'warning',
  description: 'Full-text search (tsvector) column is indexed with a method other than GIN.',
  params: noParams,
  check: (schema) => nonGinFindings(schema, 'tsvector', (column) => baseType(column) === 'tsvector' && !isArrayColumn(column)),
});

const arrayNotGin = defineRule({
  id: 'INDEXES_ARRAY_NOT_GIN',
  category: 'indexes',
  severity: 'info',
  description: 'Array column is indexed with a method other than GIN.',
  params: noParams,
  check: (schema) => nonGinFindings(schema, 'Array', isArrayColumn),
});

const unknownColumn = defineRule({
  id: 'INDEXES_UNKNOWN_COLUMN',
  category: 'indexes',
  severity: 'warning',
  description: 'Index names a column that does not exist.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const columns = new Set(table.columns.map((c) => c.key));
      for (const index of table.indexes) {
        for (const element of index.elements) {
          if (element.kind !== 'column' || columns.has(element.column)) continue;
          findings.push(
            finding(table, index.location, `Index ${indexLabel(index)} names unknown column "${columnLabel(table, element.column)}".`, {
              column: element.column,
            }),
          );
        }
      }
    }
    return findings;
  },
});

const unknownTable = defineRule({
  id: 'INDEXES_UNKNOWN_TABLE',
  category: 'indexes',
  severity: 'warning',
  description: 'Index is declared on a table that is never created.',
  params: noParams,
  check: (schema) =>
    placeholderTables(schema).flatMap((table) => {
      const first = table.indexes[0];
      if (first === undefined) return [];
      return [
        finding(table, first.location, `Index ${indexLabel(first)} targets "${displayName(table)}", which is never created.`, {
          fix: `Add a CREATE TABLE statement for "${displayName(table)}" or correct the table name.`,
        }),
      ];
    }),
});

export const INDEX_RULES: readonly RuleDefinition[] = [
  foreignKeyNotIndexed,
  policyColumnNotIndexed,
  duplicateIndex,
  jsonbNotGin,
  tsvectorNotGin,
  arrayNotGin,
  unknownColumn,
  unknownTable,
];
