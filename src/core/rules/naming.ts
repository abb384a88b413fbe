import { z } from 'zod/v4';
import { defineRule, noParams, regexParam } from './types.js';
import type { RuleDefinition, RuleFinding } from './types.js';
import { columnLabel, definedTables, displayName, finding, suggestConstraintName, suggestIndexName } from './helpers.js';
import type { ConstraintKind } from '../ddl/types.js';

const KIND_LABEL: Readonly<Record<ConstraintKind, string>> = {
  primary_key: 'primary key',
  foreign_key: 'foreign key',
  unique: 'unique',
  check: 'check',
};

function toSnakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

/** Naive English plural of the last word of a snake_case name. */
export function pluralize(name: string): string {
  if (/[^aeiou]y$/.test(name)) return `${name.slice(0, -1)}ies`;
  if (/(?:s|x|z|ch|sh)$/.test(name)) return `${name}es`;
  return `${name}s`;
}

const uppercaseIdentifier = defineRule({
  id: 'NAMING_UPPERCASE_IDENTIFIER',
  category: 'naming',
  severity: 'error',
  description: 'Table or column name contains an uppercase character.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      if (/[A-Z]/.test(table.name)) {
        findings.push(
          finding(table, table.location, `Table name "${table.name}" contains uppercase characters.`, {
            fix: `Rename the table to "${toSnakeCase(table.name)}".`,
          }),
        );
      }
      for (const column of table.columns) {
        if (!/[A-Z]/.test(column.name)) continue;
        findings.push(
          finding(table, column.location, `Column name "${columnLabel(table, column.name)}" contains uppercase characters.`, {
            column: column.name,
            fix: `Rename the column to "${toSnakeCase(column.name)}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const camelCase = defineRule({
  id: 'NAMING_CAMEL_CASE',
  category: 'naming',
  severity: 'warning',
  description: 'Table or column name is written in camelCase instead of snake_case.',
  params: noParams,
  check: (schema) => {
    const camel = /[a-z][A-Z]/;
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      if (camel.test(table.name)) {
        findings.push(
          finding(table, table.location, `Table name "${table.name}" uses camelCase.`, {
            fix: `Use snake_case: "${toSnakeCase(table.name)}".`,
          }),
        );
      }
      for (const column of table.columns) {
        if (!camel.test(column.name)) continue;
        findings.push(
          finding(table, column.location, `Column name "${columnLabel(table, column.name)}" uses camelCase.`, {
            column: column.name,
            fix: `Use snake_case: "${toSnakeCase(column.name)}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const tablePrefix = defineRule({
  id: 'NAMING_TABLE_PREFIX',
  category: 'naming',
  severity: 'warning',
  description: 'Table name carries a redundant type prefix such as tbl_.',
  params: z.strictObject({
    prefixes: z.array(z.string().min(1)).default(['tbl_']),
  }),
  check: (schema, params) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const lower = table.name.toLowerCase();
      const prefix = params.prefixes.find((p) => lower.startsWith(p.toLowerCase()) && lower.length > p.length);
      if (prefix === undefined) continue;
      findings.push(
        finding(table, table.location, `Table name "${table.name}" uses the "${prefix}" prefix.`, {
          fix: `Rename the table to "${table.name.slice(prefix.length)}".`,
        }),
      );
    }
    return findings;
  },
});

const tableNotPlural = defineRule({
  id: 'NAMING_TABLE_NOT_PLURAL',
  category: 'naming',
  severity: 'info',
  description: 'Table name does not look plural.',
  params: z.strictObject({
    pluralSuffixes: z.array(z.string().min(1)).default(['s', 'data', 'info', 'media', 'people', 'children']),
  }),
  check: (schema, params) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      const lower = table.name.toLowerCase();
      if (params.pluralSuffixes.some((suffix) => lower.endsWith(suffix.toLowerCase()))) continue;
      findings.push(
        finding(table, table.location, `Table name "${table.name}" is not plural.`, {
          fix: `Consider renaming the table to "${pluralize(lower)}".`,
        }),
      );
    }
    return findings;
  },
});

const constraintUnnamed = defineRule({
  id: 'NAMING_CONSTRAINT_UNNAMED',
  category: 'naming',
  severity: 'warning',
  description: 'Constraint has no explicit name.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const constraint of table.constraints) {
        if (constraint.name !== null) continue;
        const columns = constraint.columns.join(', ');
        findings.push(
          finding(table, constraint.location, `Unnamed ${KIND_LABEL[constraint.kind]} constraint on "${displayName(table)}" (${columns}).`, {
            column: constraint.columns.length === 1 ? (constraint.columns[0] ?? null) : null,
            fix: `Name it explicitly: CONSTRAINT ${suggestConstraintName(table, constraint)}.`,
          }),
        );
      }
    }
    return findings;
  },
});

const constraintPrefix = defineRule({
  id: 'NAMING_CONSTRAINT_PREFIX',
  category: 'naming',
  severity: 'warning',
  description: 'Constraint name does not follow the pk_/fk_/uq_/ck_ convention.',
  params: z.strictObject({
    primaryKey: regexParam('^pk_'),
    foreignKey: regexParam('^fk_'),
    unique: regexParam('^uq_'),
    check: regexParam('^ck_'),
  }),
  check: (schema, params) => {
    const patterns: Readonly<Record<ConstraintKind, RegExp>> = {
      primary_key: new RegExp(params.primaryKey),
      foreign_key: new RegExp(params.foreignKey),
      unique: new RegExp(params.unique),
      check: new RegExp(params.check),
    };
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const constraint of table.constraints) {
        if (constraint.name === null) continue;
        const pattern = patterns[constraint.kind];
        if (pattern.test(constraint.name)) continue;
        findings.push(
          finding(table, constraint.location, `Constraint "${constraint.name}" does not match the ${KIND_LABEL[constraint.kind]} naming pattern ${pattern.source}.`, {
            fix: `Rename the constraint to "${suggestConstraintName(table, constraint)}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const indexUnnamed = defineRule({
  id: 'NAMING_INDEX_UNNAMED',
  category: 'naming',
  severity: 'warning',
  description: 'Index has no explicit name.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const index of table.indexes) {
        if (index.name !== null) continue;
        findings.push(
          finding(table, index.location, `Unnamed index on "${displayName(table)}".`, {
            fix: `Name the index "${suggestIndexName(table, index)}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const indexUppercase = defineRule({
  id: 'NAMING_INDEX_UPPERCASE',
  category: 'naming',
  severity: 'error',
  description: 'Index name contains an uppercase character.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const index of table.indexes) {
        if (index.name === null || !/[A-Z]/.test(index.name)) continue;
        findings.push(
          finding(table, index.location, `Index name "${index.name}" contains uppercase characters.`, {
            fix: `Rename the index to "${toSnakeCase(index.name)}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const indexPrefix = defineRule({
  id: 'NAMING_INDEX_PREFIX',
  category: 'naming',
  severity: 'warning',
  description: 'Index name does not follow the idx_/uidx_ convention.',
  params: z.strictObject({
    index: regexParam('^idx_'),
    uniqueIndex: regexParam('^uidx_'),
  }),
  check: (schema, params) => {
    const plain = new RegExp(params.index);
    const unique = new RegExp(params.uniqueIndex);
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const index of table.indexes) {
        if (index.name === null) continue;
        const pattern = index.unique ? unique : plain;
        if (pattern.test(index.name)) continue;
        findings.push(
          finding(table, index.location, `Index "${index.name}" does not match the ${index.unique ? 'unique index' : 'index'} naming pattern ${pattern.source}.`, {
            fix: `Rename the index to "${suggestIndexName(table, index)}".`,
          }),
        );
      }
    }
    return findings;
  },
});

export const NAMING_RULES: readonly RuleDefinition[] = [
  uppercaseIdentifier,
  camelCase,
  tablePrefix,
  tableNotPlural,
  constraintUnnamed,
  constraintPrefix,
  indexUnnamed,
  indexUppercase,
  indexPrefix,
];
