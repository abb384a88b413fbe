import { z } from 'zod/v4';
import { defineRule, noParams } from './types.js';
import type { RuleDefinition, RuleFinding } from './types.js';
import { baseType, columnLabel, definedTables, finding, statementLocation } from './helpers.js';
import { isWord, tokenize } from '../ddl/lexer.js';

const DEPRECATED_TYPE_FIXES: Readonly<Record<string, string>> = {
  money: 'Use numeric(precision, scale) and keep the currency in its own column.',
  serial: 'Use integer GENERATED ALWAYS AS IDENTITY.',
  serial4: 'Use integer GENERATED ALWAYS AS IDENTITY.',
  serial2: 'Use smallint GENERATED ALWAYS AS IDENTITY.',
  smallserial: 'Use smallint GENERATED ALWAYS AS IDENTITY.',
  serial8: 'Use bigint GENERATED ALWAYS AS IDENTITY.',
  bigserial: 'Use bigint GENERATED ALWAYS AS IDENTITY.',
};

/** PostgreSQL reserved words that commonly collide with table or column names. */
const RESERVED_KEYWORDS = [
  'array', 'case', 'check', 'column', 'constraint', 'create', 'current_date', 'current_time',
  'current_timestamp', 'current_user', 'default', 'desc', 'distinct', 'end', 'foreign', 'from',
  'grant', 'group', 'limit', 'offset', 'only', 'order', 'primary', 'references', 'select',
  'table', 'to', 'union', 'unique', 'user', 'when', 'where', 'window',
];

/** Misspelled keyword pairs and what they should read. */
const KEYWORD_TYPOS: Readonly<Record<string, string>> = {
  'creat table': 'CREATE TABLE',
  'crate table': 'CREATE TABLE',
  'create tabel': 'CREATE TABLE',
  'primay key': 'PRIMARY KEY',
  'primar key': 'PRIMARY KEY',
  'primry key': 'PRIMARY KEY',
  'foriegn key': 'FOREIGN KEY',
};

const missingSemicolon = defineRule({
  id: 'SYNTAX_MISSING_SEMICOLON',
  category: 'syntax',
  severity: 'warning',
  description: 'Statement is not terminated by a semicolon before the next statement or end of file.',
  params: noParams,
  check: (schema) =>
    schema.statements
      .filter((statement) => !statement.terminated && statement.kind !== 'unparsed')
      .map((statement) =>
        finding(null, statement.location, `${statement.keyword} statement is missing its terminating semicolon.`, {
          fix: 'Add ";" at the end of the statement.',
        }),
      ),
});

const deprecatedType = defineRule({
  id: 'SYNTAX_DEPRECATED_TYPE',
  category: 'syntax',
  severity: 'info',
  description: 'Column uses a type that has a better modern replacement.',
  params: z.strictObject({
    types: z.array(z.string().min(1)).default(Object.keys(DEPRECATED_TYPE_FIXES)),
  }),
  check: (schema, params) => {
    const deprecated = new Set(params.types.map((t) => t.toLowerCase()));
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const column of table.columns) {
        const type = baseType(column);
        if (!deprecated.has(type)) continue;
        findings.push(
          finding(table, column.location, `Column "${columnLabel(table, column.name)}" uses deprecated type ${type.toUpperCase()}.`, {
            column: column.name,
            fix: DEPRECATED_TYPE_FIXES[type] ?? `Replace ${type.toUpperCase()} with a supported type.`,
          }),
        );
      }
    }
    return findings;
  },
});

const uuidPrimaryKeyNoDefault = defineRule({
  id: 'SYNTAX_UUID_PK_NO_DEFAULT',
  category: 'syntax',
  severity: 'info',
  description: 'UUID primary-key column has no DEFAULT expression.',
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      for (const constraint of table.constraints) {
        if (constraint.kind !== 'primary_key' || constraint.columns.length !== 1) continue;
        const column = table.columns.find((c) => c.key === constraint.columns[0]);
        if (column === undefined || baseType(column) !== 'uuid') continue;
        if (column.defaultExpression !== null || column.identity) continue;
        findings.push(
          finding(table, column.location, `UUID primary key "${columnLabel(table, column.name)}" has no DEFAULT.`, {
            column: column.name,
            fix: `Add DEFAULT gen_random_uuid() to "${column.name}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const reservedKeyword = defineRule({
  id: 'SYNTAX_RESERVED_KEYWORD',
  category: 'syntax',
  severity: 'warning',
  description: 'Table or column name is a PostgreSQL reserved keyword.',
  params: z.strictObject({
    keywords: z.array(z.string().min(1)).default(RESERVED_KEYWORDS),
  }),
  check: (schema, params) => {
    const keywords = new Set(params.keywords.map((k) => k.toLowerCase()));
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      if (keywords.has(table.name.toLowerCase())) {
        findings.push(
          finding(table, table.location, `Table name "${table.name}" is a reserved keyword.`, {
            fix: `Rename the table, e.g. "${table.name.toLowerCase()}s" or "app_${table.name.toLowerCase()}".`,
          }),
        );
      }
      for (const column of table.columns) {
        if (!keywords.has(column.name.toLowerCase())) continue;
        findings.push(
          finding(table, column.location, `Column name "${columnLabel(table, column.name)}" is a reserved keyword.`, {
            column: column.name,
            fix: `Rename the column, e.g. "${table.name.toLowerCase()}_${column.name.toLowerCase()}".`,
          }),
        );
      }
    }
    return findings;
  },
});

const keywordTypo = defineRule({
  id: 'SYNTAX_KEYWORD_TYPO',
  category: 'syntax',
  severity: 'error',
  description: 'Statement contains a misspelled keyword pair such as "creat table".',
  params: z.strictObject({
    typos: z.record(z.string().min(1), z.string().min(1)).default(KEYWORD_TYPOS),
  }),
  check: (schema, params) => {
    const typos = new Map(Object.entries(params.typos).map(([typo, fix]) => [typo.toLowerCase(), fix]));
    const findings: RuleFinding[] = [];
    for (const statement of schema.statements) {
      const tokens = tokenize(statement.text);
      for (const [index, token] of tokens.entries()) {
        const next = tokens[index + 1];
        if (token.kind !== 'word' || next === undefined || next.kind !== 'word') continue;
        const written = `${token.text} ${next.text}`;
        const correct = typos.get(written.toLowerCase());
        if (correct === undefined) continue;
        findings.push(
          finding(null, statementLocation(statement, token.start), `"${written}" looks like a misspelling of ${correct}.`, {
            fix: `Write ${correct}.`,
          }),
        );
      }
    }
    return findings;
  },
});

const singleQuotedIdentifier = defineRule({
  id: 'SYNTAX_SINGLE_QUOTED_IDENTIFIER',
  category: 'syntax',
  severity: 'error',
  description: "Table name is written as a 'string literal' instead of an identifier.",
  params: noParams,
  check: (schema) => {
    const findings: RuleFinding[] = [];
    for (const statement of schema.statements) {
      const tokens = tokenize(statement.text);
      if (!isWord(tokens[0], 'CREATE', 'ALTER')) continue;
      const table = tokens.findIndex((token) => isWord(token, 'TABLE'));
      if (table === -1 || table > 3) continue;
      let index = table + 1;
      if (isWord(tokens[index], 'IF')) {
        index += isWord(tokens[index + 1], 'NOT') ? 3 : 2;
      }
      if (isWord(tokens[index], 'ONLY')) index++;
      const name = tokens[index];
      if (name === undefined || name.kind !== 'string') continue;
      const bare = name.text.slice(1, -1);
      findings.push(
        finding(null, statementLocation(statement, name.start), `Table name ${name.text} is a string literal, not an identifier.`, {
          fix: `Write the name unquoted (${bare}) or in double quotes ("${bare}").`,
        }),
      );
    }
    return findings;
  },
});

const unparsedStatement = defineRule({
  id: 'SYNTAX_UNPARSED_STATEMENT',
  category: 'syntax',
  severity: 'info',
  description: 'Statement could not be classified or fully extracted.',
  params: noParams,
  check: (schema) =>
    schema.statements.flatMap((statement) =>
      statement.issue !== null
        ? [finding(null, statement.location, `Statement not fully analyzed: ${statement.issue}.`)]
        : [],
    ),
});

export const SYNTAX_RULES: readonly RuleDefinition[] = [
  missingSemicolon,
  deprecatedType,
  uuidPrimaryKeyNoDefault,
  reservedKeyword,
  keywordTypo,
  singleQuotedIdentifier,
  unparsedStatement,
];
