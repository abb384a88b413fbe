import { describe, it, expect } from 'vitest';
import { validateSyntax } from '../../src/core/rules/validate.js';
import { ofRule, runValidator } from '../helpers/lintSql.js';

describe('validateSyntax', () => {
  it('flags a statement missing its semicolon', () => {
    const found = ofRule(
      runValidator(validateSyntax, 'CREATE TABLE a (id int PRIMARY KEY)\nCREATE TABLE b (id int PRIMARY KEY);'),
      'SYNTAX_MISSING_SEMICOLON',
    );
    expect(found).toHaveLength(1);
    expect(found[0]).toMatchObject({
      severity: 'warning',
      category: 'syntax',
      line: 1,
      message: 'CREATE TABLE statement is missing its terminating semicolon.',
    });
  });

  it('flags deprecated MONEY and SERIAL types as info', () => {
    const found = ofRule(
      runValidator(validateSyntax, 'CREATE TABLE orders (id serial PRIMARY KEY, price money);'),
      'SYNTAX_DEPRECATED_TYPE',
    );
    expect(found.map((d) => [d.severity, d.column, d.message, d.fix])).toEqual([
      ['info', 'id', 'Column "orders.id" uses deprecated type SERIAL.', 'Use integer GENERATED ALWAYS AS IDENTITY.'],
      ['info', 'price', 'Column "orders.price" uses deprecated type MONEY.', 'Use numeric(precision, scale) and keep the currency in its own column.'],
    ]);
  });

  it('flags a UUID primary key without a default', () => {
    const without = runValidator(validateSyntax, 'CREATE TABLE a (id uuid PRIMARY KEY);');
    expect(ofRule(without, 'SYNTAX_UUID_PK_NO_DEFAULT').map((d) => d.column)).toEqual(['id']);

    const withDefault = runValidator(validateSyntax, 'CREATE TABLE a (id uuid PRIMARY KEY DEFAULT gen_random_uuid());');
    expect(ofRule(withDefault, 'SYNTAX_UUID_PK_NO_DEFAULT')).toHaveLength(0);
  });

  it('flags reserved keywords used as table or column names', () => {
    const found = ofRule(
      runValidator(validateSyntax, 'CREATE TABLE user (id int PRIMARY KEY, "order" int);'),
      'SYNTAX_RESERVED_KEYWORD',
    );
    expect(found.map((d) => d.message)).toEqual([
      'Table name "user" is a reserved keyword.',
      'Column name "user.order" is a reserved keyword.',
    ]);
  });

  it('takes the keyword list from rule params', () => {
    const found = ofRule(
      runValidator(validateSyntax, 'CREATE TABLE user (id int PRIMARY KEY);', {
        SYNTAX_RESERVED_KEYWORD: { params: { keywords: ['id'] } },
      }),
      'SYNTAX_RESERVED_KEYWORD',
    );
    expect(found.map((d) => d.column)).toEqual(['id']);
  });

  it('flags misspelled keyword pairs at their own line', () => {
    const sql = 'CREAT TABLE users (id int PRIMARY KEY);\nCREATE TABLE posts (\n  id int primry key\n);';
    const found = ofRule(runValidator(validateSyntax, sql), 'SYNTAX_KEYWORD_TYPO');
    expect(found.map((d) => [d.severity, d.line, d.message, d.fix])).toEqual([
      ['error', 1, '"CREAT TABLE" looks like a misspelling of CREATE TABLE.', 'Write CREATE TABLE.'],
      ['error', 3, '"primry key" looks like a misspelling of PRIMARY KEY.', 'Write PRIMARY KEY.'],
    ]);
  });

  it('flags table names written as string literals', () => {
    const sql = [
      "CREATE TABLE 'users' (id int PRIMARY KEY);",
      "CREATE TABLE IF NOT EXISTS 'posts' (id int PRIMARY KEY);",
      "INSERT INTO tags VALUES ('table');",
    ].join('\n');
    const found = ofRule(runValidator(validateSyntax, sql), 'SYNTAX_SINGLE_QUOTED_IDENTIFIER');
    expect(found.map((d) => [d.line, d.message, d.fix])).toEqual([
      [1, "Table name 'users' is a string literal, not an identifier.", 'Write the name unquoted (users) or in double quotes ("users").'],
      [2, "Table name 'posts' is a string literal, not an identifier.", 'Write the name unquoted (posts) or in double quotes ("posts").'],
    ]);
  });

  it('reports statements it could not analyze', () => {
    const found = ofRule(runValidator(validateSyntax, 'FOO;'), 'SYNTAX_UNPARSED_STATEMENT');
    expect(found).toEqual([
      {
        rule: 'SYNTAX_UNPARSED_STATEMENT',
        category: 'syntax',
        severity: 'info',
        message: 'Statement not fully analyzed: unrecognized statement starting with "FOO".',
        file: 'schema.sql',
        line: 1,
        table: null,
        column: null,
        fix: null,
      },
    ]);
  });

  it('emits nothing for a disabled rule', () => {
    const found = runValidator(validateSyntax, 'FOO;', { SYNTAX_UNPARSED_STATEMENT: { enabled: false } });
    expect(found).toEqual([]);
  });
});
