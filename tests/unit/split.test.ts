import { describe, it, expect } from 'vitest';
import { splitStatements } from '../../src/core/ddl/split.js';

describe('splitStatements', () => {
  it('splits on top-level semicolons and records start lines', () => {
    const statements = splitStatements("CREATE TABLE a (x text DEFAULT ';');\nSELECT 1;");
    expect(statements).toEqual([
      { text: "CREATE TABLE a (x text DEFAULT ';')", line: 1, terminated: true },
      { text: 'SELECT 1', line: 2, terminated: true },
    ]);
  });

  it('does not split inside dollar-quoted bodies', () => {
    const statements = splitStatements('DO $$ BEGIN PERFORM 1; END $$;\nCREATE TABLE b (id int);');
    expect(statements.map((s) => s.text)).toEqual([
      'DO $$ BEGIN PERFORM 1; END $$',
      'CREATE TABLE b (id int)',
    ]);
  });

  it('does not split inside tagged dollar quotes', () => {
    const statements = splitStatements('CREATE FUNCTION f() RETURNS int AS $fn$ SELECT 1; $fn$ LANGUAGE sql;');
    expect(statements).toHaveLength(1);
  });

  it('honors backslash escapes in E-strings', () => {
    const statements = splitStatements("SELECT E'it\\'s; fine';\nSELECT 2;");
    expect(statements.map((s) => s.text)).toEqual(["SELECT E'it\\'s; fine'", 'SELECT 2']);
  });

  it('blanks line comments without losing line numbers', () => {
    const sql = '-- header; comment\nCREATE TABLE c (\n  id int -- trailing; note\n);';
    expect(splitStatements(sql)).toEqual([
      { text: 'CREATE TABLE c (\n  id int  \n)', line: 2, terminated: true },
    ]);
  });

  it('blanks nested block comments', () => {
    const statements = splitStatements('/* outer /* inner; */ still; */\nSELECT 1;');
    expect(statements).toEqual([{ text: 'SELECT 1', line: 2, terminated: true }]);
  });

  it('closes a statement missing its semicolon when the next one starts', () => {
    const statements = splitStatements('CREATE TABLE a (id int)\nCREATE TABLE b (id int);');
    expect(statements).toEqual([
      { text: 'CREATE TABLE a (id int)', line: 1, terminated: false },
      { text: 'CREATE TABLE b (id int)', line: 2, terminated: true },
    ]);
  });

  it('does not treat keywords inside parentheses as a new statement', () => {
    const statements = splitStatements('CREATE TABLE a (\n  id int,\n  grant_id int\n);');
    expect(statements).toHaveLength(1);
    expect(statements[0]!.terminated).toBe(true);
  });

  it('marks trailing text without a semicolon as unterminated', () => {
    const statements = splitStatements('SELECT 1;\nSELECT 2');
    expect(statements[1]).toEqual({ text: 'SELECT 2', line: 2, terminated: false });
  });

  it('skips blank lines before the first statement', () => {
    expect(splitStatements('\n\n  CREATE TABLE x (id int);')[0]!.line).toBe(3);
  });

  it('returns nothing for comment-only input', () => {
    expect(splitStatements('-- nothing here\n/* or here */\n')).toEqual([]);
  });
});
