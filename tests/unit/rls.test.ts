import { describe, it, expect } from 'vitest';
import { validateRls } from '../../src/core/rules/validate.js';
import { ofRule, runValidator } from '../helpers/lintSql.js';

describe('validateRls', () => {
  describe('RLS_NOT_ENABLED', () => {
    const sql = 'CREATE TABLE notes (id int PRIMARY KEY);\nCREATE TABLE internal.jobs (id int PRIMARY KEY);';

    it('only checks tables in the exposed schemas', () => {
      const found = ofRule(runValidator(validateRls, sql), 'RLS_NOT_ENABLED');
      expect(found.map((d) => [d.severity, d.table, d.message, d.fix])).toEqual([
        ['error', 'notes', 'Row level security is not enabled on "notes".', 'ALTER TABLE notes ENABLE ROW LEVEL SECURITY;'],
      ]);
    });

    it('takes the exposed schemas from params', () => {
      const found = ofRule(
        runValidator(validateRls, sql, { RLS_NOT_ENABLED: { params: { schemas: ['public', 'internal'] } } }),
        'RLS_NOT_ENABLED',
      );
      expect(found.map((d) => d.table)).toEqual(['notes', 'internal.jobs']);
    });
  });

  it('reports RLS without policies and policies without SELECT', () => {
    const sql = [
      'CREATE TABLE notes (id int PRIMARY KEY);',
      'ALTER TABLE notes ENABLE ROW LEVEL SECURITY;',
      'CREATE TABLE drafts (id int PRIMARY KEY);',
      'ALTER TABLE drafts ENABLE ROW LEVEL SECURITY;',
      'CREATE POLICY drafts_write ON drafts FOR INSERT TO authenticated WITH CHECK (true);',
    ].join('\n');
    const diagnostics = runValidator(validateRls, sql);
    expect(ofRule(diagnostics, 'RLS_ENABLED_NO_POLICIES').map((d) => [d.line, d.table])).toEqual([[1, 'notes']]);
    expect(ofRule(diagnostics, 'RLS_NO_SELECT_POLICY').map((d) => [d.line, d.message])).toEqual([
      [3, 'No policy on "drafts" allows SELECT.'],
    ]);
    expect(ofRule(diagnostics, 'RLS_POLICY_MISSING_WITH_CHECK')).toHaveLength(0);
  });

  describe('RLS_MISSING_COMMAND_POLICY', () => {
    const sql = [
      'CREATE TABLE notes (id int PRIMARY KEY);',
      'ALTER TABLE notes ENABLE ROW LEVEL SECURITY;',
      'CREATE POLICY notes_read ON notes FOR SELECT TO authenticated USING (true);',
      'CREATE POLICY notes_insert ON notes FOR INSERT TO authenticated WITH CHECK (true);',
      'CREATE TABLE tags (id int PRIMARY KEY);',
      'ALTER TABLE tags ENABLE ROW LEVEL SECURITY;',
      'CREATE POLICY tags_manage ON tags FOR ALL TO authenticated USING (true);',
    ].join('\n');

    it('lists the write commands no policy covers', () => {
      const found = ofRule(runValidator(validateRls, sql), 'RLS_MISSING_COMMAND_POLICY');
      expect(found.map((d) => [d.severity, d.line, d.message, d.fix])).toEqual([
        [
          'info',
          1,
          'No policy on "notes" allows UPDATE, DELETE.',
          'Add a policy for UPDATE, DELETE if clients write rows through the API.',
        ],
      ]);
    });

    it('checks only the configured commands', () => {
      const found = ofRule(
        runValidator(validateRls, sql, { RLS_MISSING_COMMAND_POLICY: { params: { commands: ['delete'] } } }),
        'RLS_MISSING_COMMAND_POLICY',
      );
      expect(found.map((d) => d.message)).toEqual(['No policy on "notes" allows DELETE.']);
    });
  });

  it('reports policies that compare against current_user', () => {
    const sql = [
      'CREATE TABLE notes (id int PRIMARY KEY, owner name);',
      'CREATE POLICY notes_owner ON notes FOR SELECT TO authenticated USING (owner = current_user);',
      "CREATE POLICY notes_label ON notes FOR SELECT TO authenticated USING (owner <> 'current_user');",
    ].join('\n');
    const found = ofRule(runValidator(validateRls, sql), 'RLS_POLICY_CURRENT_USER');
    expect(found.map((d) => [d.severity, d.line, d.message])).toEqual([
      [
        'warning',
        2,
        'Policy "notes_owner" on "notes" uses current_user, which names the database role rather than the signed-in user.',
      ],
    ]);
  });

  it('reports role problems and missing WITH CHECK on policies', () => {
    const sql = [
      'CREATE TABLE notes (id int PRIMARY KEY);',
      'ALTER TABLE notes ENABLE ROW LEVEL SECURITY;',
      'CREATE POLICY notes_read ON notes FOR SELECT USING (true);',
      'CREATE POLICY notes_public ON notes FOR SELECT TO public USING (true);',
      'CREATE POLICY notes_insert ON notes FOR INSERT TO authenticated;',
    ].join('\n');
    const diagnostics = runValidator(validateRls, sql);
    expect(ofRule(diagnostics, 'RLS_POLICY_NO_ROLES').map((d) => [d.line, d.message])).toEqual([
      [3, 'Policy "notes_read" on "notes" has no TO clause and defaults to PUBLIC; confirm this is intended.'],
    ]);
    expect(ofRule(diagnostics, 'RLS_POLICY_TO_PUBLIC').map((d) => [d.line, d.message])).toEqual([
      [4, 'Policy "notes_public" on "notes" applies to PUBLIC.'],
    ]);
    expect(ofRule(diagnostics, 'RLS_POLICY_MISSING_WITH_CHECK').map((d) => [d.line, d.message])).toEqual([
      [5, 'INSERT policy "notes_insert" on "notes" has no WITH CHECK expression.'],
    ]);
  });

  it('reports auth functions called outside a sub-select', () => {
    const sql = [
      'CREATE TABLE posts (id int PRIMARY KEY, author_id uuid);',
      'ALTER TABLE posts ENABLE ROW LEVEL SECURITY;',
      'CREATE POLICY posts_wrapped ON posts FOR SELECT TO authenticated USING ((select auth.uid()) = author_id);',
      'CREATE POLICY posts_bare ON posts FOR UPDATE TO authenticated USING (auth.uid() = author_id) WITH CHECK (auth.uid() = author_id);',
    ].join('\n');
    const found = ofRule(runValidator(validateRls, sql), 'RLS_UNWRAPPED_AUTH_FUNCTION');
    expect(found.map((d) => [d.severity, d.line, d.message, d.fix])).toEqual([
      [
        'info',
        4,
        'Policy "posts_bare" on "posts" calls auth.uid() once per row.',
        'Wrap the call in a sub-select: (select auth.uid()).',
      ],
    ]);
  });

  it('reports policies that chain several sub-selects', () => {
    const sql = [
      'CREATE TABLE posts (id int PRIMARY KEY, author_id uuid, team_id int);',
      'ALTER TABLE posts ENABLE ROW LEVEL SECURITY;',
      'CREATE POLICY posts_team ON posts FOR SELECT TO authenticated USING (',
      '  author_id IN (SELECT id FROM authors)',
      '  AND team_id IN (SELECT t.id FROM teams t JOIN members m ON m.team_id = t.id)',
      ');',
    ].join('\n');
    const found = ofRule(runValidator(validateRls, sql), 'RLS_POLICY_MULTIPLE_SUBSELECTS');
    expect(found.map((d) => [d.line, d.message])).toEqual([[3, 'Policy "posts_team" on "posts" uses 3 sub-selects or joins.']]);

    const relaxed = ofRule(
      runValidator(validateRls, sql, { RLS_POLICY_MULTIPLE_SUBSELECTS: { params: { threshold: 4 } } }),
      'RLS_POLICY_MULTIPLE_SUBSELECTS',
    );
    expect(relaxed).toHaveLength(0);
  });

  it('reports RLS configured on a table that is never created', () => {
    const sql = [
      'ALTER TABLE ghosts ENABLE ROW LEVEL SECURITY;',
      'CREATE POLICY ghosts_read ON ghosts FOR SELECT TO authenticated USING (true);',
    ].join('\n');
    const found = ofRule(runValidator(validateRls, sql), 'RLS_UNKNOWN_TABLE');
    expect(found.map((d) => [d.line, d.table, d.message])).toEqual([
      [2, 'ghosts', 'Row level security is configured for "ghosts", which is never created.'],
    ]);
  });
});
