import { describe, it, expect } from 'vitest';
import { validateIndexes } from '../../src/core/rules/validate.js';
import { ofRule, runValidator } from '../helpers/lintSql.js';

const MEMBERSHIPS = [
  'CREATE TABLE users (id int PRIMARY KEY);',
  'CREATE TABLE memberships (',
  '  user_id int REFERENCES users (id) ON DELETE CASCADE,',
  '  team_id int REFERENCES teams (id) ON DELETE CASCADE,',
  '  CONSTRAINT pk_memberships PRIMARY KEY (user_id, team_id)',
  ');',
].join('\n');

describe('validateIndexes', () => {
  describe('INDEXES_FK_NOT_INDEXED', () => {
    it('accepts a column that leads a composite primary key and reports the other', () => {
      const found = ofRule(runValidator(validateIndexes, MEMBERSHIPS), 'INDEXES_FK_NOT_INDEXED');
      expect(found.map((d) => [d.line, d.column, d.message, d.fix])).toEqual([
        [
          4,
          'team_id',
          'Foreign key column "memberships.team_id" has no index.',
          'CREATE INDEX idx_memberships_team_id ON memberships (team_id);',
        ],
      ]);
    });

    it('is satisfied by a dedicated index', () => {
      const sql = `${MEMBERSHIPS}\nCREATE INDEX idx_memberships_team_id ON memberships (team_id);`;
      expect(ofRule(runValidator(validateIndexes, sql), 'INDEXES_FK_NOT_INDEXED')).toHaveLength(0);
    });

    it('counts a partial index as coverage', () => {
      const sql = `${MEMBERSHIPS}\nCREATE INDEX idx_memberships_team_id ON memberships (team_id) WHERE team_id IS NOT NULL;`;
      expect(ofRule(runValidator(validateIndexes, sql), 'INDEXES_FK_NOT_INDEXED')).toHaveLength(0);
    });
  });

  it('reports policy columns without an index', () => {
    const sql = [
      'CREATE TABLE posts (id int PRIMARY KEY, author_id uuid NOT NULL);',
      'CREATE POLICY posts_owner ON posts FOR SELECT TO authenticated USING ((select auth.uid()) = author_id);',
    ].join('\n');
    const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_POLICY_COLUMN_NOT_INDEXED');
    expect(found.map((d) => [d.line, d.column, d.message, d.fix])).toEqual([
      [
        2,
        'author_id',
        'Column "posts.author_id" is used by policy "posts_owner" but has no index.',
        'CREATE INDEX idx_posts_author_id ON posts (author_id);',
      ],
    ]);
  });

  it('ignores policy columns read from other tables in a sub-select', () => {
    const sql = [
      'CREATE TABLE posts (id int PRIMARY KEY, team_id int, user_id uuid);',
      'CREATE POLICY posts_team ON posts FOR SELECT TO authenticated',
      '  USING (team_id IN (SELECT team_id FROM memberships WHERE user_id = (select auth.uid())));',
    ].join('\n');
    const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_POLICY_COLUMN_NOT_INDEXED');
    expect(found.map((d) => [d.line, d.column, d.message])).toEqual([
      [2, 'team_id', 'Column "posts.team_id" is used by policy "posts_team" but has no index.'],
    ]);
  });

  it('reports duplicates but not indexes that differ by predicate', () => {
    const sql = [
      'CREATE TABLE users (id int PRIMARY KEY, email text);',
      'CREATE INDEX idx_users_email ON users (email);',
      'CREATE INDEX idx_users_email_active ON users (email) WHERE email IS NOT NULL;',
      'CREATE INDEX idx_users_email_2 ON users (email);',
    ].join('\n');
    const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_DUPLICATE');
    expect(found.map((d) => [d.line, d.message, d.fix])).toEqual([
      [4, 'Index "idx_users_email_2" on "users" duplicates "idx_users_email".', 'DROP INDEX idx_users_email_2;'],
    ]);
  });

  it('reports indexes on the same columns with different methods as duplicates', () => {
    const sql = [
      'CREATE TABLE users (id int PRIMARY KEY, email text);',
      'CREATE INDEX idx_users_email ON users (email);',
      'CREATE INDEX idx_users_email_hash ON users USING hash (email);',
    ].join('\n');
    const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_DUPLICATE');
    expect(found.map((d) => [d.line, d.message])).toEqual([
      [3, 'Index "idx_users_email_hash" on "users" duplicates "idx_users_email".'],
    ]);
  });

  describe('search columns without GIN', () => {
    const sql = [
      'CREATE TABLE articles (id int PRIMARY KEY, search tsvector, tags text[]);',
      'CREATE INDEX idx_articles_search ON articles (search);',
      'CREATE INDEX idx_articles_tags ON articles USING btree (tags);',
      'CREATE INDEX idx_articles_tags_gin ON articles USING gin (tags);',
    ].join('\n');

    it('warns about a tsvector column indexed with btree', () => {
      const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_TSVECTOR_NOT_GIN');
      expect(found.map((d) => [d.severity, d.line, d.message, d.fix])).toEqual([
        [
          'warning',
          2,
          'tsvector column "articles.search" is indexed with btree by "idx_articles_search".',
          'Use a GIN index: CREATE INDEX ... ON articles USING gin (search);',
        ],
      ]);
    });

    it('notes an array column indexed with btree', () => {
      const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_ARRAY_NOT_GIN');
      expect(found.map((d) => [d.severity, d.line, d.column])).toEqual([['info', 3, 'tags']]);
    });
  });

  it('reports JSONB columns indexed with btree', () => {
    const sql = [
      'CREATE TABLE events (id int PRIMARY KEY, payload jsonb);',
      'CREATE INDEX idx_events_payload ON events (payload);',
      'CREATE INDEX idx_events_payload_gin ON events USING gin (payload);',
    ].join('\n');
    const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_JSONB_NOT_GIN');
    expect(found.map((d) => [d.severity, d.line, d.message])).toEqual([
      ['info', 2, 'JSONB column "events.payload" is indexed with btree by "idx_events_payload".'],
    ]);
  });

  it('reports index columns that do not exist', () => {
    const sql = 'CREATE TABLE users (id int PRIMARY KEY, email text);\nCREATE INDEX idx_users_mail ON users (mail);';
    const found = ofRule(runValidator(validateIndexes, sql), 'INDEXES_UNKNOWN_COLUMN');
    expect(found.map((d) => [d.line, d.column, d.message])).toEqual([
      [2, 'mail', 'Index "idx_users_mail" names unknown column "users.mail".'],
    ]);
  });

  it('reports once per table that only exists through indexes', () => {
    const sql = 'CREATE INDEX idx_ghosts_id ON ghosts (id);\nCREATE INDEX idx_ghosts_name ON ghosts (name);';
    const diagnostics = runValidator(validateIndexes, sql);
    expect(diagnostics.map((d) => [d.rule, d.line, d.message])).toEqual([
      ['INDEXES_UNKNOWN_TABLE', 1, 'Index "idx_ghosts_id" targets "ghosts", which is never created.'],
    ]);
  });
});
