import { isIdentifier, isPunct, isWord, tokenize } from './lexer.js';
import type { Token } from './lexer.js';
import { TokenCursor, foldIdentifier, sliceText, splitOnCommas, tableKey } from './cursor.js';
import type { QualifiedName } from './cursor.js';
import type {
  ConstraintKind,
  ForeignKeyReference,
  IndexElement,
  PolicyCommand,
  ReferentialAction,
  StatementKind,
} from './types.js';

/** Column definition before it is attached to a table. */
export interface ParsedColumn {
  readonly name: string;
  readonly quoted: boolean;
  readonly type: string;
  readonly nullable: boolean;
  readonly defaultExpression: string | null;
  readonly identity: boolean;
  readonly offset: number;
}

/** Constraint definition before it is attached to a table. */
export interface ParsedConstraint {
  readonly name: string | null;
  readonly kind: ConstraintKind;
  readonly columns: readonly string[];
  readonly reference: ForeignKeyReference | null;
  readonly expression: string | null;
  readonly inline: boolean;
  readonly offset: number;
}

export interface ParsedCreateTable {
  readonly kind: 'create_table';
  readonly table: QualifiedName;
  readonly columns: readonly ParsedColumn[];
  readonly constraints: readonly ParsedConstraint[];
}

export type AlterAction =
  | { readonly type: 'add_constraint'; readonly constraint: ParsedConstraint }
  | { readonly type: 'add_column'; readonly column: ParsedColumn; readonly constraints: readonly ParsedConstraint[] }
  | { readonly type: 'set_rls'; readonly enabled: boolean }
  | { readonly type: 'set_force_rls'; readonly forced: boolean }
  | { readonly type: 'set_nullable'; readonly column: string; readonly nullable: boolean }
  | { readonly type: 'set_default'; readonly column: string; readonly expression: string | null };

export interface ParsedAlterTable {
  readonly kind: 'alter_table';
  readonly table: QualifiedName;
  readonly actions: readonly AlterAction[];
}

export interface ParsedCreateIndex {
  readonly kind: 'create_index';
  readonly table: QualifiedName;
  readonly name: string | null;
  readonly unique: boolean;
  readonly using: string;
  readonly elements: readonly IndexElement[];
  readonly predicate: string | null;
}

export interface ParsedCreatePolicy {
  readonly kind: 'create_policy';
  readonly table: QualifiedName;
  readonly name: string;
  readonly command: PolicyCommand;
  readonly permissive: boolean;
  readonly roles: readonly string[];
  readonly using: string | null;
  readonly withCheck: string | null;
}

export type ParsedStatement =
  | ParsedCreateTable
  | ParsedAlterTable
  | ParsedCreateIndex
  | ParsedCreatePolicy
  | { readonly kind: 'other' }
  | { readonly kind: 'unparsed'; readonly issue: string };

/** Classification of a statement by its leading keywords. */
export interface StatementHead {
  readonly kind: StatementKind;
  readonly keyword: string;
}

/** Leading keywords of SQL commands that are recognized but not modeled. */
const KNOWN_COMMANDS = new Set([
  'ABORT', 'ALTER', 'ANALYZE', 'BEGIN', 'CALL', 'CHECKPOINT', 'CLOSE', 'CLUSTER', 'COMMENT',
  'COMMIT', 'COPY', 'CREATE', 'DEALLOCATE', 'DECLARE', 'DELETE', 'DISCARD', 'DO', 'DROP',
  'END', 'EXECUTE', 'EXPLAIN', 'FETCH', 'GRANT', 'IMPORT', 'INSERT', 'LISTEN', 'LOAD',
  'LOCK', 'MERGE', 'MOVE', 'NOTIFY', 'PREPARE', 'REASSIGN', 'REFRESH', 'REINDEX', 'RELEASE',
  'RESET', 'REVOKE', 'ROLLBACK', 'SAVEPOINT', 'SECURITY', 'SELECT', 'SET', 'SHOW', 'START',
  'TRUNCATE', 'UNLISTEN', 'UPDATE', 'VACUUM', 'VALUES', 'WITH',
]);

/** Words that end a column's type and start its constraint list. */
const COLUMN_CONSTRAINT_WORDS = [
  'CONSTRAINT', 'NOT', 'NULL', 'DEFAULT', 'PRIMARY', 'REFERENCES', 'UNIQUE', 'CHECK', 'COLLATE', 'GENERATED',
];

const CREATE_TABLE_HEAD = /^CREATE (?:OR REPLACE )?(?:(?:GLOBAL|LOCAL) )?(?:(?:TEMP|TEMPORARY|UNLOGGED) )?TABLE\b/;
const CREATE_INDEX_HEAD = /^CREATE (?:UNIQUE )?INDEX\b/;
const CREATE_POLICY_HEAD = /^CREATE POLICY\b/;
const ALTER_TABLE_HEAD = /^ALTER TABLE\b/;

/** Classify a statement from its tokens without extracting any fields. */
export function classifyStatement(tokens: readonly Token[]): StatementHead {
  const words: string[] = [];
  for (const token of tokens.slice(0, 6)) {
    if (token.kind !== 'word') break;
    words.push(token.text.toUpperCase());
  }
  const head = words.join(' ');
  const first = words[0];

  if (CREATE_TABLE_HEAD.test(head)) return { kind: 'create_table', keyword: 'CREATE TABLE' };
  if (CREATE_INDEX_HEAD.test(head)) return { kind: 'create_index', keyword: 'CREATE INDEX' };
  if (CREATE_POLICY_HEAD.test(head)) return { kind: 'create_policy', keyword: 'CREATE POLICY' };
  if (ALTER_TABLE_HEAD.test(head)) return { kind: 'alter_table', keyword: 'ALTER TABLE' };

  if (first === undefined || !KNOWN_COMMANDS.has(first)) {
    const leading = tokens[0]?.text ?? '';
    return { kind: 'unparsed', keyword: leading.toUpperCase() };
  }
  const twoWord = first === 'CREATE' || first === 'ALTER' || first === 'DROP' || first === 'COMMENT';
  const keyword = twoWord && words[1] !== undefined ? `${first} ${words[1]}` : first;
  return { kind: 'other', keyword };
}

/** Tokenize, classify and extract one statement. Never throws. */
export function parseStatement(text: string): { head: StatementHead; parsed: ParsedStatement } {
  const tokens = tokenize(text);
  const head = classifyStatement(tokens);
  const cursor = new TokenCursor(tokens);

  switch (head.kind) {
    case 'create_table':
      return { head, parsed: parseCreateTable(cursor, text) };
    case 'alter_table':
      return { head, parsed: parseAlterTable(cursor, text) };
    case 'create_index':
      return { head, parsed: parseCreateIndex(cursor, text) };
    case 'create_policy':
      return { head, parsed: parseCreatePolicy(cursor, text) };
    case 'unparsed':
      return { head, parsed: { kind: 'unparsed', issue: `unrecognized statement starting with "${head.keyword}"` } };
    case 'other':
      return { head, parsed: { kind: 'other' } };
  }
}

function readIdentifier(cursor: TokenCursor): string | null {
  const token = cursor.peek();
  if (!isIdentifier(token)) {
    return null;
  }
  cursor.next();
  return token.value;
}

function readColumnList(cursor: TokenCursor): string[] {
  const group = cursor.readGroup();
  if (group === null) {
    return [];
  }
  return splitOnCommas(group)
    .map((part) => part[0])
    .filter(isIdentifier)
    .map(foldIdentifier);
}

function readAction(cursor: TokenCursor): ReferentialAction {
  if (cursor.acceptWord('CASCADE') !== null) return 'cascade';
  if (cursor.acceptWord('RESTRICT') !== null) return 'restrict';
  if (cursor.acceptSequence('NO', 'ACTION')) return 'no_action';
  if (cursor.acceptSequence('SET', 'NULL')) {
    cursor.readGroup();
    return 'set_null';
  }
  if (cursor.acceptSequence('SET', 'DEFAULT')) {
    cursor.readGroup();
    return 'set_default';
  }
  return 'none_specified';
}

/** Read the part of a foreign key after `REFERENCES`. */
function readReference(cursor: TokenCursor): ForeignKeyReference | null {
  const target = cursor.readName();
  if (target === null) {
    return null;
  }
  const columns = readColumnList(cursor);
  let onDelete: ReferentialAction = 'none_specified';
  let onUpdate: ReferentialAction = 'none_specified';

  for (;;) {
    if (cursor.acceptWord('MATCH') !== null) {
      cursor.acceptWord('FULL', 'PARTIAL', 'SIMPLE');
    } else if (cursor.acceptSequence('ON', 'DELETE')) {
      onDelete = readAction(cursor);
    } else if (cursor.acceptSequence('ON', 'UPDATE')) {
      onUpdate = readAction(cursor);
    } else {
      break;
    }
  }

  return {
    schema: target.schema ?? 'public',
    table: target.name,
    tableKey: tableKey(target.schema, target.name, target.quoted),
    columns,
    onDelete,
    onUpdate,
  };
}

function isTableConstraintStart(tokens: readonly Token[]): boolean {
  const [first, second] = tokens;
  if (isWord(first, 'CONSTRAINT', 'EXCLUDE')) return true;
  if (isWord(first, 'PRIMARY', 'FOREIGN')) return isWord(second, 'KEY');
  if (isWord(first, 'UNIQUE')) return isPunct(second, '(') || isWord(second, 'NULLS');
  if (isWord(first, 'CHECK')) return isPunct(second, '(');
  return false;
}

/**
 * Parse a table-level constraint. Returns null for constraint kinds that are
 * not modeled (EXCLUDE) or that are too malformed to read.
 */
function parseTableConstraint(tokens: readonly Token[], source: string): ParsedConstraint | null {
  const cursor = new TokenCursor(tokens);
  const offset = tokens[0]?.start ?? 0;
  let name: string | null = null;
  if (cursor.acceptWord('CONSTRAINT') !== null) {
    name = readIdentifier(cursor);
  }

  const base = { name, inline: false, offset };

  if (cursor.acceptSequence('PRIMARY', 'KEY')) {
    return { ...base, kind: 'primary_key', columns: readColumnList(cursor), reference: null, expression: null };
  }
  if (cursor.acceptWord('UNIQUE') !== null) {
    if (!cursor.acceptSequence('NULLS', 'NOT', 'DISTINCT')) cursor.acceptSequence('NULLS', 'DISTINCT');
    return { ...base, kind: 'unique', columns: readColumnList(cursor), reference: null, expression: null };
  }
  if (cursor.acceptWord('CHECK') !== null) {
    const group = cursor.readGroup() ?? [];
    return { ...base, kind: 'check', columns: [], reference: null, expression: sliceText(source, group) };
  }
  if (cursor.acceptSequence('FOREIGN', 'KEY')) {
    const columns = readColumnList(cursor);
    if (cursor.acceptWord('REFERENCES') === null) {
      return null;
    }
    const reference = readReference(cursor);
    if (reference === null) {
      return null;
    }
    return { ...base, kind: 'foreign_key', columns, reference, expression: null };
  }
  return null;
}

/** Parse `name type [column constraints...]`. */
function parseColumnDefinition(
  tokens: readonly Token[],
  source: string,
): { column: ParsedColumn; constraints: ParsedConstraint[] } | null {
  const cursor = new TokenCursor(tokens);
  const nameToken = cursor.next();
  if (!isIdentifier(nameToken)) {
    return null;
  }
  const key = foldIdentifier(nameToken);
  const typeTokens = cursor.readUntil((t) => isWord(t, ...COLUMN_CONSTRAINT_WORDS));

  let nullable = true;
  let defaultExpression: string | null = null;
  let identity = false;
  let pendingName: string | null = null;
  const constraints: ParsedConstraint[] = [];

  const pushConstraint = (
    kind: ConstraintKind,
    offset: number,
    extra: { reference?: ForeignKeyReference | null; expression?: string | null } = {},
  ): void => {
    constraints.push({
      name: pendingName,
      kind,
      columns: [key],
      reference: extra.reference ?? null,
      expression: extra.expression ?? null,
      inline: true,
      offset,
    });
    pendingName = null;
  };

  while (!cursor.atEnd()) {
    const offset = cursor.peek()?.start ?? 0;

    if (cursor.acceptWord('CONSTRAINT') !== null) {
      pendingName = readIdentifier(cursor);
    } else if (cursor.acceptSequence('NOT', 'NULL')) {
      nullable = false;
    } else if (cursor.acceptWord('NULL') !== null) {
      nullable = true;
    } else if (cursor.acceptWord('DEFAULT') !== null) {
      const exprTokens = isWord(cursor.peek(), 'NULL')
        ? [cursor.next()].filter((t): t is Token => t !== undefined)
        : cursor.readUntil((t) => isWord(t, ...COLUMN_CONSTRAINT_WORDS));
      defaultExpression = sliceText(source, exprTokens);
    } else if (cursor.acceptSequence('PRIMARY', 'KEY')) {
      nullable = false;
      pushConstraint('primary_key', offset);
    } else if (cursor.acceptWord('UNIQUE') !== null) {
      if (!cursor.acceptSequence('NULLS', 'NOT', 'DISTINCT')) cursor.acceptSequence('NULLS', 'DISTINCT');
      pushConstraint('unique', offset);
    } else if (cursor.acceptWord('CHECK') !== null) {
      const group = cursor.readGroup() ?? [];
      pushConstraint('check', offset, { expression: sliceText(source, group) });
    } else if (cursor.acceptWord('REFERENCES') !== null) {
      const reference = readReference(cursor);
      if (reference !== null) {
        pushConstraint('foreign_key', offset, { reference });
      }
    } else if (cursor.acceptWord('GENERATED') !== null) {
      if (cursor.acceptWord('ALWAYS') === null) cursor.acceptSequence('BY', 'DEFAULT');
      cursor.acceptWord('AS');
      if (cursor.acceptWord('IDENTITY') !== null) {
        identity = true;
        cursor.readGroup();
      } else {
        defaultExpression = sliceText(source, cursor.readGroup() ?? []);
        cursor.acceptWord('STORED');
      }
    } else if (cursor.acceptWord('COLLATE') !== null) {
      cursor.readName();
    } else {
      cursor.next();
    }
  }

  return {
    column: {
      name: nameToken.value,
      quoted: nameToken.kind === 'quoted',
      type: sliceText(source, typeTokens),
      nullable,
      defaultExpression,
      identity,
      offset: nameToken.start,
    },
    constraints,
  };
}

function parseCreateTable(cursor: TokenCursor, source: string): ParsedStatement {
  cursor.acceptWord('CREATE');
  cursor.acceptSequence('OR', 'REPLACE');
  cursor.acceptWord('GLOBAL', 'LOCAL');
  cursor.acceptWord('TEMP', 'TEMPORARY', 'UNLOGGED');
  cursor.acceptWord('TABLE');
  cursor.acceptSequence('IF', 'NOT', 'EXISTS');

  const table = cursor.readName();
  if (table === null) {
    return { kind: 'unparsed', issue: 'CREATE TABLE without a table name' };
  }
  const body = cursor.readGroup();
  if (body === null) {
    return { kind: 'unparsed', issue: `CREATE TABLE "${table.name}" has no column list` };
  }

  const columns: ParsedColumn[] = [];
  const constraints: ParsedConstraint[] = [];
  for (const element of splitOnCommas(body)) {
    if (element.length === 0 || isWord(element[0], 'LIKE')) {
      continue;
    }
    if (isTableConstraintStart(element)) {
      const constraint = parseTableConstraint(element, source);
      if (constraint !== null) constraints.push(constraint);
      continue;
    }
    const definition = parseColumnDefinition(element, source);
    if (definition !== null) {
      columns.push(definition.column);
      constraints.push(...definition.constraints);
    }
  }

  return { kind: 'create_table', table, columns, constraints };
}

function parseAlterAction(tokens: readonly Token[], source: string): AlterAction | null {
  const cursor = new TokenCursor(tokens);

  if (cursor.acceptSequence('ENABLE', 'ROW', 'LEVEL', 'SECURITY')) return { type: 'set_rls', enabled: true };
  if (cursor.acceptSequence('DISABLE', 'ROW', 'LEVEL', 'SECURITY')) return { type: 'set_rls', enabled: false };
  if (cursor.acceptSequence('FORCE', 'ROW', 'LEVEL', 'SECURITY')) return { type: 'set_force_rls', forced: true };
  if (cursor.acceptSequence('NO', 'FORCE', 'ROW', 'LEVEL', 'SECURITY')) return { type: 'set_force_rls', forced: false };

  if (cursor.acceptWord('ADD') !== null) {
    const remaining = cursor.rest();
    if (isTableConstraintStart(remaining)) {
      const constraint = parseTableConstraint(remaining, source);
      return constraint !== null ? { type: 'add_constraint', constraint } : null;
    }
    const columnCursor = new TokenCursor(remaining);
    columnCursor.acceptWord('COLUMN');
    columnCursor.acceptSequence('IF', 'NOT', 'EXISTS');
    const definition = parseColumnDefinition(columnCursor.rest(), source);
    return definition !== null
      ? { type: 'add_column', column: definition.column, constraints: definition.constraints }
      : null;
  }

  if (cursor.acceptWord('ALTER') !== null) {
    cursor.acceptWord('COLUMN');
    const columnToken = cursor.next();
    if (!isIdentifier(columnToken)) {
      return null;
    }
    const column = foldIdentifier(columnToken);
    if (cursor.acceptSequence('SET', 'NOT', 'NULL')) return { type: 'set_nullable', column, nullable: false };
    if (cursor.acceptSequence('DROP', 'NOT', 'NULL')) return { type: 'set_nullable', column, nullable: true };
    if (cursor.acceptSequence('DROP', 'DEFAULT')) return { type: 'set_default', column, expression: null };
    if (cursor.acceptSequence('SET', 'DEFAULT')) {
      return { type: 'set_default', column, expression: sliceText(source, cursor.rest()) };
    }
  }

  return null;
}

function parseAlterTable(cursor: TokenCursor, source: string): ParsedStatement {
  cursor.acceptSequence('ALTER', 'TABLE');
  cursor.acceptSequence('IF', 'EXISTS');
  cursor.acceptWord('ONLY');
  const table = cursor.readName();
  if (table === null) {
    return { kind: 'unparsed', issue: 'ALTER TABLE without a table name' };
  }
  if (cursor.peek()?.text === '*') {
    cursor.next();
  }

  const actions: AlterAction[] = [];
  for (const part of splitOnCommas(cursor.rest())) {
    const action = parseAlterAction(part, source);
    if (action !== null) {
      actions.push(action);
    }
  }
  return { kind: 'alter_table', table, actions };
}

function parseIndexElement(tokens: readonly Token[], source: string): IndexElement {
  const [first, second] = tokens;
  if (isIdentifier(first) && !isPunct(second, '(') && !isPunct(second, '.')) {
    return { kind: 'column', column: foldIdentifier(first) };
  }
  return { kind: 'expression', expression: sliceText(source, tokens) };
}

function parseCreateIndex(cursor: TokenCursor, source: string): ParsedStatement {
  cursor.acceptWord('CREATE');
  const unique = cursor.acceptWord('UNIQUE') !== null;
  cursor.acceptWord('INDEX');
  cursor.acceptWord('CONCURRENTLY');
  cursor.acceptSequence('IF', 'NOT', 'EXISTS');

  const name = isWord(cursor.peek(), 'ON') ? null : readIdentifier(cursor);
  if (cursor.acceptWord('ON') === null) {
    return { kind: 'unparsed', issue: 'CREATE INDEX without an ON clause' };
  }
  cursor.acceptWord('ONLY');
  const table = cursor.readName();
  if (table === null) {
    return { kind: 'unparsed', issue: 'CREATE INDEX without a target table' };
  }

  let using = 'btree';
  if (cursor.acceptWord('USING') !== null) {
    const method = readIdentifier(cursor);
    if (method !== null) using = method.toLowerCase();
  }

  const group = cursor.readGroup();
  if (group === null) {
    return { kind: 'unparsed', issue: `CREATE INDEX on "${table.name}" has no column list` };
  }
  const elements = splitOnCommas(group)
    .filter((part) => part.length > 0)
    .map((part) => parseIndexElement(part, source));

  let predicate: string | null = null;
  while (!cursor.atEnd()) {
    if (cursor.acceptWord('INCLUDE') !== null || cursor.acceptWord('WITH') !== null) {
      cursor.readGroup();
    } else if (cursor.acceptWord('TABLESPACE') !== null) {
      cursor.next();
    } else if (cursor.acceptWord('WHERE') !== null) {
      predicate = sliceText(source, cursor.rest());
    } else {
      cursor.next();
    }
  }

  return { kind: 'create_index', table, name, unique, using, elements, predicate };
}

const POLICY_COMMANDS: Readonly<Record<string, PolicyCommand>> = {
  ALL: 'all',
  SELECT: 'select',
  INSERT: 'insert',
  UPDATE: 'update',
  DELETE: 'delete',
};

function parseCreatePolicy(cursor: TokenCursor, source: string): ParsedStatement {
  cursor.acceptSequence('CREATE', 'POLICY');
  const name = readIdentifier(cursor);
  if (name === null) {
    return { kind: 'unparsed', issue: 'CREATE POLICY without a policy name' };
  }
  if (cursor.acceptWord('ON') === null) {
    return { kind: 'unparsed', issue: `CREATE POLICY "${name}" without an ON clause` };
  }
  const table = cursor.readName();
  if (table === null) {
    return { kind: 'unparsed', issue: `CREATE POLICY "${name}" without a target table` };
  }

  let command: PolicyCommand = 'all';
  let permissive = true;
  let roles: string[] = [];
  let using: string | null = null;
  let withCheck: string | null = null;

  while (!cursor.atEnd()) {
    if (cursor.acceptWord('AS') !== null) {
      permissive = cursor.acceptWord('PERMISSIVE', 'RESTRICTIVE') !== 'RESTRICTIVE';
    } else if (cursor.acceptWord('FOR') !== null) {
      const word = cursor.acceptWord('ALL', 'SELECT', 'INSERT', 'UPDATE', 'DELETE');
      command = word !== null ? (POLICY_COMMANDS[word] ?? 'all') : 'all';
    } else if (cursor.acceptWord('TO') !== null) {
      const roleTokens = cursor.readUntil((t) => isWord(t, 'USING', 'WITH'));
      roles = splitOnCommas(roleTokens)
        .map((part) => part[0])
        .filter(isIdentifier)
        .map(foldIdentifier);
    } else if (cursor.acceptWord('USING') !== null) {
      using = sliceText(source, cursor.readGroup() ?? []);
    } else if (cursor.acceptSequence('WITH', 'CHECK')) {
      withCheck = sliceText(source, cursor.readGroup() ?? []);
    } else {
      cursor.next();
    }
  }

  return { kind: 'create_policy', table, name, command, permissive, roles, using, withCheck };
}
