import { isIdentifier, isPunct, isWord, tokenize } from './lexer.js';
import type { Token } from './lexer.js';
import { foldIdentifier } from './cursor.js';

interface Group {
  readonly open: number;
  readonly parent: Group | null;
  startsWithSelect: boolean;
  hasFrom: boolean;
}

interface GroupMap {
  readonly tokens: readonly Token[];
  /** For each token, the group it sits directly inside (or null at top level). */
  readonly enclosing: readonly (Group | null)[];
  readonly groups: readonly Group[];
}

function mapGroups(expression: string): GroupMap {
  const tokens = tokenize(expression);
  const enclosing: (Group | null)[] = [];
  const groups: Group[] = [];
  const stack: Group[] = [];

  for (const [index, token] of tokens.entries()) {
    const current = stack[stack.length - 1] ?? null;
    if (isPunct(token, ')')) {
      stack.pop();
      enclosing.push(stack[stack.length - 1] ?? null);
      continue;
    }
    enclosing.push(current);
    if (current !== null) {
      if (current.open === index - 1 && isWord(token, 'SELECT')) current.startsWithSelect = true;
      if (isWord(token, 'FROM')) current.hasFrom = true;
    }
    if (isPunct(token, '(')) {
      const group: Group = { open: index, parent: current, startsWithSelect: false, hasFrom: false };
      groups.push(group);
      stack.push(group);
    }
  }

  return { tokens, enclosing, groups };
}

/** The innermost group at or above `group` that opens with SELECT. */
function nearestSelect(group: Group | null): Group | null {
  let current = group;
  while (current !== null && !current.startsWithSelect) {
    current = current.parent;
  }
  return current;
}

function insideTableRead(group: Group | null): boolean {
  for (let current = group; current !== null; current = current.parent) {
    if (current.startsWithSelect && current.hasFrom) return true;
  }
  return false;
}

/** Folded identifiers referenced in an expression, excluding function names. */
export function referencedIdentifiers(expression: string): Set<string> {
  const tokens = tokenize(expression);
  const found = new Set<string>();
  for (const [index, token] of tokens.entries()) {
    if (!isIdentifier(token) || isPunct(tokens[index + 1], '(')) {
      continue;
    }
    found.add(foldIdentifier(token));
  }
  return found;
}

/**
 * Like `referencedIdentifiers`, but leaves out identifiers inside a sub-select
 * that reads another table (`... IN (SELECT team_id FROM members ...)`).
 */
export function outerIdentifiers(expression: string): Set<string> {
  const { tokens, enclosing } = mapGroups(expression);
  const found = new Set<string>();
  for (const [index, token] of tokens.entries()) {
    if (!isIdentifier(token) || isPunct(tokens[index + 1], '(') || insideTableRead(enclosing[index] ?? null)) {
      continue;
    }
    found.add(foldIdentifier(token));
  }
  return found;
}

function matchesCall(tokens: readonly Token[], index: number, parts: readonly string[]): boolean {
  for (const [offset, part] of parts.entries()) {
    const token = tokens[index + offset * 2];
    if (!isIdentifier(token) || foldIdentifier(token) !== part) {
      return false;
    }
    const separator = tokens[index + offset * 2 + 1];
    const expected = offset === parts.length - 1 ? '(' : '.';
    if (!isPunct(separator, expected)) {
      return false;
    }
  }
  return true;
}

/**
 * Calls to any of `functions` that are not inside a scalar sub-select such
 * as `(select auth.uid())` or `(select coalesce(auth.uid(), owner_id))`.
 * Returns the matched function names in order of appearance.
 */
export function findUnwrappedCalls(expression: string, functions: readonly string[]): string[] {
  const { tokens, enclosing } = mapGroups(expression);
  const targets = functions.map((fn) => ({ name: fn, parts: fn.toLowerCase().split('.') }));
  const found: string[] = [];

  for (let index = 0; index < tokens.length; index++) {
    const previous = tokens[index - 1];
    if (isPunct(previous, '.')) {
      continue;
    }
    const target = targets.find((candidate) => matchesCall(tokens, index, candidate.parts));
    if (target === undefined) {
      continue;
    }
    const select = nearestSelect(enclosing[index] ?? null);
    const wrapped = select !== null && !select.hasFrom;
    if (!wrapped) {
      found.push(target.name);
    }
  }
  return found;
}

/** Number of table-reading sub-selects plus explicit joins in an expression. */
export function countSubqueries(expression: string): number {
  const { tokens, groups } = mapGroups(expression);
  const selects = groups.filter((group) => group.startsWithSelect && group.hasFrom).length;
  const joins = tokens.filter((token) => isWord(token, 'JOIN')).length;
  return selects + joins;
}
