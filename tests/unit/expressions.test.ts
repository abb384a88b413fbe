import { describe, it, expect } from 'vitest';
import {
  countSubqueries,
  findUnwrappedCalls,
  outerIdentifiers,
  referencedIdentifiers,
} from '../../src/core/ddl/expressions.js';

describe('referencedIdentifiers', () => {
  it('collects folded identifiers and skips function names', () => {
    expect([...referencedIdentifiers('lower(Email) = "Handle" AND price > 0')]).toEqual(['email', 'Handle', 'and', 'price']);
  });
});

describe('outerIdentifiers', () => {
  it('leaves out identifiers of sub-selects that read another table', () => {
    expect([...outerIdentifiers('team_id IN (SELECT team_id FROM members WHERE user_id = (select auth.uid()))')]).toEqual(['team_id']);
  });

  it('keeps identifiers of scalar sub-selects and plain groups', () => {
    expect([...outerIdentifiers('(owner_id = (select auth.uid())) OR is_public')]).toEqual(['owner_id', 'select', 'auth', 'or', 'is_public']);
  });
});

describe('findUnwrappedCalls', () => {
  const functions = ['auth.uid', 'current_setting'];

  it('ignores calls that are the target of a scalar sub-select', () => {
    expect(findUnwrappedCalls('(select auth.uid()) = owner_id', functions)).toEqual([]);
  });

  it('ignores calls nested inside a scalar sub-select', () => {
    expect(findUnwrappedCalls('(select coalesce(auth.uid(), owner_id)) = owner_id', functions)).toEqual([]);
  });

  it('reports calls nested inside a sub-select that reads a table', () => {
    expect(findUnwrappedCalls('EXISTS (SELECT 1 FROM members WHERE (user_id = auth.uid()))', functions)).toEqual(['auth.uid']);
  });

  it('reports bare calls in order', () => {
    expect(findUnwrappedCalls("auth.uid() = owner_id OR current_setting('app.role') = 'admin'", functions)).toEqual([
      'auth.uid',
      'current_setting',
    ]);
  });

  it('reports calls inside a sub-select that reads a table', () => {
    expect(findUnwrappedCalls('team_id IN (SELECT team_id FROM members WHERE user_id = auth.uid())', functions)).toEqual([
      'auth.uid',
    ]);
  });

  it('does not match a longer qualified name', () => {
    expect(findUnwrappedCalls('x.auth.uid() = owner_id', functions)).toEqual([]);
  });
});

describe('countSubqueries', () => {
  it('counts table-reading sub-selects and joins', () => {
    expect(countSubqueries('a IN (SELECT id FROM t) AND b IN (SELECT x.id FROM x JOIN y ON y.id = x.id)')).toBe(3);
  });

  it('does not count scalar sub-selects', () => {
    expect(countSubqueries('(select auth.uid()) = owner_id')).toBe(0);
  });
});
