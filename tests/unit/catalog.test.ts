import { describe, it, expect } from 'vitest';
import { BUILTIN_RULES, createCatalog, rulesFor } from '../../src/core/rules/catalog.js';
import { ConfigError } from '../../src/core/config/errors.js';
import { RULE_CATEGORIES } from '../../src/core/report/reportTypes.js';

describe('createCatalog', () => {
  it('enables every built-in rule at its default severity', () => {
    const catalog = createCatalog();
    expect(catalog.entries).toHaveLength(45);
    expect(new Set(catalog.entries.map((e) => e.id)).size).toBe(45);
    for (const entry of catalog.entries) {
      expect(entry.enabled).toBe(true);
      expect(entry.severity).toBe(entry.defaultSeverity);
    }
  });

  it('keeps rules grouped in validator order', () => {
    const categories = createCatalog().entries.map((e) => e.category);
    const firstSeen = [...new Set(categories)];
    expect(firstSeen).toEqual([...RULE_CATEGORIES]);
  });

  it('applies severity and enabled overrides', () => {
    const catalog = createCatalog({
      NAMING_TABLE_NOT_PLURAL: { severity: 'warning' },
      NAMING_INDEX_PREFIX: { enabled: false },
    });
    const plural = catalog.entries.find((e) => e.id === 'NAMING_TABLE_NOT_PLURAL');
    expect(plural?.severity).toBe('warning');
    expect(plural?.defaultSeverity).toBe('info');

    const naming = rulesFor(catalog, 'naming').map((e) => e.id);
    expect(naming).toEqual([
      'NAMING_UPPERCASE_IDENTIFIER',
      'NAMING_CAMEL_CASE',
      'NAMING_TABLE_PREFIX',
      'NAMING_TABLE_NOT_PLURAL',
      'NAMING_CONSTRAINT_UNNAMED',
      'NAMING_CONSTRAINT_PREFIX',
      'NAMING_INDEX_UNNAMED',
      'NAMING_INDEX_UPPERCASE',
    ]);
  });

  it('rejects unknown rule ids', () => {
    expect(() => createCatalog({ NOT_A_RULE: { enabled: false }, ALSO_MISSING: {} })).toThrow(
      new ConfigError('unknown rule id(s): NOT_A_RULE, ALSO_MISSING'),
    );
  });

  it('rejects params that do not compile as a pattern', () => {
    expect(() => createCatalog({ NAMING_INDEX_PREFIX: { params: { index: '(' } } })).toThrow(
      /^invalid params for rule NAMING_INDEX_PREFIX\n[\s\S]*must be a valid regular expression/,
    );
  });

  it('rejects params a rule does not declare', () => {
    expect(() => createCatalog({ RLS_NOT_ENABLED: { params: { schema: ['public'] } } })).toThrow(ConfigError);
    expect(() => createCatalog({ CONSTRAINTS_MISSING_PRIMARY_KEY: { params: { strict: true } } })).toThrow(ConfigError);
  });

  it('rejects params of the wrong type', () => {
    expect(() => createCatalog({ RLS_POLICY_MULTIPLE_SUBSELECTS: { params: { threshold: 0 } } })).toThrow(ConfigError);
  });

  it('names the config file in catalog errors', () => {
    expect(() => createCatalog({ NOT_A_RULE: {} }, BUILTIN_RULES, 'lint.json')).toThrow(
      'lint.json: unknown rule id(s): NOT_A_RULE',
    );
  });

  it('returns a frozen catalog', () => {
    const catalog = createCatalog();
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.entries)).toBe(true);
    expect(Object.isFrozen(catalog.entries[0])).toBe(true);
  });

  it('builds from an explicit rule list', () => {
    const catalog = createCatalog({}, BUILTIN_RULES.filter((rule) => rule.category === 'rls'));
    expect(catalog.entries.map((e) => e.category)).toEqual(Array<string>(11).fill('rls'));
    expect(() => createCatalog({ NAMING_INDEX_PREFIX: {} }, [])).toThrow('unknown rule id(s): NAMING_INDEX_PREFIX');
  });
});
