import { SYNTAX_RULES } from './syntax.js';
import { NAMING_RULES } from './naming.js';
import { CONSTRAINT_RULES } from './constraints.js';
import { INDEX_RULES } from './indexes.js';
import { RLS_RULES } from './rls.js';
import type { RuleCheck, RuleDefinition } from './types.js';
import { ConfigError } from '../config/errors.js';
import type { RuleOverride } from '../config/schema.js';
import type { RuleCategory, RuleId, Severity } from '../report/reportTypes.js';

/** Every compiled-in rule, in validator order. */
export const BUILTIN_RULES: readonly RuleDefinition[] = [
  ...SYNTAX_RULES,
  ...NAMING_RULES,
  ...CONSTRAINT_RULES,
  ...INDEX_RULES,
  ...RLS_RULES,
];

/** A rule after overrides have been applied. */
export interface CatalogEntry {
  readonly id: RuleId;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly defaultSeverity: Severity;
  readonly enabled: boolean;
  readonly description: string;
  readonly check: RuleCheck;
}

/** The effective, immutable rule set for one run. */
export interface RuleCatalog {
  readonly entries: readonly CatalogEntry[];
}

/**
 * Build the effective catalog: compiled-in defaults patched by `overrides`.
 * Throws ConfigError for unknown rule ids or params a rule rejects, naming
 * `source` (the config file the overrides came from) when given.
 */
export function createCatalog(
  overrides: Readonly<Record<string, RuleOverride>> = {},
  rules: readonly RuleDefinition[] = BUILTIN_RULES,
  source: string | null = null,
): RuleCatalog {
  const known = new Set<string>(rules.map((rule) => rule.id));
  const unknown = Object.keys(overrides).filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new ConfigError(`unknown rule id(s): ${unknown.join(', ')}`, source);
  }

  const entries = rules.map((rule): CatalogEntry => {
    const override = overrides[rule.id];
    const configured = rule.configure(override?.params ?? {});
    if (!configured.ok) {
      throw new ConfigError(`invalid params for rule ${rule.id}\n${configured.error}`, source);
    }
    return Object.freeze({
      id: rule.id,
      category: rule.category,
      severity: override?.severity ?? rule.severity,
      defaultSeverity: rule.severity,
      enabled: override?.enabled ?? true,
      description: rule.description,
      check: configured.check,
    });
  });

  return Object.freeze({ entries: Object.freeze(entries) });
}

/** Enabled entries of one category, in catalog order. */
export function rulesFor(catalog: RuleCatalog, category: RuleCategory): readonly CatalogEntry[] {
  return catalog.entries.filter((entry) => entry.enabled && entry.category === category);
}
