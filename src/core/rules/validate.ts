import { rulesFor } from './catalog.js';
import type { RuleCatalog } from './catalog.js';
import type { Schema } from '../ddl/types.js';
import type { Diagnostic, RuleCategory } from '../report/reportTypes.js';
import { RULE_CATEGORIES } from '../report/reportTypes.js';

/** A validator: one pure pass over the schema for one rule category. */
export type Validator = (schema: Schema, catalog: RuleCatalog) => readonly Diagnostic[];

function validatorFor(category: RuleCategory): Validator {
  return (schema, catalog) =>
    rulesFor(catalog, category).flatMap((entry) =>
      entry.check(schema).map(
        (found): Diagnostic => ({
          rule: entry.id,
          category: entry.category,
          severity: entry.severity,
          message: found.message,
          file: found.location.file,
          line: found.location.line,
          table: found.table,
          column: found.column,
          fix: found.fix,
        }),
      ),
    );
}

export const validateSyntax: Validator = validatorFor('syntax');
export const validateNaming: Validator = validatorFor('naming');
export const validateConstraints: Validator = validatorFor('constraints');
export const validateIndexes: Validator = validatorFor('indexes');
export const validateRls: Validator = validatorFor('rls');

export const VALIDATORS: Readonly<Record<RuleCategory, Validator>> = {
  syntax: validateSyntax,
  naming: validateNaming,
  constraints: validateConstraints,
  indexes: validateIndexes,
  rls: validateRls,
};

/** Run every validator and return one diagnostic list per category, in category order. */
export function runValidators(schema: Schema, catalog: RuleCatalog): (readonly Diagnostic[])[] {
  return RULE_CATEGORIES.map((category) => VALIDATORS[category](schema, catalog));
}
