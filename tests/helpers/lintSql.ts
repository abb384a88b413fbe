import { extractSchema } from '../../src/core/ddl/extract.js';
import { createCatalog } from '../../src/core/rules/catalog.js';
import type { Validator } from '../../src/core/rules/validate.js';
import type { RuleOverride } from '../../src/core/config/schema.js';
import type { Diagnostic, RuleId } from '../../src/core/report/reportTypes.js';

/** Extract `sql` as schema.sql and run one validator over it. */
export function runValidator(
  validator: Validator,
  sql: string,
  overrides: Readonly<Record<string, RuleOverride>> = {},
): readonly Diagnostic[] {
  const { schema } = extractSchema([{ file: 'schema.sql', text: sql }]);
  return validator(schema, createCatalog(overrides));
}

export function ofRule(diagnostics: readonly Diagnostic[], rule: RuleId): Diagnostic[] {
  return diagnostics.filter((d) => d.rule === rule);
}
