import { z } from 'zod/v4';

/**
 * Zod schema for a single rule override.
 * `params` is checked later against the rule's own parameter schema.
 */
export const ruleOverrideSchema = z.strictObject({
  enabled: z.boolean().optional(),
  severity: z.enum(['error', 'warning', 'info']).optional(),
  params: z.record(z.string(), z.unknown()).optional(),
});

/**
 * Zod schema for the suppress array.
 * Format: RULE_ID:table or RULE_ID:table.column (table may be schema-qualified).
 */
export const suppressArraySchema = z.array(
  z.string().regex(/^[A-Z][A-Z0-9_]*:[^\s:]+$/, 'expected RULE_ID:table or RULE_ID:table.column'),
);

/** Zod schema for the full override document. */
export const configFileSchema = z.strictObject({
  rules: z.record(z.string(), ruleOverrideSchema).default({}),
  suppress: suppressArraySchema.default([]),
});

/** Parsed type for a rule override. */
export type RuleOverride = z.infer<typeof ruleOverrideSchema>;

/** Parsed type for the full override document. */
export type LintConfig = z.infer<typeof configFileSchema>;
