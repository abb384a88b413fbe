import { z } from 'zod/v4';
import type { Schema, SourceLocation } from '../ddl/types.js';
import type { RuleCategory, RuleId, Severity } from '../report/reportTypes.js';

/** What a rule check reports; the validator stamps rule id, category and severity. */
export interface RuleFinding {
  readonly message: string;
  readonly location: SourceLocation;
  readonly table: string | null;
  readonly column: string | null;
  readonly fix: string | null;
}

/** A rule check with its parameters already bound. */
export type RuleCheck = (schema: Schema) => readonly RuleFinding[];

export type ConfigureResult =
  | { readonly ok: true; readonly check: RuleCheck }
  | { readonly ok: false; readonly error: string };

/** A compiled-in rule, before configuration. */
export interface RuleDefinition {
  readonly id: RuleId;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly description: string;
  /** Validate override params (merged over the defaults) and bind the check to them. */
  readonly configure: (params: unknown) => ConfigureResult;
}

interface RuleSpec<S extends z.ZodType> {
  readonly id: RuleId;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly description: string;
  readonly params: S;
  readonly check: (schema: Schema, params: z.output<S>) => readonly RuleFinding[];
}

/** Rules without parameters accept only an empty params object. */
export const noParams = z.strictObject({});

/** A string parameter that must compile as a regular expression. */
export function regexParam(defaultPattern: string) {
  return z
    .string()
    .refine((pattern) => {
      try {
        new RegExp(pattern);
        return true;
      } catch {
        return false;
      }
    }, 'must be a valid regular expression')
    .default(defaultPattern);
}

/**
 * Declare a rule. The params schema supplies defaults, so configuring with
 * `{}` yields the built-in behavior.
 */
export function defineRule<S extends z.ZodType>(spec: RuleSpec<S>): RuleDefinition {
  return {
    id: spec.id,
    category: spec.category,
    severity: spec.severity,
    description: spec.description,
    configure(params: unknown): ConfigureResult {
      const result = spec.params.safeParse(params ?? {});
      if (!result.success) {
        return { ok: false, error: z.prettifyError(result.error) };
      }
      const bound = result.data;
      return { ok: true, check: (schema) => spec.check(schema, bound) };
    },
  };
}
