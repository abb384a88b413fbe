import { z } from 'zod/v4';
import { defineRule, noParams } from './types.js';
import type { RuleDefinition, RuleFinding } from './types.js';
import { definedTables, displayName, finding, placeholderTables } from './helpers.js';
import { countSubqueries, findUnwrappedCalls, referencedIdentifiers } from '../ddl/expressions.js';
import type { Policy, PolicyCommand, Table } from '../ddl/types.js';

function allPolicies(tables: readonly Table[]): { table: Table; policy: Policy }[] {
  return tables.flatMap((table) => table.policies.map((policy) => ({ table, policy })));
}

function policyExpressions(policy: Policy): string[] {
  return [policy.using, policy.withCheck].filter((e): e is string => e !== null);
}

const notEnabled = defineRule({
  id: 'RLS_NOT_ENABLED',
  category: 'rls',
  severity: 'error',
  description: 'Table in an exposed schema does not enable row level security.',
  params: z.strictObject({
    schemas: z.array(z.string().min(1)).default(['public']),
  }),
  check: (schema, params) =>
    definedTables(schema)
      .filter((table) => params.schemas.includes(table.schema) && !table.rlsEnabled)
      .map((table) =>
        finding(table, table.location, `Row level security is not enabled on "${displayName(table)}".`, {
          fix: `ALTER TABLE ${displayName(table)} ENABLE ROW LEVEL SECURITY;`,
        }),
      ),
});

const enabledNoPolicies = defineRule({
  id: 'RLS_ENABLED_NO_POLICIES',
  category: 'rls',
  severity: 'error',
  description: 'Row level security is enabled but no policy grants access.',
  params: noParams,
  check: (schema) =>
    definedTables(schema)
      .filter((table) => table.rlsEnabled && table.policies.length === 0)
      .map((table) =>
        finding(table, table.location, `Row level security is enabled on "${displayName(table)}" but it has no policies, so no rows are accessible.`, {
          fix: `Add a policy: CREATE POLICY ... ON ${displayName(table)} FOR SELECT TO authenticated USING (...);`,
        }),
      ),
});

const noSelectPolicy = defineRule({
  id: 'RLS_NO_SELECT_POLICY',
  category: 'rls',
  severity: 'info',
  description: 'Table has policies but none covers SELECT.',
  params: noParams,
  check: (schema) =>
    definedTables(schema)
      .filter((table) => table.rlsEnabled && table.policies.length > 0)
      .filter((table) => !table.policies.some((p) => p.command === 'select' || p.command === 'all'))
      .map((table) =>
        finding(table, table.location, `No policy on "${displayName(table)}" allows SELECT.`, {
          fix: 'Add a FOR SELECT policy if rows should be readable.',
        }),
      ),
});

const missingCommandPolicy = defineRule({
  id: 'RLS_MISSING_COMMAND_POLICY',
  category: 'rls',
  severity: 'info',
  description: 'Table has policies but none covers some of INSERT, UPDATE or DELETE.',
  params: z.strictObject({
    commands: z.array(z.enum(['insert', 'update', 'delete'])).default(['insert', 'update', 'delete']),
  }),
  check: (schema, params) => {
    const findings: RuleFinding[] = [];
    for (const table of definedTables(schema)) {
      if (!table.rlsEnabled || table.policies.length === 0) continue;
      const covered = new Set<PolicyCommand>(table.policies.map((p) => p.command));
      if (covered.has('all')) continue;
      const missing = params.commands.filter((command) => !covered.has(command));
      if (missing.length === 0) continue;
      const list = missing.map((command) => command.toUpperCase()).join(', ');
      findings.push(
        finding(table, table.location, `No policy on "${displayName(table)}" allows ${list}.`, {
          fix: `Add a policy for ${list} if clients write rows through the API.`,
        }),
      );
    }
    return findings;
  },
});

const policyNoRoles = defineRule({
  id: 'RLS_POLICY_NO_ROLES',
  category: 'rls',
  severity: 'warning',
  description: 'Policy has no TO clause and so applies to PUBLIC.',
  params: noParams,
  check: (schema) =>
    allPolicies(schema.tables)
      .filter(({ policy }) => policy.roles.length === 0)
      .map(({ table, policy }) =>
        finding(table, policy.location, `Policy "${policy.name}" on "${displayName(table)}" has no TO clause and defaults to PUBLIC; confirm this is intended.`, {
          fix: 'Add an explicit role list, e.g. TO authenticated.',
        }),
      ),
});

const policyToPublic = defineRule({
  id: 'RLS_POLICY_TO_PUBLIC',
  category: 'rls',
  severity: 'warning',
  description: 'Policy is granted explicitly to PUBLIC.',
  params: noParams,
  check: (schema) =>
    allPolicies(schema.tables)
      .filter(({ policy }) => policy.roles.includes('public'))
      .map(({ table, policy }) =>
        finding(table, policy.location, `Policy "${policy.name}" on "${displayName(table)}" applies to PUBLIC.`, {
          fix: 'Restrict the policy to the roles that need it, e.g. TO authenticated.',
        }),
      ),
});

const missingWithCheck = defineRule({
  id: 'RLS_POLICY_MISSING_WITH_CHECK',
  category: 'rls',
  severity: 'warning',
  description: 'INSERT or UPDATE policy has no WITH CHECK expression.',
  params: noParams,
  check: (schema) =>
    allPolicies(schema.tables)
      .filter(({ policy }) => (policy.command === 'insert' || policy.command === 'update') && policy.withCheck === null)
      .map(({ table, policy }) =>
        finding(table, policy.location, `${policy.command.toUpperCase()} policy "${policy.name}" on "${displayName(table)}" has no WITH CHECK expression.`, {
          fix: 'Add WITH CHECK (...) so written rows are validated.',
        }),
      ),
});

const policyCurrentUser = defineRule({
  id: 'RLS_POLICY_CURRENT_USER',
  category: 'rls',
  severity: 'warning',
  description: 'Policy compares against the database role (current_user) instead of the authenticated user.',
  params: z.strictObject({
    keywords: z.array(z.string().min(1)).default(['current_user', 'session_user']),
  }),
  check: (schema, params) => {
    const keywords = params.keywords.map((k) => k.toLowerCase());
    const findings: RuleFinding[] = [];
    for (const { table, policy } of allPolicies(schema.tables)) {
      const referenced = new Set(policyExpressions(policy).flatMap((e) => [...referencedIdentifiers(e)]));
      for (const keyword of keywords) {
        if (!referenced.has(keyword)) continue;
        findings.push(
          finding(table, policy.location, `Policy "${policy.name}" on "${displayName(table)}" uses ${keyword}, which names the database role rather than the signed-in user.`, {
            fix: 'Compare against (select auth.uid()) instead.',
          }),
        );
      }
    }
    return findings;
  },
});

const unwrappedAuthFunction = defineRule({
  id: 'RLS_UNWRAPPED_AUTH_FUNCTION',
  category: 'rls',
  severity: 'info',
  description: 'Policy calls a per-row security function outside a scalar sub-select.',
  params: z.strictObject({
    functions: z.array(z.string().min(1)).default(['auth.uid', 'auth.jwt', 'auth.role', 'current_setting']),
  }),
  check: (schema, params) => {
    const findings: RuleFinding[] = [];
    for (const { table, policy } of allPolicies(schema.tables)) {
      const calls = new Set(policyExpressions(policy).flatMap((e) => findUnwrappedCalls(e, params.functions)));
      for (const call of calls) {
        findings.push(
          finding(table, policy.location, `Policy "${policy.name}" on "${displayName(table)}" calls ${call}() once per row.`, {
            fix: `Wrap the call in a sub-select: (select ${call}()).`,
          }),
        );
      }
    }
    return findings;
  },
});

const multipleSubselects = defineRule({
  id: 'RLS_POLICY_MULTIPLE_SUBSELECTS',
  category: 'rls',
  severity: 'warning',
  description: 'Policy expression joins through several sub-selects.',
  params: z.strictObject({
    threshold: z.number().int().min(1).default(2),
  }),
  check: (schema, params) => {
    const findings: RuleFinding[] = [];
    for (const { table, policy } of allPolicies(schema.tables)) {
      const count = Math.max(0, ...policyExpressions(policy).map(countSubqueries));
      if (count < params.threshold) continue;
      findings.push(
        finding(table, policy.location, `Policy "${policy.name}" on "${displayName(table)}" uses ${count} sub-selects or joins.`, {
          fix: 'Denormalize the ownership column onto the table or move the lookup into a SECURITY DEFINER function.',
        }),
      );
    }
    return findings;
  },
});

const unknownTable = defineRule({
  id: 'RLS_UNKNOWN_TABLE',
  category: 'rls',
  severity: 'warning',
  description: 'Policy or RLS setting targets a table that is never created.',
  params: noParams,
  check: (schema) =>
    placeholderTables(schema)
      .filter((table) => table.policies.length > 0 || table.rlsEnabled || table.rlsForced)
      .map((table) => {
        const location = table.policies[0]?.location ?? table.location;
        return finding(table, location, `Row level security is configured for "${displayName(table)}", which is never created.`, {
          fix: `Add a CREATE TABLE statement for "${displayName(table)}" or correct the table name.`,
        });
      }),
});

export const RLS_RULES: readonly RuleDefinition[] = [
  notEnabled,
  enabledNoPolicies,
  noSelectPolicy,
  missingCommandPolicy,
  policyNoRoles,
  policyToPublic,
  missingWithCheck,
  policyCurrentUser,
  unwrappedAuthFunction,
  multipleSubselects,
  unknownTable,
];
