import {z} from 'zod'

import {
  HttpMethodSchema,
  RuleSchema,
  type RegistryReasonCode,
  type Rule,
  type RuleInput,
  type RuleMatchResult
} from './contracts'

type CompiledRule = {
  rule: Rule
  regex: RegExp
}

export type RuleRegistry = {
  readonly rules: readonly Rule[]
  match: (input: {sub_path: string; method: string}) => RuleMatchResult
}

export type RuleRegistryResult =
  | {ok: true; registry: RuleRegistry}
  | {ok: false; reason_code: RegistryReasonCode; message: string}

export const compilePathPattern = (pattern: string): RegExp | null => {
  try {
    // eslint-disable-next-line security/detect-non-literal-regexp -- patterns come from the gateway definition loaded at startup
    return new RegExp(`^(?:${pattern})`, 'u')
  } catch {
    return null
  }
}

const formatIssues = (error: z.ZodError) =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')

/**
 * Builds an immutable registry from rule definitions.
 *
 * Matching picks the method-compatible rule whose pattern covers the longest
 * non-empty prefix of the sub-path. When two rules match the same number of
 * characters the one registered first wins; reorder the definitions to change it.
 */
export const createRuleRegistry = (rawRules: readonly RuleInput[]): RuleRegistryResult => {
  const compiledRules: CompiledRule[] = []
  const seenRuleIds = new Set<string>()

  for (const [index, rawRule] of rawRules.entries()) {
    const parsedRule = RuleSchema.safeParse(rawRule)
    if (!parsedRule.success) {
      return {
        ok: false,
        reason_code: 'invalid_rule',
        message: `Rule at index ${index} is invalid: ${formatIssues(parsedRule.error)}`
      }
    }

    const rule = parsedRule.data
    if (seenRuleIds.has(rule.rule_id)) {
      return {ok: false, reason_code: 'duplicate_rule_id', message: `Duplicate rule_id: ${rule.rule_id}`}
    }
    seenRuleIds.add(rule.rule_id)

    const regex = compilePathPattern(rule.path_pattern)
    if (!regex) {
      return {
        ok: false,
        reason_code: 'invalid_path_pattern',
        message: `Rule ${rule.rule_id} has an invalid path_pattern: ${rule.path_pattern}`
      }
    }

    compiledRules.push({rule: Object.freeze(rule), regex})
  }

  const rules = Object.freeze(compiledRules.map(compiled => compiled.rule))

  const match = ({sub_path, method}: {sub_path: string; method: string}): RuleMatchResult => {
    const parsedMethod = HttpMethodSchema.safeParse(method)
    if (!parsedMethod.success) {
      return {matched: false, reason_code: 'no_matching_rule'}
    }

    let best: {rule: Rule; length: number} | null = null
    for (const compiled of compiledRules) {
      if (compiled.rule.method !== '*' && compiled.rule.method !== parsedMethod.data) {
        continue
      }

      const found = compiled.regex.exec(sub_path)
      const length = found?.[0]?.length ?? 0
      if (length === 0) {
        continue
      }

      // strictly greater keeps the earlier rule on ties
      if (!best || length > best.length) {
        best = {rule: compiled.rule, length}
      }
    }

    if (!best) {
      return {matched: false, reason_code: 'no_matching_rule'}
    }

    return {matched: true, rule: best.rule, matched_length: best.length}
  }

  return {ok: true, registry: {rules, match}}
}
