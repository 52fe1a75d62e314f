import { DuplicateSearchTermError, EmptySearchTermError } from "./errors"
import { prepareRule, type PreparedRule } from "./matcher"
import { RunOptions, type Rule, type RunOptionsInput } from "./types"

export type RuleSetOptions = Pick<RunOptionsInput, "caseSensitive" | "useRegex" | "sortByLength">

/**
 * Validated, ordered rules plus their match mode. Frozen once built; the
 * effective order and compiled patterns are reused for every file in a run.
 */
export interface RuleSet {
  readonly rules: readonly Rule[] // input order
  readonly effective: readonly PreparedRule[] // application order
  readonly caseSensitive: boolean
  readonly useRegex: boolean
  readonly sortByLength: boolean
}

/**
 * Search terms that occur more than once, sorted and de-duplicated
 */
export function findDuplicateSearchTerms(rules: readonly Rule[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const { search } of rules) {
    if (seen.has(search)) duplicates.add(search)
    seen.add(search)
  }
  return [...duplicates].sort()
}

/**
 * Effective order: stable sort by search length (in characters), longest first
 */
export function orderRules(rules: readonly Rule[], sortByLength: boolean): Rule[] {
  if (!sortByLength) return [...rules]
  return rules
    .map((rule) => ({ rule, length: [...rule.search].length }))
    .sort((a, b) => b.length - a.length)
    .map(({ rule }) => rule)
}

/**
 * Validate, order and compile a rule collection.
 *
 * Throws before anything is applied:
 *   EmptySearchTermError     - a rule with search ""
 *   DuplicateSearchTermError - a search term repeated, whatever its replacements
 *   PatternCompilationError  - regex mode, bad pattern or group reference
 */
export function buildRuleSet(rules: readonly Rule[], options: RuleSetOptions = {}): RuleSet {
  const { caseSensitive, useRegex, sortByLength } = RunOptions.parse(options)

  const emptyIndex = rules.findIndex((r) => r.search === "")
  if (emptyIndex !== -1) {
    throw new EmptySearchTermError(emptyIndex)
  }

  const duplicates = findDuplicateSearchTerms(rules)
  if (duplicates.length > 0) {
    throw new DuplicateSearchTermError(duplicates)
  }

  const frozen = rules.map((r) => Object.freeze({ search: r.search, replace: r.replace }))
  const effective = orderRules(frozen, sortByLength).map((rule) =>
    Object.freeze(prepareRule(rule, { caseSensitive, useRegex }))
  )

  return Object.freeze({
    rules: Object.freeze(frozen),
    effective: Object.freeze(effective),
    caseSensitive,
    useRegex,
    sortByLength,
  })
}
