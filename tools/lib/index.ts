import { createLogObserver } from "./core/log"
import { buildRuleSet } from "./core/ruleset"
import { runReplacement } from "./core/run"
import { selectFiles } from "./core/select"
import {
  RunOptions,
  SelectionOptions,
  type Rule,
  type RunObserver,
  type RunOptionsInput,
  type RunSummary,
  type SelectionOptionsInput,
} from "./core/types"

export * from "./core/errors"
export * from "./core/types"
export { applyRule, applyPreparedRule, prepareRule, parseTemplate, escapeRegExp } from "./core/matcher"
export type { MatchMode, PreparedRule, TemplatePart } from "./core/matcher"
export { buildRuleSet, orderRules, findDuplicateSearchTerms } from "./core/ruleset"
export type { RuleSet, RuleSetOptions } from "./core/ruleset"
export { processFile, transformContent, readTextFile, writeTextFileAtomic } from "./core/transform"
export { runReplacement, createSummary, recordOutcome, toSummaryJson } from "./core/run"
export { selectFiles, selectOtherFiles, createFileFilter, normalizeExtension } from "./core/select"
export { parseReplacement, parseRules, loadRules } from "./core/rules-file"
export { setLogging, log, createLogObserver } from "./core/log"

export type ReplaceInFilesOptions = RunOptionsInput &
  Omit<SelectionOptionsInput, "root"> & {
    verbose?: boolean
    observer?: RunObserver
  }

/**
 * Search and replace across every selected file under a directory.
 *
 * Rules are validated and compiled before the tree is walked, so a bad rule
 * set fails without touching any file.
 *
 * @example
 * ```ts
 * const summary = replaceInFiles("./docs", [{ search: "widget", replace: "gadget" }], {
 *   includeExtensions: [".md"],
 *   dryRun: true,
 * })
 * ```
 */
export function replaceInFiles(directory: string, rules: readonly Rule[], options: ReplaceInFilesOptions = {}): RunSummary {
  const { verbose, observer, ...rest } = options
  const runOptions = RunOptions.parse(rest)
  const selection = SelectionOptions.parse({ ...rest, root: directory })

  const ruleSet = buildRuleSet(rules, runOptions)
  const files = selectFiles(selection)

  return runReplacement(files, ruleSet, { dryRun: runOptions.dryRun }, observer ?? createLogObserver({ verbose }))
}
