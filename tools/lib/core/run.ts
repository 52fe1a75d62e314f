import type { RuleSet } from "./ruleset"
import { processFile } from "./transform"
import { SummaryJson, type FileOutcome, type RunObserver, type RunSummary } from "./types"

export function createSummary(): RunSummary {
  return {
    filesProcessed: 0,
    filesModified: 0,
    totalReplacements: 0,
    modifiedFiles: [],
    errors: [],
  }
}

/**
 * Fold one file outcome into a summary
 */
export function recordOutcome(summary: RunSummary, outcome: FileOutcome): void {
  summary.filesProcessed++
  if (outcome.error !== undefined) {
    summary.errors.push([outcome.path, outcome.error])
    return
  }
  if (outcome.modified) {
    summary.filesModified++
    summary.totalReplacements += outcome.replacementCount
    summary.modifiedFiles.push(outcome.path)
  }
}

/**
 * Apply a rule set to every file, in the order given.
 *
 * A failing file is recorded in `errors` and the run moves on; the summary is
 * always returned.
 */
export function runReplacement(
  files: readonly string[],
  ruleSet: RuleSet,
  options: { dryRun?: boolean } = {},
  observer: RunObserver = {}
): RunSummary {
  const dryRun = options.dryRun ?? false
  const summary = createSummary()

  observer.onRunStart?.({ fileCount: files.length, ruleCount: ruleSet.rules.length, dryRun })

  files.forEach((file, index) => {
    const outcome = processFile(file, ruleSet, { dryRun })
    recordOutcome(summary, outcome)
    observer.onFile?.(outcome, index, files.length)
  })

  observer.onRunEnd?.(summary)
  return summary
}

/**
 * Summary in its serialised (snake_case) form
 */
export function toSummaryJson(summary: RunSummary): SummaryJson {
  return SummaryJson.parse({
    files_processed: summary.filesProcessed,
    files_modified: summary.filesModified,
    total_replacements: summary.totalReplacements,
    modified_files: summary.modifiedFiles,
    errors: summary.errors,
  })
}
