import type { RunObserver } from "./types"

// stderr logging, stdout stays free for --json output
let _logEnabled = true
export function setLogging(enabled: boolean): void {
  _logEnabled = enabled
}
export function log(msg: string): void {
  if (_logEnabled) console.error(`[textswap] ${msg}`)
}

/**
 * Observer that reports run progress through the logger
 */
export function createLogObserver(options: { verbose?: boolean } = {}): RunObserver {
  let dryRun = false

  return {
    onRunStart(info) {
      dryRun = info.dryRun
      log(`Processing ${info.fileCount} files with ${info.ruleCount} replacement(s)${dryRun ? " (dry run)" : ""}`)
    },
    onFile(outcome, index, total) {
      if (outcome.error) {
        log(`[${index + 1}/${total}] ${outcome.path}: ${outcome.error}`)
      } else if (options.verbose && outcome.modified) {
        log(`[${index + 1}/${total}] ${outcome.path}: ${outcome.replacementCount} replacement(s)`)
      }
    },
    onRunEnd(summary) {
      log(`${dryRun ? "Would modify" : "Modified"} ${summary.filesModified} file(s)`)
    },
  }
}
