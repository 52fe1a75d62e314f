import { Command } from "commander"
import { replaceInFiles, toSummaryJson } from "./index"
import { errorMessage } from "./core/errors"
import { setLogging } from "./core/log"
import { loadRules, parseReplacement } from "./core/rules-file"
import type { Rule, RunSummary } from "./core/types"

interface CliOptions {
  ignoreCase?: boolean
  regex?: boolean
  extension: string[]
  ignoreDir: string[]
  ignoreFile: string[]
  ignoreExt: string[]
  rules?: string
  sort: boolean
  dryRun?: boolean
  json?: boolean
  verbose?: boolean
}

const EXAMPLES = `
Examples:
  # Basic replacement
  textswap ./src 'old:new'

  # Multiple replacements
  textswap ./src 'foo:bar' 'old:new'

  # Case-insensitive, only .ts and .md files
  textswap ./src 'hello:hi' -i -e .ts -e .md

  # Regex with capture groups, preview only
  textswap ./src 'v(\\d+)\\.(\\d+):version \\1.\\2' -r --dry-run

  # Rules from a JSON file
  textswap ./docs --rules renames.json --json
`

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/**
 * Human-readable summary lines
 */
export function formatSummary(summary: RunSummary, options: { dryRun?: boolean; verbose?: boolean } = {}): string[] {
  const { dryRun, verbose } = options
  const lines = [
    `${dryRun ? "Would process" : "Processed"} ${summary.filesProcessed} files`,
    `${dryRun ? "Would modify" : "Modified"} ${summary.filesModified} files`,
    `${dryRun ? "Would make" : "Made"} ${summary.totalReplacements} replacements`,
  ]

  if (verbose && summary.modifiedFiles.length > 0) {
    lines.push("", dryRun ? "Files that would be modified:" : "Modified files:")
    for (const file of summary.modifiedFiles) lines.push(`  - ${file}`)
  }

  if (summary.errors.length > 0) {
    lines.push("", "Errors:")
    for (const [file, message] of summary.errors) lines.push(`  - ${file}: ${message}`)
  }

  return lines
}

export function createProgram(): Command {
  const program = new Command()
    .name("textswap")
    .description("Bulk find and replace in files")
    .argument("<directory>", "Root directory to search in")
    .argument("[replacements...]", 'Replacements in format "search:replace"')
    .option("-i, --ignore-case", "Case-insensitive matching")
    .option("-r, --regex", "Treat search patterns as regular expressions")
    .option("-e, --extension <ext>", "Only process files with this extension (repeatable)", collect, [])
    .option("--ignore-dir <name>", "Ignore this directory name, replaces the defaults (repeatable)", collect, [])
    .option("--ignore-file <path>", "Ignore this file (repeatable)", collect, [])
    .option("--ignore-ext <ext>", "Ignore files with this extension (repeatable)", collect, [])
    .option("--rules <file>", "JSON file with additional rules")
    .option("--no-sort", "Apply rules in the given order instead of longest search first")
    .option("--dry-run", "Preview changes without applying them")
    .option("--json", "Output results as JSON")
    .option("-v, --verbose", "Show detailed output")
    .addHelpText("after", EXAMPLES)
    .action((directory: string, replacementArgs: string[], opts: CliOptions) => {
      setLogging(Boolean(opts.verbose))

      try {
        const rules: Rule[] = replacementArgs.map(parseReplacement)
        if (opts.rules) rules.push(...loadRules(opts.rules))
        if (rules.length === 0) {
          throw new Error("No replacements given (pass 'search:replace' arguments or --rules)")
        }

        const summary = replaceInFiles(directory, rules, {
          caseSensitive: !opts.ignoreCase,
          useRegex: Boolean(opts.regex),
          sortByLength: opts.sort,
          dryRun: Boolean(opts.dryRun),
          includeExtensions: opts.extension.length > 0 ? opts.extension : undefined,
          ignoreDirs: opts.ignoreDir.length > 0 ? opts.ignoreDir : undefined,
          ignoreFiles: opts.ignoreFile,
          ignoreExtensions: opts.ignoreExt,
          verbose: opts.verbose,
        })

        if (opts.json) {
          console.log(JSON.stringify(toSummaryJson(summary), null, 2))
        } else {
          console.log(formatSummary(summary, { dryRun: opts.dryRun, verbose: opts.verbose }).join("\n"))
        }
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`)
        if (opts.verbose && err instanceof Error && err.stack) console.error(err.stack)
        process.exitCode = 1
      }
    })

  return program
}
