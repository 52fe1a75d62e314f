import { z } from "zod"

// A single (search, replace) pair
export const Rule = z.object({
  search: z.string(),
  replace: z.string(),
})
export type Rule = z.infer<typeof Rule>

export const RuleList = z.array(Rule)
export type RuleList = z.infer<typeof RuleList>

// Run configuration consumed by the engine
export const RunOptions = z.object({
  caseSensitive: z.boolean().default(true),
  useRegex: z.boolean().default(false),
  sortByLength: z.boolean().default(true), // longest search first
  dryRun: z.boolean().default(false),
})
export type RunOptions = z.infer<typeof RunOptions>
export type RunOptionsInput = z.input<typeof RunOptions>

export const DEFAULT_IGNORE_DIRS = [
  ".git",
  ".svn",
  ".hg",
  "__pycache__",
  ".pytest_cache",
  "node_modules",
  ".venv",
  "venv",
  "build",
  "dist",
  ".eggs",
] as const

// File selection policy
export const SelectionOptions = z.object({
  root: z.string().min(1),
  ignoreDirs: z.array(z.string()).default([...DEFAULT_IGNORE_DIRS]),
  ignoreFiles: z.array(z.string()).default([]),
  ignoreExtensions: z.array(z.string()).default([]),
  includeExtensions: z.array(z.string()).optional(), // allow-list when present
})
export type SelectionOptions = z.infer<typeof SelectionOptions>
export type SelectionOptionsInput = z.input<typeof SelectionOptions>

export interface MatchOutcome {
  content: string
  count: number
}

// Per-file result
export const FileOutcome = z.object({
  path: z.string(),
  replacementCount: z.number().int().nonnegative(),
  modified: z.boolean(),
  error: z.string().optional(), // set => count 0, unmodified
})
export type FileOutcome = z.infer<typeof FileOutcome>

export interface RunSummary {
  filesProcessed: number
  filesModified: number
  totalReplacements: number
  modifiedFiles: string[]
  errors: Array<[path: string, message: string]>
}

// Serialised summary (CLI --json)
export const SummaryJson = z.object({
  files_processed: z.number(),
  files_modified: z.number(),
  total_replacements: z.number(),
  modified_files: z.array(z.string()),
  errors: z.array(z.tuple([z.string(), z.string()])),
})
export type SummaryJson = z.infer<typeof SummaryJson>

// Run lifecycle events, all optional
export interface RunObserver {
  onRunStart?(info: { fileCount: number; ruleCount: number; dryRun: boolean }): void
  onFile?(outcome: FileOutcome, index: number, total: number): void
  onRunEnd?(summary: RunSummary): void
}
