import { readFileSync, existsSync } from "fs"
import { z } from "zod"
import { RuleFormatError, errorMessage } from "./errors"
import { Rule, RuleList } from "./types"

// Either [{ search, replace }, ...] or { search: replace, ... }
const RulesFile = z.union([RuleList, z.record(z.string(), z.string())])

/**
 * Parse a "search:replace" argument (split on the first colon)
 */
export function parseReplacement(arg: string): Rule {
  const index = arg.indexOf(":")
  if (index === -1) {
    throw new RuleFormatError(`Invalid replacement format: ${arg}. Expected 'search:replace'`)
  }
  return { search: arg.slice(0, index), replace: arg.slice(index + 1) }
}

/**
 * Parse rules from JSON text
 */
export function parseRules(json: string, source = "rules"): Rule[] {
  let data: unknown
  try {
    data = JSON.parse(json)
  } catch (err) {
    throw new RuleFormatError(`${source}: invalid JSON (${errorMessage(err)})`, { cause: err })
  }

  const result = RulesFile.safeParse(data)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
    throw new RuleFormatError(`${source}: expected a list of {search, replace} objects or a search -> replace map${where}`)
  }

  const parsed = result.data
  if (Array.isArray(parsed)) return parsed
  return Object.entries(parsed).map(([search, replace]) => ({ search, replace }))
}

/**
 * Load rules from a JSON file
 */
export function loadRules(inputPath: string): Rule[] {
  if (!existsSync(inputPath)) {
    throw new RuleFormatError(`Rules file not found: ${inputPath}`)
  }
  return parseRules(readFileSync(inputPath, "utf-8"), inputPath)
}
