import { PatternCompilationError, errorMessage } from "./errors"
import type { MatchOutcome, Rule } from "./types"

export interface MatchMode {
  caseSensitive: boolean
  useRegex: boolean
}

/**
 * Replacement template piece: literal text or a capture group reference
 * (0 = whole match).
 */
export type TemplatePart = { kind: "text"; value: string } | { kind: "group"; ref: number | string }

/**
 * A rule compiled for one match mode.
 *
 * - substring: case-sensitive literal, plain split/join
 * - literal:   escaped pattern (case-insensitive literal, or empty search)
 * - regex:     user pattern with a parsed replacement template
 */
export type PreparedRule =
  | { kind: "substring"; search: string; replace: string }
  | { kind: "literal"; search: string; replace: string; pattern: RegExp }
  | {
      kind: "regex"
      search: string
      replace: string
      pattern: RegExp
      groupCount: number
      template: TemplatePart[]
    }

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Compile a rule for the given mode. Throws PatternCompilationError for an
 * invalid regex or a replacement referring to a group the pattern lacks.
 */
export function prepareRule(rule: Rule, mode: MatchMode): PreparedRule {
  const { search, replace } = rule
  const flags = mode.caseSensitive ? "g" : "gi"

  if (!mode.useRegex) {
    if (mode.caseSensitive && search !== "") {
      return { kind: "substring", search, replace }
    }
    return { kind: "literal", search, replace, pattern: new RegExp(escapeRegExp(search), flags) }
  }

  let pattern: RegExp
  try {
    pattern = new RegExp(search, flags)
  } catch (err) {
    throw new PatternCompilationError(search, errorMessage(err), { cause: err })
  }

  const groups = describeGroups(pattern)
  const template = parseTemplate(replace)
  for (const part of template) {
    if (part.kind !== "group") continue
    const known = typeof part.ref === "number" ? part.ref <= groups.count : groups.names.includes(part.ref)
    if (!known) {
      throw new PatternCompilationError(
        search,
        `replacement ${JSON.stringify(replace)} refers to unknown group ${part.ref}`
      )
    }
  }

  return { kind: "regex", search, replace, pattern, groupCount: groups.count, template }
}

/**
 * Apply one prepared rule to the whole input
 */
export function applyPreparedRule(input: string, rule: PreparedRule): MatchOutcome {
  switch (rule.kind) {
    case "substring": {
      const parts = input.split(rule.search)
      return { content: parts.join(rule.replace), count: parts.length - 1 }
    }
    case "literal": {
      let count = 0
      // Callback form: the replacement is inserted verbatim, "$&" and friends stay literal
      const content = input.replace(rule.pattern, () => {
        count++
        return rule.replace
      })
      return { content, count }
    }
    case "regex": {
      let count = 0
      const content = input.replace(rule.pattern, (match: string, ...rest: unknown[]) => {
        count++
        const captures = rest.slice(0, rule.groupCount)
        const last = rest[rest.length - 1]
        const named = typeof last === "object" && last !== null ? namedCaptures(last) : {}
        return expandTemplate(rule.template, match, captures, named)
      })
      return { content, count }
    }
  }
}

/**
 * Apply a single rule to a string.
 *
 * Compiles the rule on every call; the engine itself goes through
 * buildRuleSet, which prepares each rule once.
 */
export function applyRule(input: string, rule: Rule, caseSensitive: boolean, useRegex: boolean): MatchOutcome {
  return applyPreparedRule(input, prepareRule(rule, { caseSensitive, useRegex }))
}

/**
 * Parse a replacement template.
 *
 * Supported: \N and \NN group numbers, \g<N> and \g<name>, \\ \n \r \t,
 * and \0 for a NUL character. Any other backslash sequence, and every "$",
 * is literal text.
 */
export function parseTemplate(replace: string): TemplatePart[] {
  const parts: TemplatePart[] = []
  let text = ""

  const flush = () => {
    if (text) parts.push({ kind: "text", value: text })
    text = ""
  }

  let i = 0
  while (i < replace.length) {
    const ch = replace.charAt(i)
    if (ch !== "\\" || i + 1 >= replace.length) {
      text += ch
      i++
      continue
    }

    const rest = replace.slice(i + 1)
    const numbered = /^[1-9]\d?/.exec(rest)
    if (numbered) {
      flush()
      parts.push({ kind: "group", ref: Number(numbered[0]) })
      i += 1 + numbered[0].length
      continue
    }

    const bracketed = /^g<([^>]+)>/.exec(rest)
    if (bracketed?.[1] !== undefined) {
      const ref = bracketed[1]
      flush()
      parts.push({ kind: "group", ref: /^\d+$/.test(ref) ? Number(ref) : ref })
      i += 1 + bracketed[0].length
      continue
    }

    const next = rest.charAt(0)
    switch (next) {
      case "\\":
        text += "\\"
        break
      case "n":
        text += "\n"
        break
      case "r":
        text += "\r"
        break
      case "t":
        text += "\t"
        break
      case "0":
        text += "\0"
        break
      default:
        text += ch + next
    }
    i += 2
  }

  flush()
  return parts
}

function expandTemplate(
  template: TemplatePart[],
  match: string,
  captures: unknown[],
  named: Record<string, string>
): string {
  let out = ""
  for (const part of template) {
    if (part.kind === "text") {
      out += part.value
    } else if (typeof part.ref === "number") {
      if (part.ref === 0) {
        out += match
      } else {
        const value = captures[part.ref - 1]
        // Non-participating groups expand to ""
        if (typeof value === "string") out += value
      }
    } else {
      out += named[part.ref] ?? ""
    }
  }
  return out
}

function namedCaptures(groups: object): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [name, value] of Object.entries(groups)) {
    if (typeof value === "string") out[name] = value
  }
  return out
}

/**
 * Count and names of the capture groups a pattern defines.
 * An added empty alternative guarantees a match against "".
 */
function describeGroups(pattern: RegExp): { count: number; names: string[] } {
  const probe = new RegExp(`${pattern.source}|`, pattern.flags).exec("")
  if (!probe) return { count: 0, names: [] }
  return { count: probe.length - 1, names: Object.keys(probe.groups ?? {}) }
}
