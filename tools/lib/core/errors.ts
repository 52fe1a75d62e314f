/**
 * Error taxonomy.
 *
 * Fatal (raised before any file is touched):
 *   ValidationError (DuplicateSearchTermError, EmptySearchTermError, RuleFormatError)
 *   PatternCompilationError
 *   DirectoryError
 *
 * Per file (recorded into the run summary, run continues):
 *   FileReadError, FileDecodeError, FileWriteError
 */

export type ErrorCode =
  | "DUPLICATE_SEARCH_TERM"
  | "EMPTY_SEARCH_TERM"
  | "RULE_FORMAT"
  | "PATTERN_COMPILATION"
  | "DIRECTORY"
  | "FILE_READ"
  | "FILE_DECODE"
  | "FILE_WRITE"

export class TextswapError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class ValidationError extends TextswapError {}

export class DuplicateSearchTermError extends ValidationError {
  readonly terms: string[]

  constructor(terms: string[]) {
    const unique = [...new Set(terms)].sort()
    super(
      "DUPLICATE_SEARCH_TERM",
      `Duplicate search term(s): ${unique.map((t) => JSON.stringify(t)).join(", ")}`
    )
    this.terms = unique
  }
}

export class EmptySearchTermError extends ValidationError {
  constructor(index: number) {
    super("EMPTY_SEARCH_TERM", `Empty search term in rule ${index + 1}`)
  }
}

export class RuleFormatError extends ValidationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RULE_FORMAT", message, options)
  }
}

export class PatternCompilationError extends TextswapError {
  readonly pattern: string

  constructor(pattern: string, reason: string, options?: { cause?: unknown }) {
    super("PATTERN_COMPILATION", `Invalid pattern ${JSON.stringify(pattern)}: ${reason}`, options)
    this.pattern = pattern
  }
}

export class DirectoryError extends TextswapError {
  constructor(message: string) {
    super("DIRECTORY", message)
  }
}

export class FileReadError extends TextswapError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("FILE_READ", `Cannot read file: ${reason}`, options)
  }
}

export class FileDecodeError extends TextswapError {
  constructor(reason: string) {
    super("FILE_DECODE", `Not a UTF-8 text file: ${reason}`)
  }
}

export class FileWriteError extends TextswapError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("FILE_WRITE", `Cannot write file: ${reason}`, options)
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
