import fs from "fs"
import path from "path"
import { createHash } from "crypto"
import { FileDecodeError, FileReadError, FileWriteError, errorMessage } from "./errors"
import { applyPreparedRule } from "./matcher"
import type { RuleSet } from "./ruleset"
import type { FileOutcome, MatchOutcome } from "./types"

// Strict UTF-8; BOM kept in the string so it survives a rewrite
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/**
 * Run every rule of the set, in effective order, over a string
 */
export function transformContent(content: string, ruleSet: RuleSet): MatchOutcome {
  let current = content
  let count = 0
  for (const rule of ruleSet.effective) {
    const outcome = applyPreparedRule(current, rule)
    current = outcome.content
    count += outcome.count
  }
  return { content: current, count }
}

/**
 * Read a file as UTF-8 text.
 * Throws FileReadError when it cannot be read, FileDecodeError when it is not text.
 */
export function readTextFile(filePath: string): string {
  let bytes: Buffer
  try {
    bytes = fs.readFileSync(filePath)
  } catch (err) {
    throw new FileReadError(errorMessage(err), { cause: err })
  }

  if (bytes.includes(0)) {
    throw new FileDecodeError("contains NUL bytes")
  }
  try {
    return decoder.decode(bytes)
  } catch {
    throw new FileDecodeError("invalid UTF-8 sequence")
  }
}

/**
 * Replace a file's content atomically: write a temp file beside the real
 * path, then rename it over that path. A symlink is written through to its
 * target and stays a link. The original file mode is kept.
 * Throws FileWriteError.
 */
export function writeTextFileAtomic(filePath: string, content: string): void {
  let tempPath: string | undefined

  try {
    const target = fs.realpathSync(filePath)
    const suffix = createHash("sha256").update(`${target}:${process.pid}:${Date.now()}`).digest("hex").slice(0, 8)
    tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`)

    const { mode } = fs.statSync(target)
    fs.writeFileSync(tempPath, content, "utf-8")
    fs.chmodSync(tempPath, mode & 0o7777)
    fs.renameSync(tempPath, target)
  } catch (err) {
    if (tempPath && fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true })
    throw new FileWriteError(errorMessage(err), { cause: err })
  }
}

/**
 * Apply a rule set to one file.
 *
 * Never throws for file-level problems: read, decode and write failures come
 * back as an outcome with `error` set (count 0, unmodified). A file is
 * modified only when its final content differs from the original, so a
 * nonzero count that reproduces the same text is reported but not written.
 */
export function processFile(filePath: string, ruleSet: RuleSet, options: { dryRun?: boolean } = {}): FileOutcome {
  let original: string
  try {
    original = readTextFile(filePath)
  } catch (err) {
    return failed(filePath, err)
  }

  const { content, count } = transformContent(original, ruleSet)
  const modified = count > 0 && content !== original

  if (modified && !options.dryRun) {
    try {
      writeTextFileAtomic(filePath, content)
    } catch (err) {
      return failed(filePath, err)
    }
  }

  return { path: filePath, replacementCount: count, modified }
}

function failed(filePath: string, err: unknown): FileOutcome {
  if (!(err instanceof FileReadError || err instanceof FileDecodeError || err instanceof FileWriteError)) {
    throw err
  }
  return { path: filePath, replacementCount: 0, modified: false, error: err.message }
}
