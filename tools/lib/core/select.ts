/**
 * select.ts - Candidate file discovery
 *
 * Files come back in top-down order: a directory's files (sorted by name)
 * before its subdirectories (sorted by name). Excluded directory names are
 * pruned by the glob, so nothing under them is read; symlinked directories
 * are not followed.
 */

import fs from "fs"
import path from "path"
import fg from "fast-glob"
import { DirectoryError } from "./errors"
import { SelectionOptions, type SelectionOptionsInput } from "./types"

/**
 * ".py" and "py" both mean ".py"
 */
export function normalizeExtension(ext: string): string {
  return ext.startsWith(".") ? ext : `.${ext}`
}

/**
 * Build a predicate deciding whether a file passes the name/extension filters
 */
export function createFileFilter(options: SelectionOptions): (file: string) => boolean {
  const ignoreFiles = new Set(options.ignoreFiles.map((f) => path.resolve(f)))
  const ignoreExtensions = new Set(options.ignoreExtensions.map(normalizeExtension))
  const includeExtensions = options.includeExtensions ? new Set(options.includeExtensions.map(normalizeExtension)) : null

  return (file) => {
    if (ignoreFiles.has(path.resolve(file))) return false
    const ext = path.extname(file)
    if (ignoreExtensions.has(ext)) return false
    if (includeExtensions && !includeExtensions.has(ext)) return false
    return true
  }
}

/**
 * Glob patterns that prune the given directory names at any depth
 */
export function ignorePatterns(ignoreDirs: readonly string[]): string[] {
  return ignoreDirs.map((dir) => `**/${fg.escapePath(dir)}/**`)
}

/**
 * Files to process, as absolute paths in traversal order
 */
export function selectFiles(input: SelectionOptionsInput): string[] {
  const options = SelectionOptions.parse(input)
  const root = resolveRoot(options.root)
  const accept = createFileFilter(options)
  return findFiles(root, options.ignoreDirs)
    .map((relative) => path.join(root, relative))
    .filter(accept)
}

/**
 * Files the selection leaves out, including those under ignored directories
 */
export function selectOtherFiles(input: SelectionOptionsInput): string[] {
  const options = SelectionOptions.parse(input)
  const root = resolveRoot(options.root)
  const accept = createFileFilter(options)
  const ignoreDirs = new Set(options.ignoreDirs)

  return findFiles(root, [])
    .filter((relative) => {
      const dirs = relative.split("/").slice(0, -1)
      return dirs.some((dir) => ignoreDirs.has(dir)) || !accept(path.join(root, relative))
    })
    .map((relative) => path.join(root, relative))
}

function resolveRoot(root: string): string {
  const resolved = path.resolve(root)
  if (!fs.existsSync(resolved)) {
    throw new DirectoryError(`Directory not found: ${root}`)
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw new DirectoryError(`Not a directory: ${root}`)
  }
  return resolved
}

/**
 * Every non-directory entry under root, as "/"-separated relative paths
 */
function findFiles(root: string, ignoreDirs: readonly string[]): string[] {
  const entries = fg.sync("**/*", {
    cwd: root,
    dot: true,
    onlyFiles: false, // symlinks are classified below
    objectMode: true,
    followSymbolicLinks: false,
    ignore: ignorePatterns(ignoreDirs),
  })

  return entries
    .filter((entry) => !isDirectory(root, entry))
    .map((entry) => entry.path)
    .sort(compareTraversalOrder)
}

function isDirectory(root: string, entry: fg.Entry): boolean {
  if (entry.dirent.isDirectory()) return true
  if (!entry.dirent.isSymbolicLink()) return false
  try {
    return fs.statSync(path.join(root, entry.path)).isDirectory()
  } catch {
    // Dangling link: reported as a file, reading it fails later
    return false
  }
}

/**
 * Top-down order: at the first differing segment a file beats a
 * subdirectory, otherwise names compare
 */
export function compareTraversalOrder(a: string, b: string): number {
  const left = a.split("/")
  const right = b.split("/")
  let i = 0
  while (i < left.length - 1 && i < right.length - 1 && left[i] === right[i]) i++

  const leftIsFile = i === left.length - 1
  const rightIsFile = i === right.length - 1
  if (leftIsFile !== rightIsFile) return leftIsFile ? -1 : 1
  return compareNames(left[i] ?? "", right[i] ?? "")
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}
