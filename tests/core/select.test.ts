/**
 * select.test.ts - Tests for candidate file discovery
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest"
import fs from "fs"
import path from "path"
import { tmpdir } from "os"
import fg from "fast-glob"
import {
  compareTraversalOrder,
  ignorePatterns,
  normalizeExtension,
  selectFiles,
  selectOtherFiles,
} from "../../tools/lib/core/select"
import { DirectoryError } from "../../tools/lib/core/errors"

let root: string

function touch(relative: string, content = "test"): string {
  const file = path.join(root, relative)
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, content)
  return file
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(tmpdir(), "textswap-select-"))
})

afterEach(() => {
  vi.restoreAllMocks()
  fs.rmSync(root, { recursive: true, force: true })
})

describe("selectFiles", () => {
  test("skips default ignored directories", () => {
    const file1 = touch("file1.txt")
    const file2 = touch("file2.py")
    touch(".git/config")

    expect(selectFiles({ root })).toEqual([file1, file2])
  })

  test("lists a directory's files before its subdirectories, by name", () => {
    const b = touch("b.txt")
    const a = touch("a.txt")
    const c = touch("sub/c.txt")
    const d = touch("a_dir/d.txt")

    expect(selectFiles({ root })).toEqual([a, b, d, c])
  })

  test("recurses into nested directories", () => {
    const files = [touch("file1.txt"), touch("dir1/file2.txt"), touch("dir1/dir2/file3.txt")]
    expect(selectFiles({ root })).toEqual(files)
  })

  test("never visits files deep under an excluded directory", () => {
    const kept = touch("src/keep.txt")
    touch("node_modules/x/y/z/deep.txt")

    expect(selectFiles({ root, includeExtensions: [".txt"] })).toEqual([kept])
    expect(selectFiles({ root, ignoreExtensions: [".md"] })).toEqual([kept])
  })

  test("prunes excluded directories in the glob", () => {
    touch("node_modules/pkg/index.txt")
    const keep = touch("keep.txt")
    const glob = vi.spyOn(fg, "sync")

    expect(selectFiles({ root, ignoreDirs: ["node_modules", ".git"] })).toEqual([keep])

    expect(glob).toHaveBeenCalledTimes(1)
    expect(glob.mock.calls[0]?.[1]).toMatchObject({
      cwd: path.resolve(root),
      followSymbolicLinks: false,
      ignore: ["**/node_modules/**", "**/.git/**"],
    })
  })

  test("custom ignoreDirs replace the defaults", () => {
    touch("vendor/a/b/c/file.txt")
    const nm = touch("node_modules/m.txt")

    expect(selectFiles({ root, ignoreDirs: ["vendor"] })).toEqual([nm])
  })

  test("ignores listed files", () => {
    const keep = touch("process.txt")
    const ignored = touch("ignore.txt")

    expect(selectFiles({ root, ignoreFiles: [ignored] })).toEqual([keep])
  })

  test("ignores extensions, with or without the dot", () => {
    const txt = touch("test.txt")
    touch("test.log")
    touch("test.tmp")

    expect(selectFiles({ root, ignoreExtensions: [".log", "tmp"] })).toEqual([txt])
  })

  test("includes only allow-listed extensions", () => {
    const py = touch("test.py")
    touch("test.txt")
    touch("Makefile")

    expect(selectFiles({ root, includeExtensions: [".py"] })).toEqual([py])
  })

  test("selects symlinked files", () => {
    const target = touch("target.txt")
    const link = path.join(root, "link.txt")
    fs.symlinkSync(target, link)

    expect(selectFiles({ root })).toEqual([link, target])
  })

  test("does not follow symlinked directories", () => {
    const real = touch("real/x.txt")
    fs.symlinkSync(path.join(root, "real"), path.join(root, "link"))

    expect(selectFiles({ root })).toEqual([real])
  })

  test("fails for a missing root", () => {
    const missing = path.join(root, "nope")
    expect(() => selectFiles({ root: missing })).toThrow(DirectoryError)
    expect(() => selectFiles({ root: missing })).toThrow(`Directory not found: ${missing}`)
  })

  test("fails when the root is a file", () => {
    const file = touch("file.txt")
    expect(() => selectFiles({ root: file })).toThrow(`Not a directory: ${file}`)
  })
})

describe("selectOtherFiles", () => {
  test("lists files left out, including ignored directories", () => {
    touch("file1.txt")
    const config = touch(".git/config")
    const log = touch("debug.log")

    expect(selectOtherFiles({ root, ignoreExtensions: [".log"] })).toEqual([log, config])
  })
})

describe("normalizeExtension", () => {
  test("adds a missing dot", () => {
    expect(normalizeExtension("ts")).toBe(".ts")
    expect(normalizeExtension(".ts")).toBe(".ts")
  })
})

describe("ignorePatterns", () => {
  test("matches the directory at any depth", () => {
    expect(ignorePatterns(["node_modules", ".venv"])).toEqual(["**/node_modules/**", "**/.venv/**"])
  })
})

describe("compareTraversalOrder", () => {
  test("puts a directory's files before its subdirectories", () => {
    const paths = ["sub/c.txt", "b.txt", "dir1/dir2/file3.txt", "dir1/file2.txt", "a.txt"]
    expect([...paths].sort(compareTraversalOrder)).toEqual([
      "a.txt",
      "b.txt",
      "dir1/file2.txt",
      "dir1/dir2/file3.txt",
      "sub/c.txt",
    ])
  })
})
