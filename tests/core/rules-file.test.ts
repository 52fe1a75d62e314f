import { describe, test, expect, beforeEach, afterEach } from "vitest"
import { mkdtempSync, rmSync, writeFileSync } from "fs"
import { join } from "path"
import { tmpdir } from "os"
import { loadRules, parseReplacement, parseRules } from "../../tools/lib/core/rules-file"
import { RuleFormatError } from "../../tools/lib/core/errors"

describe("parseReplacement", () => {
  test("splits on the first colon", () => {
    expect(parseReplacement("foo:bar")).toEqual({ search: "foo", replace: "bar" })
    expect(parseReplacement("a:b:c")).toEqual({ search: "a", replace: "b:c" })
    expect(parseReplacement("remove:")).toEqual({ search: "remove", replace: "" })
  })

  test("rejects an argument without a colon", () => {
    expect(() => parseReplacement("nocolon")).toThrow(RuleFormatError)
    expect(() => parseReplacement("nocolon")).toThrow("Invalid replacement format: nocolon. Expected 'search:replace'")
  })
})

describe("parseRules", () => {
  test("accepts a list of rules", () => {
    expect(parseRules('[{"search": "a", "replace": "b"}, {"search": "c", "replace": "d"}]')).toEqual([
      { search: "a", replace: "b" },
      { search: "c", replace: "d" },
    ])
  })

  test("accepts a search -> replace map", () => {
    expect(parseRules('{"widget": "gadget", "Widget": "Gadget"}')).toEqual([
      { search: "widget", replace: "gadget" },
      { search: "Widget", replace: "Gadget" },
    ])
  })

  test("rejects invalid JSON", () => {
    expect(() => parseRules("{oops", "rules.json")).toThrow(/^rules\.json: invalid JSON/)
  })

  test("rejects the wrong shape", () => {
    expect(() => parseRules("[1, 2]")).toThrow(RuleFormatError)
    expect(() => parseRules('[{"search": "a"}]')).toThrow(/expected a list of \{search, replace\} objects/)
  })
})

describe("loadRules", () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "textswap-rules-"))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  test("loads the list form", () => {
    const file = join(tempDir, "rules.json")
    writeFileSync(file, '[{"search": "old", "replace": "new"}]')
    expect(loadRules(file)).toEqual([{ search: "old", replace: "new" }])
  })

  test("loads the map form", () => {
    const file = join(tempDir, "map.json")
    writeFileSync(file, '{"colour": "color"}')
    expect(loadRules(file)).toEqual([{ search: "colour", replace: "color" }])
  })

  test("fails for a missing file", () => {
    const file = join(tempDir, "missing.json")
    expect(() => loadRules(file)).toThrow(`Rules file not found: ${file}`)
  })
})
