import { test, expect } from "vitest"
import { parse } from "yaml"

import { ConversionError } from "../src/lib/error"
import { convertJsonToYaml } from "../src/lib/yaml"

test("objects become mappings and arrays become sequences", () => {
  const yaml = convertJsonToYaml('{"a": 1, "b": [true, null, "x"]}')

  expect(yaml).toBe("a: 1\nb:\n  - true\n  - null\n  - x\n")
  expect(parse(yaml)).toEqual({ a: 1, b: [true, null, "x"] })
})

test("mapping keys are sorted at every level", () => {
  const yaml = convertJsonToYaml('{"z": 1, "a": {"d": 2, "c": 3}}')

  expect(yaml).toBe("a:\n  c: 3\n  d: 2\nz: 1\n")
})

test("strings that read as other scalars keep their type", () => {
  const source = { version: "1.0", enabled: "true", empty: "", nothing: "null" }

  const yaml = convertJsonToYaml(JSON.stringify(source))

  expect(parse(yaml)).toEqual(source)
})

test("malformed JSON is a ConversionError, not a crash", () => {
  expect(() => convertJsonToYaml('{"a":')).toThrow(ConversionError)
  expect(() => convertJsonToYaml('{"a":')).toThrow(/^failed to parse JSON: /)
  expect(() => convertJsonToYaml("")).toThrow(ConversionError)
})

test("the parser error is kept as the cause", () => {
  let caught: unknown
  try {
    convertJsonToYaml("[1,")
  } catch (err) {
    caught = err
  }

  expect(caught).toBeInstanceOf(ConversionError)
  expect(caught instanceof Error && caught.cause).toBeInstanceOf(SyntaxError)
})
