import { ObjectConfig } from "../../adapters/object/object-config"
import { flattenConfigs, isConfig } from "../config-tree"
import { UsageError } from "../errors"

describe("flattenConfigs", () => {
  const a = new ObjectConfig({}, { name: "a" })
  const b = new ObjectConfig({}, { name: "b" })
  const c = new ObjectConfig({}, { name: "c" })

  it("wraps a single config", () => {
    expect(flattenConfigs(a)).toEqual([a])
  })

  it("flattens nested arrays and generators in encounter order", () => {
    function* more() {
      yield b
      yield [c, [a]]
    }

    expect(flattenConfigs([a, more(), [[b]]]).map((config) => config.name)).toEqual(["a", "b", "c", "a", "b"])
  })

  it("keeps duplicates", () => {
    expect(flattenConfigs([a, a])).toEqual([a, a])
  })

  it.each([
    ['"env"', 'config provider yielded the string "env", which is not a Config'],
    ["[1]", "config provider yielded number, which is not a Config"],
    ["[null]", "config provider yielded null, which is not a Config"],
    ['[{"kind":"env"}]', "config provider yielded a non-iterable object, which is not a Config"],
  ])("rejects %s", (json, message) => {
    const tree = JSON.parse(json)

    expect(() => flattenConfigs(tree)).toThrow(UsageError)
    expect(() => flattenConfigs(tree)).toThrow(message)
  })
})

describe("isConfig", () => {
  it("recognizes structural configs", () => {
    const config = {
      kind: "memory",
      name: "memory",
      exists: () => false,
      get: () => undefined,
      matches: () => true,
    }

    expect(isConfig(config)).toBe(true)
    expect(flattenConfigs([config])).toEqual([config])
  })
})
