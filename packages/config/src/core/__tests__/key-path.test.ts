import { UsageError } from "../errors"
import { formatKeyPath, lookup, parseKeyPath } from "../key-path"

describe("parseKeyPath", () => {
  it("splits dotted keys", () => {
    expect(parseKeyPath("server.port")).toEqual(["server", "port"])
  })

  it("reads indices and quoted keys", () => {
    expect(parseKeyPath('labels["app.kubernetes.io/name"]')).toEqual(["labels", "app.kubernetes.io/name"])
    expect(parseKeyPath("hosts[0].name")).toEqual(["hosts", 0, "name"])
    expect(parseKeyPath("[2][1]")).toEqual([2, 1])
    expect(parseKeyPath("a['b']")).toEqual(["a", "b"])
  })

  it("unescapes quoted keys", () => {
    expect(parseKeyPath('a["say \\"hi\\""]')).toEqual(["a", 'say "hi"'])
  })

  it("keeps CLI-style keys whole", () => {
    expect(parseKeyPath("<name>")).toEqual(["<name>"])
    expect(parseKeyPath("-g")).toEqual(["-g"])
  })

  it("passes arrays through", () => {
    const path = ["a.b", 0]
    expect(parseKeyPath(path)).toBe(path)
  })

  it.each(["", ".a", "a.", "a..b", "a[x]", "a[0", 'a["b', "a[0]b", "a.[0]", "a]b"])("rejects %j", (input) => {
    expect(() => parseKeyPath(input)).toThrow(UsageError)
  })
})

describe("formatKeyPath", () => {
  it("renders the string form", () => {
    expect(formatKeyPath(["server", "hosts", 0, "name"])).toBe("server.hosts[0].name")
    expect(formatKeyPath(["labels", "app.name"])).toBe('labels["app.name"]')
    expect(formatKeyPath([1, "x"])).toBe("[1].x")
  })

  it("parses back to the same path", () => {
    const path = ["a", 3, "b.c", "d"]
    expect(parseKeyPath(formatKeyPath(path))).toEqual(path)
  })
})

describe("lookup", () => {
  const data = {
    server: { port: 0, debug: false, name: "", extra: null, hosts: ["a", "b"] },
    missing: undefined,
    byId: new Map<unknown, unknown>([["x", 1]]),
  }

  it("finds falsy values", () => {
    expect(lookup(data, ["server", "port"])).toEqual({ found: true, value: 0 })
    expect(lookup(data, ["server", "debug"])).toEqual({ found: true, value: false })
    expect(lookup(data, ["server", "name"])).toEqual({ found: true, value: "" })
    expect(lookup(data, ["server", "extra"])).toEqual({ found: true, value: null })
  })

  it("treats undefined as absent", () => {
    expect(lookup(data, ["missing"])).toEqual({ found: false })
  })

  it("indexes sequences", () => {
    expect(lookup(data, ["server", "hosts", 1])).toEqual({ found: true, value: "b" })
    expect(lookup(data, ["server", "hosts", "0"])).toEqual({ found: true, value: "a" })
    expect(lookup(data, ["server", "hosts", 2])).toEqual({ found: false })
    expect(lookup(data, ["server", "hosts", "length"])).toEqual({ found: false })
  })

  it("reads Map entries", () => {
    expect(lookup(data, ["byId", "x"])).toEqual({ found: true, value: 1 })
    expect(lookup(data, ["byId", "y"])).toEqual({ found: false })
  })

  it("never throws for partial or mistyped paths", () => {
    expect(lookup(data, ["server", "port", "deeper"])).toEqual({ found: false })
    expect(lookup(data, ["nope", "deeper"])).toEqual({ found: false })
    expect(lookup(undefined, ["a"])).toEqual({ found: false })
    expect(lookup(data, ["toString"])).toEqual({ found: false })
  })

  it("returns the root for an empty path", () => {
    expect(lookup(data, [])).toEqual({ found: true, value: data })
  })
})
