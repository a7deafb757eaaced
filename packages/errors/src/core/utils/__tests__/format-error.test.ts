import { BaseError } from "../../base-error"
import { formatError } from "../format-error"

describe("formatError", () => {
  it("renders message, context, hints and causes", () => {
    const cause = new Error('expected an integer, got "eighty"')
    const err = new BaseError("cannot apply value for Server.port", {
      code: "apply",
      context: { config: "env", keyPath: "PORT", skipped: undefined },
      hints: ["check the value of PORT"],
      cause,
    })

    expect(formatError(err)).toBe(
      [
        "BaseError: cannot apply value for Server.port",
        "  config: env",
        "  keyPath: PORT",
        "  hint: check the value of PORT",
        'caused by Error: expected an integer, got "eighty"',
      ].join("\n"),
    )
  })

  it("stringifies non-string context values", () => {
    const err = new BaseError("unresolved", { code: "resolution", context: { params: ["a", "b"] } })

    expect(formatError(err)).toBe('BaseError: unresolved\n  params: ["a","b"]')
  })

  it("renders plain errors and thrown values", () => {
    expect(formatError(new TypeError("boom"))).toBe("TypeError: boom")
    expect(formatError("boom")).toBe("NonErrorThrown: boom")
  })
})
