import type { LogLevelName } from "../../../ports/log-level"
import { ConsoleLogger, createConsoleLogger } from "../console-logger"

describe("ConsoleLogger behavior", () => {
  function makeLineCaptureConsole() {
    const lines: string[] = []
    const calls: { method: LogLevelName; line: string }[] = []

    const capture = (method: LogLevelName) => (line: unknown) => {
      const text = String(line)
      lines.push(text)
      calls.push({ method, line: text })
    }

    const fakeConsole = {
      debug: capture("debug"),
      info: capture("info"),
      warn: capture("warn"),
      error: capture("error"),
    }

    return { lines, calls, fakeConsole }
  }

  it("defaults to the global console", () => {
    const spy = vi.spyOn(globalThis.console, "info").mockImplementation(() => {})

    new ConsoleLogger({}, { level: "trace" }, { target: "Greeter" }).info("hello")

    expect(spy).toHaveBeenCalledTimes(1)
    expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toMatchObject({
      level: "info",
      message: "hello",
      target: "Greeter",
    })
  })

  it("emits parseable JSON when prettify is false", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "trace", prettify: false },
      { target: "Greeter" },
    )

    logger.debug("resolved parameter", { param: "Greeter.name", source: "cli <name>" })

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({
      level: "debug",
      message: "resolved parameter",
      target: "Greeter",
      param: "Greeter.name",
      source: "cli <name>",
    })
    expect(typeof payload.timestamp).toBe("string")
  })

  it("prettify emits a human-readable line", () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))

    const { lines, fakeConsole } = makeLineCaptureConsole()

    new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: true }, {
      target: "Greeter",
    }).warn("unresolved parameters")

    expect(lines).toEqual([
      '2024-01-15T10:30:00.000Z WARN unresolved parameters {"target":"Greeter"}',
    ])

    vi.useRealTimers()
  })

  it("prettify prints error stacks on indented lines", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const err = new Error("boom")
    err.stack = "Error: boom\n    at resolve"

    new ConsoleLogger({ console: fakeConsole }, { level: "trace", prettify: true }).error(
      "failed",
      { err },
    )

    const [line, ...stack] = lines[0]!.split("\n")

    expect(line).toContain("ERROR failed")
    expect(line).toContain('"message":"boom"')
    expect(line).not.toContain("at resolve")
    expect(stack).toEqual(["  Error: boom", "      at resolve"])
  })

  it("only emits entries at or above the configured level", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "warn" })

    logger.info("ignored")
    logger.warn("included")
    logger.error("included-too")

    expect(lines.map((l) => JSON.parse(l).level)).toEqual(["warn", "error"])
  })

  it("defaults to info level", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = createConsoleLogger({ console: fakeConsole })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!).message).toBe("included")
  })

  it("serializes Error values through serializeError", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.error("failed", { err: new Error("boom", { cause: new Error("root") }) })
    logger.error("failed-again", { err: { code: "custom" } })
    logger.error("null-error", { err: null })

    const [first, second, third] = lines.map((l) => JSON.parse(l))

    expect(first.err).toMatchObject({
      name: "Error",
      code: "unknown",
      message: "boom",
      cause: { name: "Error", message: "root" },
    })
    expect(typeof first.err.stack).toBe("string")
    expect(second.err).toEqual({ code: "custom" })
    expect(third.err).toBeNull()
  })

  it("routes trace to debug and fatal to error", () => {
    const { calls, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.trace("t")
    logger.fatal("f")

    expect(calls.map((c) => c.method)).toEqual(["debug", "error"])
    expect(JSON.parse(calls[0]!.line).level).toBe("trace")
    expect(JSON.parse(calls[1]!.line).level).toBe("fatal")
  })

  it("does not throw when metadata cannot be serialized", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    const circular: Record<string, unknown> = { a: 1 }
    circular.self = circular

    logger.info("circular", { circular })

    expect(JSON.parse(lines[0]!)).toEqual({ message: "Failed to stringify log payload" })
  })

  it("ignores metadata that collides with reserved keys and drops undefined", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.info("test-message", { level: 456, message: "SHOULD_NOT_APPEAR", a: undefined, b: 1 })

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({ level: "info", message: "test-message", b: 1 })
    expect(Object.hasOwn(payload, "a")).toBe(false)
  })
})
