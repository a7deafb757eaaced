import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Command } from "commander"
import { z } from "zod"
import { CommanderConfig } from "../../adapters/commander/commander-config"
import { EnvConfig } from "../../adapters/env/env-config"
import { YamlConfig } from "../../adapters/yaml/yaml-config"
import { relpath, schema } from "../apply"
import { intEval } from "../cast/arithmetic-eval"
import { configAttr, key } from "../getters"
import { Loader, load } from "../loader"
import { param } from "../param"
import { defineConfigs, defineParams } from "../registry"

function program(): Command {
  return new Command("greet")
    .argument("<name>")
    .option("-g, --greeting <text>")
    .option("-w, --workers <expr>")
    .configureOutput({ writeOut: () => {}, writeErr: () => {} })
}

class Greeter {
  name!: string
  greeting!: string
  workers!: number
  logDir!: string
  usage!: string

  constructor(
    readonly argv: readonly string[],
    readonly dir: string,
    readonly env: Readonly<Record<string, string>> = {},
  ) {}
}

defineParams(Greeter, {
  name: param([key("cli", "<name>")]),
  greeting: param([key("cli", "greeting"), key("yaml", "greeting")], { default: "Hello" }),
  workers: param([key("cli", "workers"), key("env", "WORKERS"), key("yaml", "workers")], {
    apply: [(v) => intEval(v), schema(z.number().int().positive())],
    default: 1,
  }),
  logDir: param([key("yaml", "log_dir", { apply: relpath() })], { default: "/var/log/greeter" }),
  usage: param([configAttr("cli", "usage")]),
})

defineConfigs(Greeter, (greeter) => [
  new CommanderConfig({ command: program, argv: greeter.argv, from: "user" }),
  new EnvConfig({ env: greeter.env, prefix: "GREETER_" }),
  new YamlConfig({ file: "greeter.yaml", required: false, cwd: greeter.dir }),
])

describe("loading a CLI program", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "knobs-e2e-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("combines CLI, environment and file", async () => {
    await fs.writeFile(path.join(dir, "greeter.yaml"), "greeting: Run away\nworkers: 2 * 4\nlog_dir: logs\n")

    const greeter = load(new Greeter(["Sir Robin"], dir, { GREETER_WORKERS: "3" }))

    expect(greeter.name).toBe("Sir Robin")
    expect(greeter.greeting).toBe("Run away")
    expect(greeter.workers).toBe(3)
    expect(greeter.logDir).toBe(path.join(dir, "logs"))
    expect(greeter.usage).toContain("Usage: greet [options] <name>")
  })

  it("falls back to defaults without a file", () => {
    const greeter = load(new Greeter(["Sir Robin"], dir))

    expect(greeter.greeting).toBe("Hello")
    expect(greeter.workers).toBe(1)
    expect(greeter.logDir).toBe("/var/log/greeter")
  })

  it("evaluates arithmetic from the command line", () => {
    const greeter = load(new Greeter(["Sir Robin", "-w", "(3 + 1) * 2"], dir))

    expect(greeter.workers).toBe(8)
  })

  it("explains its choices", async () => {
    await fs.writeFile(path.join(dir, "greeter.yaml"), "greeting: Run away\n")

    const report = new Loader().load(new Greeter(["Sir Robin", "-g", "Ni"], dir))

    expect(report.explain("name")).toBe("cli:greet <name>")
    expect(report.explain("greeting")).toBe("cli:greet greeting")
    expect(report.explain("workers")).toBe("default")
    expect(report.explain("usage")).toBe("cli:greet #usage")
  })

  it("rejects a non-positive worker count", () => {
    expect(() => load(new Greeter(["Sir Robin", "-w", "2 - 2"], dir))).toThrow(
      /^invalid value for Greeter.workers from cli:greet workers: /,
    )
  })
})
