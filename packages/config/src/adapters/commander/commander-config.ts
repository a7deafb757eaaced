import type { Command } from "commander"
import { BaseConfig } from "../../core/base-config"
import type { BaseConfigOptions } from "../../core/base-config"

export type CommanderConfigOptions = BaseConfigOptions & {
  /**
   * The program, or a factory for it. Commander keeps parsed values on the
   * command, so pass a factory when the same program is loaded more than once.
   */
  command: Command | (() => Command)

  /** @default process.argv */
  argv?: readonly string[]

  /**
   * How `argv` is read: "node" skips the runtime and script entries, "user"
   * takes every entry as an argument.
   *
   * @default "node"
   */
  from?: "node" | "user" | "electron"
}

function isEmptyList(value: unknown): boolean {
  return Array.isArray(value) && value.length === 0
}

/**
 * Parsed command-line arguments, kind "cli" unless overridden.
 *
 * Options appear under their attribute names (`--dry-run` as `dryRun`),
 * positional arguments as `<name>`. Options and arguments that were not
 * given and have no default are absent, as is a variadic argument given no
 * values. Parse errors are load errors; the
 * program never exits.
 */
export class CommanderConfig extends BaseConfig {
  private readonly command: Command
  private readonly argv: readonly string[] | undefined
  private readonly from: "node" | "user" | "electron"

  constructor(options: CommanderConfigOptions) {
    const command = typeof options.command === "function" ? options.command() : options.command
    super({ kind: "cli", name: command.name() ? `cli:${command.name()}` : "cli" }, options)
    this.command = command
    this.argv = options.argv
    this.from = options.from ?? "node"
  }

  /** Help text, e.g. for `configAttr("cli", "usage")`. */
  get usage(): string {
    return this.command.helpInformation()
  }

  get description(): string {
    return this.command.description()
  }

  protected materialize(): Record<string, unknown> {
    const command = this.command
    command.exitOverride()
    command.parse(this.argv ?? process.argv, { from: this.from })

    const args: Record<string, unknown> = {}

    for (const [name, value] of Object.entries(command.opts())) {
      if (value !== undefined) args[name] = value
    }

    command.registeredArguments.forEach((argument, index) => {
      const value: unknown = command.processedArgs[index]
      if (value === undefined) return
      // commander yields [] for a variadic argument given no values
      if (argument.variadic && isEmptyList(value) && argument.defaultValue === undefined) return
      args[`<${argument.name()}>`] = value
    })

    return args
  }
}
