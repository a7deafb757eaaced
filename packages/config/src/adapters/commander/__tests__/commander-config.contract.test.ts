import { Command } from "commander"
import { describeConfigContract } from "../../../ports/__tests__/config.contract"
import { CommanderConfig } from "../commander-config"

describeConfigContract({
  name: "CommanderConfig",
  kind: "cli",
  make: () =>
    new CommanderConfig({
      command: () => new Command("greet").argument("<name>").option("-g, --greeting <text>"),
      argv: ["Sir Robin"],
      from: "user",
    }),
  present: { path: "<name>", value: "Sir Robin" },
  absent: "greeting",
})
