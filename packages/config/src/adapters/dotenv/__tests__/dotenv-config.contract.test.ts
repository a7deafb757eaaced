import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigContract } from "../../../ports/__tests__/config.contract"
import { DotenvConfig } from "../dotenv-config"

describeConfigContract({
  name: "DotenvConfig",
  kind: "dotenv",
  setup: async (dir) => {
    await fs.writeFile(path.join(dir, ".env"), "TEST_KEY=test_value\n")
  },
  make: (dir) => new DotenvConfig({ file: ".env", required: true, cwd: dir }),
  present: { path: "TEST_KEY", value: "test_value" },
  absent: "OTHER_KEY",
})
