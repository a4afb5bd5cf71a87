import fs from "node:fs/promises"
import path from "node:path"
import { describeOptionsSourceContract } from "../../../ports/__tests__/options-source.contract"
import { DotenvOptionsSource } from "../dotenv-options-source"

describeOptionsSourceContract({
  name: "DotenvOptionsSource",
  make: async (cwd) => ({
    source: new DotenvOptionsSource({ file: ".env", required: true, cwd }),
  }),
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "BACKOFF_INITIAL_DELAY_MS=250\nOTHER=1\n")
  },
  expectedValue: () => ({ INITIAL_DELAY_MS: "250" }),
})
