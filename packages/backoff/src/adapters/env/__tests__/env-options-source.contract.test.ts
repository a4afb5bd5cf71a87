import { describeOptionsSourceContract } from "../../../ports/__tests__/options-source.contract"
import { EnvOptionsSource } from "../env-options-source"

describeOptionsSourceContract({
  name: "EnvOptionsSource",
  make: async () => ({
    source: new EnvOptionsSource({ env: { BACKOFF_MULTIPLIER: "3", HOME: "/home/test" } }),
  }),
  setup: async () => {},
  expectedValue: () => ({ MULTIPLIER: "3" }),
})
