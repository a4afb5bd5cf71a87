import { describeOptionsSourceContract } from "../../../ports/__tests__/options-source.contract"
import { ObjectOptionsSource } from "../object-options-source"

describeOptionsSourceContract({
  name: "ObjectOptionsSource",
  make: async () => ({
    source: new ObjectOptionsSource({ MAX_DELAY_MS: 10_000 }),
  }),
  setup: async () => {},
  expectedValue: () => ({ MAX_DELAY_MS: 10_000 }),
})
