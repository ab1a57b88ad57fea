import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async () => ({
    source: new EnvSource({ env: { CACHESIM_POLICY: "mru" }, prefix: "CACHESIM_" }),
  }),
  setup: async () => {},
  expectedValue: () => ({ POLICY: "mru" }),
})
