import { constantHasher, describeCacheContract } from "../../../ports/__tests__/cache.contract"
import { FifoCache } from "../fifo-cache"

describe("FifoCache", () => {
  describeCacheContract("FifoCache", (deps, opts) => new FifoCache<string, number>(deps, opts))
  describeCacheContract(
    "FifoCache with a colliding hasher",
    (deps, opts) => new FifoCache<string, number>(deps, opts),
    constantHasher,
  )
})
