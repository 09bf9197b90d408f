import { constantHasher, describeCacheContract } from "../../../ports/__tests__/cache.contract"
import { FiloCache } from "../filo-cache"

describe("FiloCache", () => {
  describeCacheContract("FiloCache", (deps, opts) => new FiloCache<string, number>(deps, opts))
  describeCacheContract(
    "FiloCache with a colliding hasher",
    (deps, opts) => new FiloCache<string, number>(deps, opts),
    constantHasher,
  )
})
