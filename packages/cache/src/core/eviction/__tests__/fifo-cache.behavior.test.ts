import { KeyNotFoundError } from "../../errors/key-not-found-error"
import { FifoCache } from "../fifo-cache"

describe("FifoCache (behavior)", () => {
  it("has policy fifo", () => {
    expect(new FifoCache({}, { capacity: 1 }).policy).toBe("fifo")
  })

  it("evicts in insertion order, unaffected by updates", () => {
    const cache = new FifoCache<number, number>({}, { capacity: 3 })

    cache.put(1, 1)
    cache.put(2, 2)
    cache.put(1, 15)
    expect(cache.get(1)).toBe(15)

    cache.put(3, 3)
    cache.put(4, 4)

    expect(() => cache.get(1)).toThrow(KeyNotFoundError)
    expect(cache.get(2)).toBe(2)
  })

  it("get does not protect an entry from eviction", () => {
    const cache = new FifoCache<string, string>({}, { capacity: 2 })

    cache.put("alpha", "a")
    cache.put("beta", "b")
    cache.get("alpha")
    cache.get("alpha")
    cache.put("gamma", "c")

    expect(cache.has("alpha")).toBe(false)
    expect(cache.get("beta")).toBe("b")
    expect(cache.get("gamma")).toBe("c")
  })

  it("a shrink evicts oldest-first on the next insert", () => {
    const cache = new FifoCache<string, number>({}, { capacity: 4 })

    cache.put("a", 1)
    cache.put("b", 2)
    cache.put("c", 3)
    cache.put("d", 4)

    cache.setCapacity(2)
    cache.put("e", 5)

    expect(cache.has("a")).toBe(false)
    expect(cache.has("b")).toBe(false)
    expect(cache.has("c")).toBe(false)
    expect(cache.get("d")).toBe(4)
    expect(cache.get("e")).toBe(5)
  })
})
