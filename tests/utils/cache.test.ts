import { describe, it, expect } from "vitest"
import { LRUCache } from "../../lib/utils/cache"

describe("LRUCache", () => {
    it("should evict the least recently used entry", () => {
        const cache = new LRUCache<number>(2)
        cache.set("a", 1)
        cache.set("b", 2)
        cache.get("a")

        cache.set("c", 3)

        expect(cache.size).toBe(2)
        expect(cache.stats.evictions).toBe(1)
        expect(cache.get("b")).toBeUndefined()
        expect(cache.get("a")).toBe(1)
        expect(cache.get("c")).toBe(3)
    })

    it("should update an existing key in place", () => {
        const cache = new LRUCache<number>(2)
        cache.set("a", 1)
        cache.set("b", 2)

        cache.set("a", 10)
        cache.set("c", 3)

        expect(cache.get("a")).toBe(10)
        expect(cache.get("b")).toBeUndefined()
    })

    it("should count hits and misses", () => {
        const cache = new LRUCache<number>(2)
        cache.set("a", 1)

        cache.get("a")
        cache.get("missing")

        expect(cache.stats).toEqual({ hits: 1, misses: 1, evictions: 0 })
    })

    it("should reset everything on clear", () => {
        const cache = new LRUCache<number>(2)
        cache.set("a", 1)
        cache.get("a")

        cache.clear()

        expect(cache.size).toBe(0)
        expect(cache.stats).toEqual({ hits: 0, misses: 0, evictions: 0 })
        expect(cache.get("a")).toBeUndefined()
    })

    it("should reject a size below one", () => {
        expect(() => new LRUCache<number>(0)).toThrow(RangeError)
    })
})
