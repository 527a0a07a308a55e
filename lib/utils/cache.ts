/**
 * Bounded least-recently-used cache. O(1) get/set through a Map plus a
 * doubly linked recency list. Used to memoize token counts, which are pure
 * functions of the text.
 */

interface LRUCacheEntry<K, V> {
    key: K
    value: V
    prev: LRUCacheEntry<K, V> | null
    next: LRUCacheEntry<K, V> | null
}

export class LRUCache<V, K = string> {
    private readonly entries = new Map<K, LRUCacheEntry<K, V>>()
    private head: LRUCacheEntry<K, V> | null = null
    private tail: LRUCacheEntry<K, V> | null = null
    private readonly maxSize: number

    public stats = {
        hits: 0,
        misses: 0,
        evictions: 0,
    }

    constructor(maxSize: number) {
        if (!Number.isInteger(maxSize) || maxSize <= 0) {
            throw new RangeError("LRUCache maxSize must be a positive integer")
        }
        this.maxSize = maxSize
    }

    get(key: K): V | undefined {
        const entry = this.entries.get(key)
        if (!entry) {
            this.stats.misses++
            return undefined
        }

        this.stats.hits++
        this.moveToHead(entry)
        return entry.value
    }

    set(key: K, value: V): void {
        const existing = this.entries.get(key)
        if (existing) {
            existing.value = value
            this.moveToHead(existing)
            return
        }

        const entry: LRUCacheEntry<K, V> = { key, value, prev: null, next: null }
        this.entries.set(key, entry)
        this.addToHead(entry)

        if (this.entries.size > this.maxSize) {
            this.evictLRU()
        }
    }

    get size(): number {
        return this.entries.size
    }

    clear(): void {
        this.entries.clear()
        this.head = null
        this.tail = null
        this.stats = { hits: 0, misses: 0, evictions: 0 }
    }

    private moveToHead(entry: LRUCacheEntry<K, V>): void {
        if (entry === this.head) {
            return
        }
        this.removeFromList(entry)
        this.addToHead(entry)
    }

    private addToHead(entry: LRUCacheEntry<K, V>): void {
        entry.prev = null
        entry.next = this.head

        if (this.head) {
            this.head.prev = entry
        }
        this.head = entry

        if (!this.tail) {
            this.tail = entry
        }
    }

    private removeFromList(entry: LRUCacheEntry<K, V>): void {
        if (entry.prev) {
            entry.prev.next = entry.next
        } else {
            this.head = entry.next
        }

        if (entry.next) {
            entry.next.prev = entry.prev
        } else {
            this.tail = entry.prev
        }
    }

    private evictLRU(): void {
        if (!this.tail) {
            return
        }

        const evicted = this.tail
        this.removeFromList(evicted)
        this.entries.delete(evicted.key)
        this.stats.evictions++
    }
}
