import { countTokens as anthropicCountTokens } from "@anthropic-ai/tokenizer"
import { DependencyError } from "../errors"
import { LRUCache } from "../utils/cache"
import type { Tokenizer } from "./types"

const MAX_TOKEN_CACHE_SIZE = 500

type CountFn = (text: string) => number

/**
 * BPE token counts from @anthropic-ai/tokenizer, memoized per text.
 * Backend failures surface as DependencyError with no fallback count.
 */
export class AnthropicTokenizer implements Tokenizer {
    readonly name = "anthropic"
    private readonly cache: LRUCache<number>

    constructor(
        cacheSize: number = MAX_TOKEN_CACHE_SIZE,
        private readonly count: CountFn = anthropicCountTokens,
    ) {
        this.cache = new LRUCache<number>(cacheSize)
    }

    countTokens(text: string): number {
        if (!text) return 0

        const cached = this.cache.get(text)
        if (cached !== undefined) {
            return cached
        }

        let count: number
        try {
            count = this.count(text)
        } catch (error) {
            throw new DependencyError("tokenizer", error)
        }

        this.cache.set(text, count)
        return count
    }

    /** Hit/miss counters of the memo cache. */
    get cacheStats(): { hits: number; misses: number; evictions: number; size: number } {
        return { ...this.cache.stats, size: this.cache.size }
    }

    clearCache(): void {
        this.cache.clear()
    }
}
