import type { Tokenizer } from "./types"

const WORD_PATTERN = /\w+|[^\w\s]/g

/**
 * Counts words and individual punctuation marks. Used in tests and for
 * offline estimates.
 */
export class WordTokenizer implements Tokenizer {
    readonly name = "simple"

    countTokens(text: string): number {
        if (!text) return 0
        return text.match(WORD_PATTERN)?.length ?? 0
    }
}
