/**
 * Deterministic text -> token count function.
 * The same text must always produce the same count for a given backend.
 */
export interface Tokenizer {
    readonly name: string
    countTokens(text: string): number
}

export type TokenizerBackend = "anthropic" | "simple"
