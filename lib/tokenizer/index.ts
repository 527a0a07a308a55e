import { AnthropicTokenizer } from "./anthropic"
import { WordTokenizer } from "./word"
import type { Tokenizer, TokenizerBackend } from "./types"

export { AnthropicTokenizer, WordTokenizer }
export type { Tokenizer, TokenizerBackend }

export function createTokenizer(backend: TokenizerBackend = "anthropic"): Tokenizer {
    switch (backend) {
        case "anthropic":
            return new AnthropicTokenizer()
        case "simple":
            return new WordTokenizer()
    }
}
