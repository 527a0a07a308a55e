import { describe, it, expect } from "vitest"
import { truncateHead, truncateMiddle, truncateTail } from "../../lib/compressor/truncation"
import { WordTokenizer } from "../../lib/tokenizer"
import { words } from "../fixtures/buckets"

const tokenizer = new WordTokenizer()

describe("truncateTail", () => {
    it("should keep the leading words that fit", () => {
        const result = truncateTail(tokenizer, "one two three four five", 3)

        expect(result).toEqual({ text: "one two three", tokens: 3 })
    })

    it("should return content that already fits unchanged", () => {
        const content = "  spaced   out\n"

        expect(truncateTail(tokenizer, content, 2)).toEqual({ text: content, tokens: 2 })
    })

    it("should return an empty string for a zero target", () => {
        expect(truncateTail(tokenizer, "one two", 0)).toEqual({ text: "", tokens: 0 })
    })

    it("should cut inside the first word when it alone is over target", () => {
        const result = truncateTail(tokenizer, "a-b-c-d rest", 3)

        expect(result).toEqual({ text: "a-b", tokens: 3 })
    })
})

describe("truncateHead", () => {
    it("should keep the trailing words that fit", () => {
        const result = truncateHead(tokenizer, "one two three four five", 2)

        expect(result).toEqual({ text: "four five", tokens: 2 })
    })

    it("should cut inside the last word when it alone is over target", () => {
        const result = truncateHead(tokenizer, "start a-b-c-d", 3)

        expect(result).toEqual({ text: "c-d", tokens: 3 })
    })
})

describe("truncateMiddle", () => {
    const lines = Array.from({ length: 10 }, (_, i) => `line ${i + 1} text`).join("\n")

    it("should keep head and tail lines around a marker", () => {
        const result = truncateMiddle(tokenizer, lines, 20)

        expect(result.text).toBe("line 1 text\n[... 8 lines truncated ...]\nline 10 text")
        expect(result.tokens).toBe(17)
    })

    it("should fall back to truncateTail for short content", () => {
        const result = truncateMiddle(tokenizer, "first line\nsecond line here", 3)

        expect(result).toEqual({ text: "first line\nsecond", tokens: 3 })
    })

    it("should fall back to truncateTail when the marker alone does not fit", () => {
        const result = truncateMiddle(tokenizer, lines, 5)

        expect(result).toEqual({ text: "line 1 text\nline 2", tokens: 5 })
    })
})

describe("truncation round trip", () => {
    it("should never exceed the target", () => {
        const content = words("w", 50)
        for (const target of [0, 1, 7, 25, 49]) {
            expect(truncateTail(tokenizer, content, target).tokens).toBeLessThanOrEqual(target)
            expect(truncateHead(tokenizer, content, target).tokens).toBeLessThanOrEqual(target)
        }
    })
})
