import { describe, it, expect, vi } from "vitest"
import { Compressor } from "../../lib/compressor/compressor"
import { COMPRESS_STRATEGIES } from "../../lib/compressor/types"
import { CompressionInfeasible, ConfigError, DependencyError } from "../../lib/errors"
import { WordTokenizer } from "../../lib/tokenizer"
import { words } from "../fixtures/buckets"

const tokenizer = new WordTokenizer()

const SOURCE = [
    "export function add(a: number, b: number): number {",
    "    return a + b",
    "}",
].join("\n")

describe("Compressor.reduce", () => {
    it.each(COMPRESS_STRATEGIES)("should return fitting content unchanged with %s", (strategy) => {
        const compressor = new Compressor({ tokenizer })

        expect(compressor.reduce("short text", 5, strategy)).toEqual({
            text: "short text",
            tokens: 2,
        })
    })

    it("should reject a negative or fractional target", () => {
        const compressor = new Compressor({ tokenizer })

        expect(() => compressor.reduce("text", -1, "truncate_tail")).toThrow(ConfigError)
        expect(() => compressor.reduce("text", 1.5, "truncate_tail")).toThrow(ConfigError)
    })

    it("should refuse to reduce with none", () => {
        const compressor = new Compressor({ tokenizer })

        expect(() => compressor.reduce(words("w", 10), 5, "none")).toThrow(CompressionInfeasible)
    })

    it("should truncate from either end", () => {
        const compressor = new Compressor({ tokenizer })
        const content = words("w", 10)

        expect(compressor.reduce(content, 3, "truncate_tail").text).toBe("w1 w2 w3")
        expect(compressor.reduce(content, 3, "truncate_head").text).toBe("w8 w9 w10")
    })

    it("should pass headRatio through to truncate_middle", () => {
        const compressor = new Compressor({ tokenizer })
        const lines = Array.from({ length: 10 }, (_, i) => `line ${i + 1} text`).join("\n")

        // available 9: head 6 tokens (two lines), tail 3 tokens (one line)
        const result = compressor.reduce(lines, 20, "truncate_middle", { headRatio: 0.7 })

        expect(result.text).toBe("line 1 text\nline 2 text\n[... 7 lines truncated ...]\nline 10 text")
        expect(result.tokens).toBe(20)
    })
})

describe("Compressor signature_only", () => {
    it("should keep only the signature lines", () => {
        const compressor = new Compressor({ tokenizer })

        expect(compressor.reduce(SOURCE, 15, "signature_only")).toEqual({
            text: "export function add(a: number, b: number): number",
            tokens: 14,
        })
    })

    it("should fail when the signatures alone are over target", () => {
        const compressor = new Compressor({ tokenizer })

        expect(() => compressor.reduce(SOURCE, 10, "signature_only")).toThrow(
            "Signatures alone need 14 tokens, target is 10",
        )
    })

    it("should fail when there are no signatures", () => {
        const compressor = new Compressor({ tokenizer })

        expect(() => compressor.reduce(words("w", 10), 5, "signature_only")).toThrow(
            CompressionInfeasible,
        )
    })

    it("should use a supplied extractor", () => {
        const extractor = vi.fn((content: string) => content.split("\n").slice(0, 1))
        const compressor = new Compressor({ tokenizer, signatureExtractor: extractor })

        const result = compressor.reduce("keep this\ndrop this line", 3, "signature_only")

        expect(result.text).toBe("keep this")
        expect(extractor).toHaveBeenCalledOnce()
    })
})

describe("Compressor extractive", () => {
    const doc = "First paragraph here.\n\nSecond one.\n\nThird paragraph text."

    it("should keep the best units that fit", () => {
        const compressor = new Compressor({ tokenizer })

        expect(compressor.reduce(doc, 8, "extractive")).toEqual({
            text: "First paragraph here.\n\nSecond one.",
            tokens: 7,
        })
    })

    it("should use the scorer given per call over the default", () => {
        const compressor = new Compressor({ tokenizer })

        const result = compressor.reduce(doc, 8, "extractive", {
            scorer: (unit) => (unit.startsWith("Third") ? 10 : 0),
        })

        expect(result.text).toBe("First paragraph here.\n\nThird paragraph text.")
    })

    it("should fail when no unit fits", () => {
        const compressor = new Compressor({ tokenizer })

        expect(() => compressor.reduce(doc, 2, "extractive")).toThrow(CompressionInfeasible)
    })
})

describe("Compressor abstractive", () => {
    const content = words("w", 8)

    it("should need a summarizer", () => {
        const compressor = new Compressor({ tokenizer })

        expect(() => compressor.reduce(content, 5, "abstractive")).toThrow(
            "Strategy 'abstractive' needs a summarizer",
        )
    })

    it("should return the summary", () => {
        const summarizer = vi.fn(() => "short summary")
        const compressor = new Compressor({ tokenizer, summarizer })

        expect(compressor.reduce(content, 5, "abstractive")).toEqual({
            text: "short summary",
            tokens: 2,
        })
        expect(summarizer).toHaveBeenCalledWith(content, 5)
    })

    it("should cut a summary that is over target", () => {
        const compressor = new Compressor({
            tokenizer,
            summarizer: () => "one two three four five six seven",
        })

        expect(compressor.reduce(content, 3, "abstractive").text).toBe("one two three")
    })

    it("should wrap summarizer failures without retrying", () => {
        const cause = new Error("boom")
        const summarizer = vi.fn((): string => {
            throw cause
        })
        const compressor = new Compressor({ tokenizer, summarizer })

        let caught: unknown
        try {
            compressor.reduce(content, 5, "abstractive")
        } catch (error) {
            caught = error
        }

        expect(caught).toBeInstanceOf(DependencyError)
        expect(caught).toMatchObject({
            message: "summarizer failed: boom",
            dependency: "summarizer",
            cause,
        })
        expect(summarizer).toHaveBeenCalledOnce()
    })

    it("should surface a DependencyError from the summarizer unchanged", () => {
        const inner = new DependencyError("llm", new Error("timeout"))
        const compressor = new Compressor({
            tokenizer,
            summarizer: () => {
                throw inner
            },
        })

        expect(() => compressor.reduce(content, 5, "abstractive")).toThrow(inner)
    })
})
