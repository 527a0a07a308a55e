import { describe, it, expect } from "vitest"
import {
    BudgetExhausted,
    WordTokenizer,
    createContextEngine,
    createSilentLogger,
    toChatMessages,
    validateConfig,
    type ContentSection,
} from "../index"

const SECTIONS: ContentSection[] = [
    { bucketId: "scratchpad", content: "notes" },
    { bucketId: "rag", content: "Quarterly revenue grew." },
    { bucketId: "task", content: "Summarise the report." },
    { bucketId: "system", content: "Be brief." },
]

describe("createContextEngine", () => {
    it("should assemble with the default config and policy", () => {
        const engine = createContextEngine({
            tokenizer: new WordTokenizer(),
            logger: createSilentLogger(),
        })

        const result = engine.assemble(SECTIONS)

        // 8192 - (1200 + 300) - 200
        expect(result.budget).toBe(6492)
        expect(result.policy).toBe("default")
        expect(result.sections.map((s) => s.bucketId)).toEqual([
            "system",
            "task",
            "rag",
            "scratchpad",
        ])
        expect(result.totalTokens).toBe(12)
        expect(result.dropped).toEqual([])
    })

    it("should feed the result into chat messages", () => {
        const engine = createContextEngine({
            tokenizer: new WordTokenizer(),
            logger: createSilentLogger(),
        })

        const messages = toChatMessages(engine.assemble(SECTIONS), { merge: true })

        expect(messages).toEqual([
            { role: "system", content: "Be brief." },
            { role: "user", content: "Summarise the report." },
            { role: "system", content: "Quarterly revenue grew.\n\nnotes" },
        ])
    })

    it("should take the tokenizer and limits from the given config", () => {
        const engine = createContextEngine({
            config: validateConfig({ tokenizer: "simple", model: { contextLimit: 2000 } }),
            logger: createSilentLogger(),
        })

        expect(engine.tokenizer.name).toBe("simple")
        // 2000 - 1500 - 200 leaves 300 for 600 tokens of sticky minimums
        expect(() => engine.assemble(SECTIONS)).toThrow(BudgetExhausted)
    })

    it("should let a call override the limits", () => {
        const engine = createContextEngine({
            tokenizer: new WordTokenizer(),
            logger: createSilentLogger(),
        })

        const result = engine.assemble(SECTIONS, "research_heavy", {
            contextLimit: 3000,
            outputBudget: 500,
            overhead: 0,
        })

        expect(result.budget).toBe(2500)
        expect(result.policy).toBe("research_heavy")
    })
})
