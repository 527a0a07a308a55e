import { DEFAULT_WATER_FILL_CHUNK } from "../budget/manager"
import type { EngineConfig } from "./schema"

export const DEFAULT_POLICY = "default"

export const DEFAULT_CONFIG: EngineConfig = {
    debug: false,
    logFormat: "text",
    tokenizer: "anthropic",
    model: {
        name: "gpt-4",
        contextLimit: 8192,
        outputTarget: 1200,
        outputHeadroom: 300,
    },
    systemOverhead: 200,
    engine: {
        waterFillChunk: DEFAULT_WATER_FILL_CHUNK,
        allowMinViolation: false,
    },
    buckets: {
        system: {
            min: 300,
            max: 800,
            weight: 2.0,
            sticky: true,
            compress: "none",
            contentScore: 0.5,
        },
        task: {
            min: 300,
            max: 1500,
            weight: 2.5,
            sticky: true,
            compress: "truncate_middle",
            contentScore: 0.5,
        },
        tools: {
            min: 120,
            max: 400,
            weight: 0.8,
            sticky: false,
            compress: "signature_only",
            contentScore: 0.5,
        },
        history: {
            min: 0,
            max: 3000,
            weight: 1.2,
            sticky: false,
            compress: "truncate_head",
            contentScore: 0.5,
        },
        memory: {
            min: 0,
            max: 800,
            weight: 0.8,
            sticky: false,
            compress: "extractive",
            contentScore: 0.5,
        },
        rag: {
            min: 0,
            max: 5000,
            weight: 2.8,
            sticky: false,
            compress: "extractive",
            contentScore: 0.5,
        },
        fewshot: {
            min: 0,
            max: 1200,
            weight: 0.5,
            sticky: false,
            compress: "truncate_tail",
            contentScore: 0.5,
        },
        scratchpad: {
            min: 0,
            max: 800,
            weight: 0.6,
            sticky: false,
            compress: "truncate_tail",
            placement: "tail",
            contentScore: 0.5,
        },
    },
    policies: {
        default: {
            dropOrder: ["fewshot", "rag", "history", "tools"],
            placement: {
                head: ["system", "task", "tools"],
                middle: ["rag", "history"],
                tail: ["scratchpad"],
            },
        },
        research_heavy: {
            dropOrder: ["fewshot", "history", "tools"],
            placement: {
                head: ["system", "task"],
                middle: ["rag", "history"],
                tail: ["scratchpad", "tools"],
            },
            overrides: {
                buckets: { rag: { weight: 3.5 } },
            },
        },
        code_generation: {
            dropOrder: ["fewshot", "history", "memory"],
            placement: {
                head: ["system", "task", "tools"],
                middle: ["memory", "history"],
                tail: ["scratchpad"],
            },
            overrides: {
                buckets: { tools: { weight: 2.0, compress: "signature_only" } },
            },
        },
    },
}
