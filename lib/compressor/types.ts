export const COMPRESS_STRATEGIES = [
    "none",
    "truncate_head",
    "truncate_tail",
    "truncate_middle",
    "signature_only",
    "extractive",
    "abstractive",
] as const

export type CompressStrategy = (typeof COMPRESS_STRATEGIES)[number]

export interface ReduceResult {
    text: string
    tokens: number
}

/** Scores one sub-unit of content for extractive selection. Higher is kept first. */
export type UnitScorer = (unit: string, index: number) => number

/** Pulls the structural lines (headings, signatures) out of a document. */
export type SignatureExtractor = (content: string) => string[]

/** External abstractive reducer. May fail; never retried. */
export type Summarizer = (text: string, targetTokens: number) => string

export interface ReduceOptions {
    scorer?: UnitScorer
    signatureExtractor?: SignatureExtractor
    /** Share of the budget kept at the head by truncate_middle (0..1). */
    headRatio?: number
}

export function isCompressStrategy(value: string): value is CompressStrategy {
    return (COMPRESS_STRATEGIES as readonly string[]).includes(value)
}
