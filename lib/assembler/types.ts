import type { Allocation, BucketId, PlacementGroup } from "../budget/types"
import type { PolicyOverrides } from "../policy/types"

export const ASSEMBLY_STAGES = [
    "RESOLVE_POLICY",
    "ALLOCATE_BUDGET",
    "COMPRESS_PER_BUCKET",
    "ASSEMBLE",
] as const

export type AssemblyStage = (typeof ASSEMBLY_STAGES)[number]

export interface ContentSection {
    bucketId: BucketId
    content: string
    /** Relevance for water filling. Falls back to the bucket's contentScore. */
    score?: number
}

export interface AssembleRequest {
    sections: readonly ContentSection[]
    policy: string
    overrides?: PolicyOverrides
    contextLimit: number
    outputBudget: number
    overhead: number
    /** Becomes the logger's correlation id for the call. Generated when absent. */
    requestId?: string
    signal?: AbortSignal
}

export interface RenderedSection {
    bucketId: BucketId
    text: string
    tokenCount: number
    placement: PlacementGroup
}

export interface AssembledContext {
    /** Head, then middle, then tail; policy order within each group. */
    sections: readonly RenderedSection[]
    totalTokens: number
    dropped: readonly BucketId[]
    budget: number
    allocations: readonly Allocation[]
    policy: string
    /** Section texts joined by a blank line. */
    text: string
}
