import type { CompressStrategy } from "../compressor/types"

/**
 * Bucket identifiers known to every policy. Custom buckets use the `x-` slot.
 */
export const KNOWN_BUCKET_IDS = [
    "system",
    "task",
    "tools",
    "history",
    "memory",
    "rag",
    "fewshot",
    "scratchpad",
] as const

export type KnownBucketId = (typeof KNOWN_BUCKET_IDS)[number]
export type CustomBucketId = `x-${string}`
export type BucketId = KnownBucketId | CustomBucketId

export const CUSTOM_BUCKET_PATTERN = /^x-[a-z0-9][a-z0-9_-]*$/

export const PLACEMENT_GROUPS = ["head", "middle", "tail"] as const
export type PlacementGroup = (typeof PLACEMENT_GROUPS)[number]

export interface BucketSpec {
    id: BucketId
    min: number
    max: number
    weight: number
    /** Never dropped; infeasible minimums fail the request instead. */
    sticky: boolean
    compress: CompressStrategy
    /** Group an unplaced bucket falls into. Middle when absent. */
    placement?: PlacementGroup
    /** Relevance used when a request supplies no score for the bucket. */
    contentScore: number
}

export interface Allocation {
    bucketId: BucketId
    tokens: number
    dropped: boolean
}

export interface AllocateRequest {
    contextLimit: number
    outputBudget: number
    overhead: number
    /** Relevance per bucket; buckets without one use their contentScore. */
    scores?: Partial<Record<BucketId, number>>
    /** Non-sticky buckets in the order they are given up under pressure. */
    dropOrder?: readonly BucketId[]
    /** Tokens handed out per water-filling round. */
    chunkSize?: number
    /** Scale minimums down instead of failing when the drop order cannot make them fit. */
    allowMinViolation?: boolean
    signal?: AbortSignal
}

export interface AllocationResult {
    /** Available input budget B. */
    budget: number
    /** One entry per configured bucket, ascending id. */
    allocations: readonly Allocation[]
    dropped: readonly BucketId[]
    totalAllocated: number
    minViolated: boolean
}

export function isKnownBucketId(id: string): id is KnownBucketId {
    return (KNOWN_BUCKET_IDS as readonly string[]).includes(id)
}

export function isBucketId(id: string): id is BucketId {
    return isKnownBucketId(id) || CUSTOM_BUCKET_PATTERN.test(id)
}
