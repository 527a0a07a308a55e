import type { BucketId, BucketSpec, PlacementGroup } from "../budget/types"

export type PlacementMap = Record<PlacementGroup, readonly BucketId[]>

/** Field-level replacements for one bucket. */
export type BucketOverride = Partial<Omit<BucketSpec, "id">>

/**
 * Typed overlay applied on top of a base policy. Scalars replace; lists
 * (drop order, each placement group) replace wholesale.
 */
export interface PolicyOverrides {
    dropOrder?: readonly BucketId[]
    placement?: Partial<PlacementMap>
    buckets?: Partial<Record<BucketId, BucketOverride>>
    waterFillChunk?: number
    allowMinViolation?: boolean
}

export interface PolicyDefinition {
    dropOrder: readonly BucketId[]
    placement: Partial<PlacementMap>
    overrides?: PolicyOverrides
}

export interface EngineOptions {
    waterFillChunk: number
    allowMinViolation: boolean
}

/**
 * Effective configuration for one request. Deep-frozen; nothing a caller does
 * after resolve() is visible through it.
 */
export interface ResolvedPolicy {
    readonly name: string
    readonly dropOrder: readonly BucketId[]
    /** Every configured bucket appears in exactly one group. */
    readonly placement: Readonly<PlacementMap>
    readonly buckets: readonly BucketSpec[]
    readonly options: Readonly<EngineOptions>
}
