import { PLACEMENT_GROUPS, type BucketId, type BucketSpec, type PlacementGroup } from "../budget/types"
import { validateBucketSpecs, validateDropOrder } from "../budget/validate"
import { ConfigError } from "../errors"
import type { Logger } from "../logger"
import { duplicates } from "../utils/array"
import type {
    BucketOverride,
    EngineOptions,
    PlacementMap,
    PolicyDefinition,
    PolicyOverrides,
    ResolvedPolicy,
} from "./types"

interface PolicyLayer {
    dropOrder: readonly BucketId[]
    placement: Partial<PlacementMap>
    buckets: BucketSpec[]
    options: EngineOptions
}

/**
 * Applies one override layer. Scalars replace, lists replace wholesale;
 * nothing is merged element-wise.
 */
export function applyOverrides(layer: PolicyLayer, overrides: PolicyOverrides | undefined): PolicyLayer {
    if (!overrides) return layer

    const unknown = Object.keys(overrides.buckets ?? {}).filter(
        (id) => !layer.buckets.some((b) => b.id === id),
    )
    if (unknown.length > 0) {
        throw new ConfigError(
            "Overrides target unconfigured buckets",
            unknown.map((id) => `unknown bucket '${id}'`),
        )
    }

    return {
        dropOrder: overrides.dropOrder ? [...overrides.dropOrder] : layer.dropOrder,
        placement: { ...layer.placement, ...copyPlacement(overrides.placement ?? {}) },
        buckets: layer.buckets.map((bucket) => overrideBucket(bucket, overrides.buckets?.[bucket.id])),
        options: {
            waterFillChunk: overrides.waterFillChunk ?? layer.options.waterFillChunk,
            allowMinViolation: overrides.allowMinViolation ?? layer.options.allowMinViolation,
        },
    }
}

function overrideBucket(bucket: BucketSpec, override: BucketOverride | undefined): BucketSpec {
    if (!override) return bucket
    const next: BucketSpec = { ...bucket }
    if (override.min !== undefined) next.min = override.min
    if (override.max !== undefined) next.max = override.max
    if (override.weight !== undefined) next.weight = override.weight
    if (override.sticky !== undefined) next.sticky = override.sticky
    if (override.compress !== undefined) next.compress = override.compress
    if (override.placement !== undefined) next.placement = override.placement
    if (override.contentScore !== undefined) next.contentScore = override.contentScore
    return next
}

function copyPlacement(placement: Partial<PlacementMap>): Partial<PlacementMap> {
    const copy: Partial<PlacementMap> = {}
    for (const group of PLACEMENT_GROUPS) {
        const ids = placement[group]
        if (ids) copy[group] = [...ids]
    }
    return copy
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child)
        }
        Object.freeze(value)
    }
    return value
}

/**
 * Named policies over one bucket configuration. resolve() layers the base
 * policy's own overrides, then the request's, and returns a frozen snapshot.
 */
export class PolicyEngine {
    private readonly policies = new Map<string, PolicyDefinition>()
    private readonly buckets: readonly BucketSpec[]

    constructor(
        buckets: readonly BucketSpec[],
        policies: Record<string, PolicyDefinition>,
        private readonly defaults: EngineOptions,
        private readonly logger?: Logger,
    ) {
        const issues = validateBucketSpecs(buckets)
        if (issues.length > 0) {
            throw new ConfigError("Invalid bucket configuration", issues)
        }
        this.buckets = deepFreeze(buckets.map((b) => ({ ...b })))

        for (const [name, policy] of Object.entries(policies)) {
            this.register(name, policy)
        }
    }

    /**
     * Adds or replaces a policy. The policy is resolved once up front so a
     * broken definition fails here rather than on the first request.
     */
    register(name: string, policy: PolicyDefinition): void {
        const snapshot = deepFreeze(structuredClone(policy))
        this.resolveDefinition(name, snapshot, undefined)
        this.policies.set(name, snapshot)
    }

    has(name: string): boolean {
        return this.policies.has(name)
    }

    list(): string[] {
        return [...this.policies.keys()]
    }

    resolve(name: string, overrides?: PolicyOverrides): ResolvedPolicy {
        const policy = this.policies.get(name)
        if (!policy) {
            throw new ConfigError(`Unknown policy '${name}'`, [
                `available: ${this.list().join(", ") || "none"}`,
            ])
        }
        const resolved = this.resolveDefinition(name, policy, overrides)
        this.logger?.debug(`Resolved policy '${name}'`, {
            dropOrder: [...resolved.dropOrder],
            overridden: overrides !== undefined,
        })
        return resolved
    }

    private resolveDefinition(
        name: string,
        policy: PolicyDefinition,
        overrides: PolicyOverrides | undefined,
    ): ResolvedPolicy {
        const base: PolicyLayer = {
            dropOrder: policy.dropOrder,
            placement: copyPlacement(policy.placement),
            buckets: this.buckets.map((b) => ({ ...b })),
            options: { ...this.defaults },
        }
        const layer = applyOverrides(applyOverrides(base, policy.overrides), overrides)

        const issues = [
            ...validateBucketSpecs(layer.buckets),
            ...validateDropOrder(layer.dropOrder, layer.buckets),
            ...validatePlacement(layer.placement, layer.buckets),
        ]
        if (!Number.isInteger(layer.options.waterFillChunk) || layer.options.waterFillChunk < 1) {
            issues.push("waterFillChunk must be a positive integer")
        }
        if (issues.length > 0) {
            throw new ConfigError(`Invalid policy '${name}'`, issues)
        }

        return deepFreeze({
            name,
            dropOrder: [...layer.dropOrder],
            placement: completePlacement(layer.placement, layer.buckets),
            buckets: layer.buckets,
            options: layer.options,
        })
    }
}

function validatePlacement(
    placement: Partial<PlacementMap>,
    buckets: readonly BucketSpec[],
): string[] {
    const issues: string[] = []
    const placed = PLACEMENT_GROUPS.flatMap((group) => placement[group] ?? [])
    for (const id of duplicates(placed)) {
        issues.push(`placement lists '${id}' more than once`)
    }
    for (const id of placed) {
        if (!buckets.some((b) => b.id === id)) {
            issues.push(`placement names unknown bucket '${id}'`)
        }
    }
    return issues
}

/**
 * Policy lists first; unplaced buckets follow in ascending id order, in their
 * own group when they declare one and in the middle otherwise.
 */
function completePlacement(
    placement: Partial<PlacementMap>,
    buckets: readonly BucketSpec[],
): PlacementMap {
    const result: Record<PlacementGroup, BucketId[]> = {
        head: [...(placement.head ?? [])],
        middle: [...(placement.middle ?? [])],
        tail: [...(placement.tail ?? [])],
    }
    const placed = new Set<BucketId>([...result.head, ...result.middle, ...result.tail])
    const unplaced = buckets
        .filter((b) => !placed.has(b.id))
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    for (const bucket of unplaced) {
        result[bucket.placement ?? "middle"].push(bucket.id)
    }
    return result
}
