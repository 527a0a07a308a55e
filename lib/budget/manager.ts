import { BudgetExhausted, ConfigError, checkAborted } from "../errors"
import type { Logger } from "../logger"
import { validateBucketSpecs, validateDropOrder } from "./validate"
import type {
    Allocation,
    AllocateRequest,
    AllocationResult,
    BucketId,
    BucketSpec,
} from "./types"

/** Tokens handed out per water-filling round unless the request says otherwise. */
export const DEFAULT_WATER_FILL_CHUNK = 32

interface WorkingBucket {
    spec: BucketSpec
    min: number
    tokens: number
    score: number
    dropped: boolean
}

function byId(a: { id: string }, b: { id: string }): number {
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/**
 * Splits B across buckets.
 *
 *   1. B = contextLimit - outputBudget - overhead
 *   2. if Σmin > B, drop buckets in drop order until the minimums fit
 *   3. min_i + weight share of (B - Σmin), capped at max_i, integer remainder
 *      to the heaviest buckets
 *   4. water filling: leftover goes chunk by chunk to the bucket with the
 *      highest score / (1 + allocation)
 *
 * Buckets are always visited in ascending id order so the same input gives
 * the same allocation on every run.
 */
export class BudgetManager {
    private buckets: readonly BucketSpec[] = []

    constructor(private readonly logger?: Logger) {}

    configure(bucketSpecs: readonly BucketSpec[]): void {
        const issues = validateBucketSpecs(bucketSpecs)
        if (issues.length > 0) {
            throw new ConfigError("Invalid bucket configuration", issues)
        }
        this.buckets = Object.freeze(
            [...bucketSpecs].sort(byId).map((spec) => Object.freeze({ ...spec })),
        )
    }

    get configuredBuckets(): readonly BucketSpec[] {
        return this.buckets
    }

    allocate(request: AllocateRequest): AllocationResult {
        // Snapshot: a concurrent configure() swaps the array, never mutates it.
        const buckets = this.buckets
        checkAborted(request.signal, "ALLOCATE_BUDGET")

        const chunkSize = request.chunkSize ?? DEFAULT_WATER_FILL_CHUNK
        const requestIssues: string[] = []
        for (const field of ["contextLimit", "outputBudget", "overhead"] as const) {
            const value = request[field]
            if (!Number.isInteger(value) || value < 0) {
                requestIssues.push(`${field} must be a non-negative integer, got ${value}`)
            }
        }
        if (!Number.isInteger(chunkSize) || chunkSize < 1) {
            requestIssues.push(`chunkSize must be a positive integer, got ${chunkSize}`)
        }
        if (requestIssues.length > 0) {
            throw new ConfigError("Invalid allocation request", requestIssues)
        }
        const dropIssues = validateDropOrder(request.dropOrder ?? [], buckets)
        if (dropIssues.length > 0) {
            throw new ConfigError("Invalid drop order", dropIssues)
        }

        const budget = request.contextLimit - request.outputBudget - request.overhead
        if (budget <= 0) {
            throw new BudgetExhausted(
                `No input budget left: ${request.contextLimit} - ${request.outputBudget} - ${request.overhead} = ${budget}`,
                { budget },
            )
        }

        const working = buckets.map((spec) => ({
            spec,
            min: spec.min,
            tokens: 0,
            score: this.scoreFor(spec, request.scores),
            dropped: false,
        }))

        const minViolated = this.fitMinimums(working, budget, request)
        const active = working.filter((b) => !b.dropped)

        this.distribute(active, budget)
        this.waterFill(active, budget, chunkSize, request.signal)

        const allocations: Allocation[] = working.map((b) =>
            Object.freeze({ bucketId: b.spec.id, tokens: b.tokens, dropped: b.dropped }),
        )
        const dropped = working.filter((b) => b.dropped).map((b) => b.spec.id)
        const totalAllocated = allocations.reduce((sum, a) => sum + a.tokens, 0)

        this.logger?.debug("Allocated budget", {
            budget,
            totalAllocated,
            dropped,
            minViolated,
        })

        return Object.freeze({
            budget,
            allocations: Object.freeze(allocations),
            dropped: Object.freeze(dropped),
            totalAllocated,
            minViolated,
        })
    }

    private scoreFor(spec: BucketSpec, scores: AllocateRequest["scores"]): number {
        const score = scores?.[spec.id] ?? spec.contentScore
        if (!Number.isFinite(score)) {
            throw new ConfigError("Invalid allocation request", [
                `score for '${spec.id}' must be finite, got ${score}`,
            ])
        }
        return score
    }

    /**
     * Step 2. Marks buckets dropped (in drop order) until the minimums fit.
     * Returns true when minimums had to be scaled down instead.
     */
    private fitMinimums(
        working: WorkingBucket[],
        budget: number,
        request: AllocateRequest,
    ): boolean {
        const stickyMin = working.filter((b) => b.spec.sticky).reduce((s, b) => s + b.min, 0)
        if (stickyMin > budget) {
            throw new BudgetExhausted(
                `Sticky bucket minimums need ${stickyMin} tokens, budget is ${budget}`,
                { budget, stickyMin },
            )
        }

        let sumMin = working.reduce((s, b) => s + b.min, 0)
        for (const id of request.dropOrder ?? []) {
            if (sumMin <= budget) break
            const bucket = working.find((b) => b.spec.id === id)
            if (!bucket || bucket.spec.sticky || bucket.dropped) continue

            bucket.dropped = true
            sumMin -= bucket.min
            bucket.min = 0
            this.logger?.info(`Dropped bucket '${id}' to fit minimums`, { sumMin, budget })
        }

        if (sumMin <= budget) {
            return false
        }
        if (!request.allowMinViolation) {
            throw new BudgetExhausted(
                `Bucket minimums need ${sumMin} tokens after the drop order, budget is ${budget}`,
                { budget, sumMin },
            )
        }

        // Sticky floors stay whole; the others share what the sticky ones leave.
        const flexibleMin = sumMin - stickyMin
        for (const bucket of working) {
            if (!bucket.dropped && !bucket.spec.sticky) {
                bucket.min = Math.floor((bucket.min * (budget - stickyMin)) / flexibleMin)
            }
        }
        this.logger?.warn("Scaled bucket minimums below their configured floor", {
            budget,
            sumMin,
        })
        return true
    }

    /**
     * Step 3. Weighted share of what is left above the minimums.
     */
    private distribute(active: WorkingBucket[], budget: number): void {
        const sumMin = active.reduce((s, b) => s + b.min, 0)
        const remaining = budget - sumMin
        const totalWeight = active.reduce((s, b) => s + b.spec.weight, 0)

        const shares = active.map((b) =>
            totalWeight > 0 ? Math.floor((b.spec.weight * remaining) / totalWeight) : 0,
        )

        let remainder = totalWeight > 0 ? remaining - shares.reduce((s, x) => s + x, 0) : 0
        const heaviestFirst = active
            .map((b, index) => ({ index, weight: b.spec.weight }))
            .filter((x) => x.weight > 0)
            .sort((a, b) => b.weight - a.weight || a.index - b.index)
        for (let i = 0; remainder > 0 && heaviestFirst.length > 0; i++) {
            const target = heaviestFirst[i % heaviestFirst.length]
            if (!target) break
            shares[target.index] = (shares[target.index] ?? 0) + 1
            remainder--
        }

        active.forEach((b, index) => {
            b.tokens = Math.min(b.spec.max, b.min + (shares[index] ?? 0))
        })
    }

    /**
     * Step 4. Hands the leftover to whichever bucket gains the most per token.
     */
    private waterFill(
        active: WorkingBucket[],
        budget: number,
        chunkSize: number,
        signal: AbortSignal | undefined,
    ): void {
        let leftover = budget - active.reduce((s, b) => s + b.tokens, 0)

        while (leftover > 0) {
            checkAborted(signal, "ALLOCATE_BUDGET")

            let best: WorkingBucket | undefined
            let bestDensity = -Infinity
            // active is in ascending id order, so strict > keeps the lower id on ties.
            for (const bucket of active) {
                if (bucket.tokens >= bucket.spec.max) continue
                const density = bucket.score / (1 + bucket.tokens)
                if (best === undefined || density > bestDensity) {
                    best = bucket
                    bestDensity = density
                }
            }
            if (!best) break

            const step = Math.min(chunkSize, leftover, best.spec.max - best.tokens)
            best.tokens += step
            leftover -= step
        }
    }
}

/**
 * Looks up one bucket's allocation in a result.
 */
export function allocationFor(result: AllocationResult, bucketId: BucketId): Allocation | undefined {
    return result.allocations.find((a) => a.bucketId === bucketId)
}
