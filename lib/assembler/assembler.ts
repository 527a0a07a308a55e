import { randomUUID } from "crypto"
import { BudgetManager } from "../budget/manager"
import { PLACEMENT_GROUPS, type BucketId, type BucketSpec } from "../budget/types"
import type { Compressor } from "../compressor/compressor"
import {
    BudgetOverflow,
    CompressionInfeasible,
    ConfigError,
    DependencyError,
    checkAborted,
    isContextError,
} from "../errors"
import type { Logger } from "../logger"
import type { PolicyEngine } from "../policy/engine"
import type { ResolvedPolicy } from "../policy/types"
import type {
    AssembleRequest,
    AssembledContext,
    ContentSection,
    RenderedSection,
} from "./types"

export interface AssemblerDeps {
    policies: PolicyEngine
    compressor: Compressor
    logger?: Logger
}

interface MergedSection {
    bucketId: BucketId
    content: string
    score: number | undefined
}

interface Reduced {
    text: string
    tokens: number
}

/**
 * Runs one request through policy resolution, allocation, per-bucket
 * compression and placement. Any stage failing fails the call; there is no
 * partial result.
 */
export class ContextAssembler {
    private readonly policies: PolicyEngine
    private readonly compressor: Compressor
    private readonly logger: Logger | undefined

    constructor(deps: AssemblerDeps) {
        this.policies = deps.policies
        this.compressor = deps.compressor
        this.logger = deps.logger
    }

    assemble(request: AssembleRequest): AssembledContext {
        const previousId = this.logger?.getCorrelationId()
        this.logger?.setCorrelationId(request.requestId ?? randomUUID())
        try {
            return this.run(request)
        } finally {
            this.logger?.setCorrelationId(previousId)
        }
    }

    private run(request: AssembleRequest): AssembledContext {
        const { signal } = request

        checkAborted(signal, "RESOLVE_POLICY")
        const policy = this.policies.resolve(request.policy, request.overrides)
        const merged = mergeSections(request.sections, policy)
        this.logger?.debug("Resolved policy", {
            policy: policy.name,
            sections: merged.size,
        })

        checkAborted(signal, "ALLOCATE_BUDGET")
        const manager = new BudgetManager(this.logger)
        manager.configure(policy.buckets)
        const scores: Partial<Record<BucketId, number>> = {}
        for (const section of merged.values()) {
            if (section.score !== undefined) scores[section.bucketId] = section.score
        }
        const allocation = manager.allocate({
            contextLimit: request.contextLimit,
            outputBudget: request.outputBudget,
            overhead: request.overhead,
            scores,
            dropOrder: policy.dropOrder,
            chunkSize: policy.options.waterFillChunk,
            allowMinViolation: policy.options.allowMinViolation,
            signal,
        })

        const specs = new Map<BucketId, BucketSpec>(policy.buckets.map((b) => [b.id, b]))
        const rendered = new Map<BucketId, Reduced>()
        const dropped = new Set<BucketId>(allocation.dropped)

        for (const { bucketId, tokens, dropped: isDropped } of allocation.allocations) {
            checkAborted(signal, "COMPRESS_PER_BUCKET")
            const section = merged.get(bucketId)
            const spec = specs.get(bucketId)
            if (isDropped || !section || !spec || section.content.trim() === "") continue

            const reduced = this.compressBucket(spec, section.content, tokens)
            if (reduced) {
                rendered.set(bucketId, reduced)
            } else {
                dropped.add(bucketId)
            }
        }

        checkAborted(signal, "ASSEMBLE")
        const sections: RenderedSection[] = []
        for (const group of PLACEMENT_GROUPS) {
            for (const bucketId of policy.placement[group]) {
                const reduced = rendered.get(bucketId)
                if (!reduced) continue
                sections.push({
                    bucketId,
                    text: reduced.text,
                    tokenCount: reduced.tokens,
                    placement: group,
                })
            }
        }

        const totalTokens = sections.reduce((sum, s) => sum + s.tokenCount, 0)
        if (totalTokens > allocation.budget) {
            throw new BudgetOverflow(totalTokens, allocation.budget)
        }

        const droppedIds = [...dropped].sort()
        this.logger?.debug("Assembled context", {
            policy: policy.name,
            totalTokens,
            budget: allocation.budget,
            sections: sections.length,
            dropped: droppedIds,
        })

        return {
            sections,
            totalTokens,
            dropped: droppedIds,
            budget: allocation.budget,
            allocations: allocation.allocations,
            policy: policy.name,
            text: sections.map((s) => s.text).join("\n\n"),
        }
    }

    /**
     * Fits one bucket's content into its allocation. Returns undefined when a
     * droppable bucket has to go; a sticky bucket that cannot fit is fatal.
     */
    private compressBucket(spec: BucketSpec, content: string, tokens: number): Reduced | undefined {
        if (tokens === 0) {
            if (spec.sticky) {
                throw new CompressionInfeasible(
                    "Sticky bucket has content but no allocation",
                    spec.compress,
                    0,
                    spec.id,
                )
            }
            this.logger?.info(`Dropped bucket '${spec.id}': no allocation for its content`)
            return undefined
        }

        try {
            return this.compressor.reduce(content, tokens, spec.compress)
        } catch (error) {
            if (!(error instanceof CompressionInfeasible)) {
                throw isContextError(error) ? error : new DependencyError("compressor", error)
            }
            if (spec.sticky) {
                throw error.forBucket(spec.id)
            }
            this.logger?.info(`Dropped bucket '${spec.id}': ${error.message}`, {
                strategy: spec.compress,
                allocation: tokens,
            })
            return undefined
        }
    }
}

/**
 * Joins sections that share a bucket, in request order: content separated by
 * a blank line, highest score wins.
 */
function mergeSections(
    sections: readonly ContentSection[],
    policy: ResolvedPolicy,
): Map<BucketId, MergedSection> {
    const configured = new Set<string>(policy.buckets.map((b) => b.id))
    const issues: string[] = []
    const merged = new Map<BucketId, MergedSection>()

    sections.forEach((section, index) => {
        if (!configured.has(section.bucketId)) {
            issues.push(`sections[${index}]: bucket '${section.bucketId}' is not configured`)
            return
        }
        if (section.score !== undefined && !Number.isFinite(section.score)) {
            issues.push(`sections[${index}]: score must be finite, got ${section.score}`)
            return
        }

        const existing = merged.get(section.bucketId)
        if (!existing) {
            merged.set(section.bucketId, {
                bucketId: section.bucketId,
                content: section.content,
                score: section.score,
            })
            return
        }
        existing.content = `${existing.content}\n\n${section.content}`
        if (section.score !== undefined) {
            existing.score =
                existing.score === undefined ? section.score : Math.max(existing.score, section.score)
        }
    })

    if (issues.length > 0) {
        throw new ConfigError("Invalid sections", issues)
    }
    return merged
}
