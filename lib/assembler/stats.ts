import type { BucketId, PlacementGroup } from "../budget/types"
import { formatPercent, formatTokenCount } from "../utils/string"
import type { AssembledContext } from "./types"

export interface SectionStats {
    bucketId: BucketId
    tokens: number
    placement: PlacementGroup
    allocated: number
    /** True when the section uses less than its allocation. */
    underAllocation: boolean
}

export interface ContextStats {
    policy: string
    totalTokens: number
    budget: number
    /** totalTokens / budget, 0..1. */
    utilization: number
    totalSections: number
    sectionsByPlacement: Record<PlacementGroup, number>
    droppedSections: number
    sections: SectionStats[]
}

export function contextStats(assembled: AssembledContext): ContextStats {
    const sectionsByPlacement: Record<PlacementGroup, number> = { head: 0, middle: 0, tail: 0 }
    const sections = assembled.sections.map((section) => {
        sectionsByPlacement[section.placement]++
        const allocated =
            assembled.allocations.find((a) => a.bucketId === section.bucketId)?.tokens ?? 0
        return {
            bucketId: section.bucketId,
            tokens: section.tokenCount,
            placement: section.placement,
            allocated,
            underAllocation: section.tokenCount < allocated,
        }
    })

    return {
        policy: assembled.policy,
        totalTokens: assembled.totalTokens,
        budget: assembled.budget,
        utilization: assembled.budget > 0 ? assembled.totalTokens / assembled.budget : 0,
        totalSections: sections.length,
        sectionsByPlacement,
        droppedSections: assembled.dropped.length,
        sections,
    }
}

/**
 * Plain-text report, one section per line.
 */
export function formatContextStats(stats: ContextStats): string {
    const lines: string[] = []

    lines.push(`Context (${stats.policy}):`)
    lines.push("─".repeat(48))
    lines.push(
        `  Tokens: ${formatTokenCount(stats.totalTokens)} / ${formatTokenCount(stats.budget)} (${formatPercent(stats.utilization)})`,
    )
    lines.push(
        `  Sections: ${stats.totalSections} (head ${stats.sectionsByPlacement.head}, middle ${stats.sectionsByPlacement.middle}, tail ${stats.sectionsByPlacement.tail})`,
    )
    lines.push(`  Dropped: ${stats.droppedSections}`)

    if (stats.sections.length > 0) {
        lines.push("")
        for (const section of stats.sections) {
            lines.push(
                `  ${section.placement.padEnd(6)} ${section.bucketId.padEnd(12)} ${formatTokenCount(section.tokens).padStart(6)} / ${formatTokenCount(section.allocated)}`,
            )
        }
    }

    return lines.join("\n")
}
