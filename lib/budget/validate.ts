import { isCompressStrategy } from "../compressor/types"
import { duplicates } from "../utils/array"
import { PLACEMENT_GROUPS, isBucketId, type BucketSpec } from "./types"

/**
 * Checks bucket specs and returns one message per problem (empty when valid).
 */
export function validateBucketSpecs(specs: readonly BucketSpec[]): string[] {
    const issues: string[] = []

    for (const id of duplicates(specs.map((s) => s.id))) {
        issues.push(`duplicate bucket id '${id}'`)
    }

    for (const spec of specs) {
        const label = `bucket '${spec.id}'`
        if (!isBucketId(spec.id)) {
            issues.push(`${label}: unknown id (custom buckets must match x-<name>)`)
        }
        if (!Number.isInteger(spec.min) || spec.min < 0) {
            issues.push(`${label}: min must be a non-negative integer`)
        }
        if (!Number.isInteger(spec.max) || spec.max < 0) {
            issues.push(`${label}: max must be a non-negative integer`)
        }
        if (spec.min > spec.max) {
            issues.push(`${label}: min (${spec.min}) > max (${spec.max})`)
        }
        if (!Number.isFinite(spec.weight) || spec.weight < 0) {
            issues.push(`${label}: weight must be a finite number >= 0`)
        }
        if (!Number.isFinite(spec.contentScore)) {
            issues.push(`${label}: contentScore must be finite`)
        }
        if (!isCompressStrategy(spec.compress)) {
            issues.push(`${label}: unknown compress strategy '${spec.compress}'`)
        }
        if (spec.placement !== undefined && !PLACEMENT_GROUPS.includes(spec.placement)) {
            issues.push(`${label}: unknown placement '${spec.placement}'`)
        }
    }

    return issues
}

/**
 * Checks a drop order against the configured buckets: every id must exist,
 * appear once and not be sticky.
 */
export function validateDropOrder(
    dropOrder: readonly string[],
    specs: readonly BucketSpec[],
): string[] {
    const issues: string[] = []
    const byId = new Map<string, BucketSpec>(specs.map((s) => [s.id, s]))

    for (const id of duplicates(dropOrder)) {
        issues.push(`drop order lists '${id}' more than once`)
    }
    for (const id of dropOrder) {
        const spec = byId.get(id)
        if (!spec) {
            issues.push(`drop order names unknown bucket '${id}'`)
        } else if (spec.sticky) {
            issues.push(`drop order names sticky bucket '${id}'`)
        }
    }
    return issues
}
