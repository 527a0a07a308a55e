import { isBucketId, type BucketSpec } from "../budget/types"
import type { EngineConfig } from "./schema"

/**
 * Flattens the per-id bucket map into specs, ascending id.
 */
export function bucketSpecsFromConfig(config: EngineConfig): BucketSpec[] {
    const specs: BucketSpec[] = []
    for (const [id, settings] of Object.entries(config.buckets)) {
        if (!settings || !isBucketId(id)) continue
        specs.push({ id, ...settings })
    }
    return specs.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
}
