/**
 * Returns the values that occur more than once, in first-duplicate order.
 */
export function duplicates<T>(array: readonly T[]): T[] {
    const seen = new Set<T>()
    const repeated = new Set<T>()
    for (const item of array) {
        if (seen.has(item)) {
            repeated.add(item)
        }
        seen.add(item)
    }
    return [...repeated]
}
