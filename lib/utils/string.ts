/**
 * Formatting helpers for log lines and stats.
 */

/**
 * Formats a token count for display (e.g., 1500 -> "1.5K").
 */
export function formatTokenCount(tokens: number): string {
    if (tokens >= 1000) {
        return `${(tokens / 1000).toFixed(1)}K`.replace(".0K", "K")
    }
    return tokens.toString()
}

/**
 * Formats a 0..1 ratio as a whole-number percentage.
 */
export function formatPercent(ratio: number): string {
    return `${Math.round(ratio * 100)}%`
}
