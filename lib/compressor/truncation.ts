import type { Tokenizer } from "../tokenizer"
import type { ReduceResult } from "./types"

/**
 * Head/tail truncation against a count-only tokenizer.
 *
 * Cuts fall on word boundaries: the content is split into whitespace-attached
 * pieces and the longest fitting run is found by binary search. Token counts
 * of prefixes are assumed to grow with length, which holds for word counting
 * and is close enough for BPE; every candidate is still measured, so the
 * returned text always fits.
 */

const LEADING_WS_PIECES = /\s*\S+/g
const TRAILING_WS_PIECES = /\S+\s*/g

function fits(tokenizer: Tokenizer, text: string, targetTokens: number): boolean {
    return tokenizer.countTokens(text) <= targetTokens
}

/**
 * Largest n in [0, total] for which build(n) fits. build(0) must be "".
 */
function longestFitting(
    tokenizer: Tokenizer,
    total: number,
    targetTokens: number,
    build: (n: number) => string,
): number {
    let lo = 0
    let hi = total
    while (lo < hi) {
        const mid = Math.ceil((lo + hi) / 2)
        if (fits(tokenizer, build(mid), targetTokens)) {
            lo = mid
        } else {
            hi = mid - 1
        }
    }
    return lo
}

function result(tokenizer: Tokenizer, text: string): ReduceResult {
    return { text, tokens: tokenizer.countTokens(text) }
}

/**
 * Keeps the start of the content, dropping tokens from the end.
 */
export function truncateTail(
    tokenizer: Tokenizer,
    content: string,
    targetTokens: number,
): ReduceResult {
    if (fits(tokenizer, content, targetTokens)) {
        return result(tokenizer, content)
    }

    const pieces = content.match(LEADING_WS_PIECES) ?? []
    const kept = longestFitting(tokenizer, pieces.length, targetTokens, (n) =>
        pieces.slice(0, n).join(""),
    )
    if (kept > 0 || targetTokens === 0) {
        return result(tokenizer, pieces.slice(0, kept).join(""))
    }

    // A single leading word is already over target: cut inside it.
    const text = content.trimStart()
    const chars = longestFitting(tokenizer, text.length, targetTokens, (n) => text.slice(0, n))
    return result(tokenizer, text.slice(0, chars))
}

/**
 * Keeps the end of the content, dropping tokens from the start.
 */
export function truncateHead(
    tokenizer: Tokenizer,
    content: string,
    targetTokens: number,
): ReduceResult {
    if (fits(tokenizer, content, targetTokens)) {
        return result(tokenizer, content)
    }

    const pieces = content.match(TRAILING_WS_PIECES) ?? []
    const kept = longestFitting(tokenizer, pieces.length, targetTokens, (n) =>
        pieces.slice(pieces.length - n).join(""),
    )
    if (kept > 0 || targetTokens === 0) {
        return result(tokenizer, pieces.slice(pieces.length - kept).join(""))
    }

    const text = content.trimEnd()
    const chars = longestFitting(tokenizer, text.length, targetTokens, (n) =>
        text.slice(text.length - n),
    )
    return result(tokenizer, text.slice(text.length - chars))
}

const MIN_LINES_FOR_MIDDLE_CUT = 3

function middleMarker(linesRemoved: number): string {
    return `[... ${linesRemoved} lines truncated ...]`
}

/**
 * Keeps a head and a tail block of whole lines with a marker between them,
 * so both the opening (definitions, instructions) and the most recent lines
 * survive. Falls back to truncateTail when the content has too few lines or
 * the split does not fit.
 */
export function truncateMiddle(
    tokenizer: Tokenizer,
    content: string,
    targetTokens: number,
    headRatio: number = 0.5,
): ReduceResult {
    if (fits(tokenizer, content, targetTokens)) {
        return result(tokenizer, content)
    }

    const lines = content.split("\n")
    if (lines.length < MIN_LINES_FOR_MIDDLE_CUT) {
        return truncateTail(tokenizer, content, targetTokens)
    }

    // Size the marker for the worst case so the final text cannot outgrow it.
    const available = targetTokens - tokenizer.countTokens(middleMarker(lines.length))
    if (available <= 0) {
        return truncateTail(tokenizer, content, targetTokens)
    }
    const headTokens = Math.floor(available * headRatio)
    const tailTokens = available - headTokens

    const headLines: string[] = []
    let headTokenCount = 0
    for (const line of lines) {
        const lineTokens = tokenizer.countTokens(line + "\n")
        if (headTokenCount + lineTokens > headTokens) {
            break
        }
        headLines.push(line)
        headTokenCount += lineTokens
    }

    const tailLines: string[] = []
    let tailTokenCount = 0
    for (let i = lines.length - 1; i >= headLines.length; i--) {
        const line = lines[i] ?? ""
        const lineTokens = tokenizer.countTokens(line + "\n")
        if (tailTokenCount + lineTokens > tailTokens) {
            break
        }
        tailLines.unshift(line)
        tailTokenCount += lineTokens
    }

    const linesRemoved = lines.length - headLines.length - tailLines.length
    if (linesRemoved <= 0 || (headLines.length === 0 && tailLines.length === 0)) {
        return truncateTail(tokenizer, content, targetTokens)
    }

    const truncated = [...headLines, middleMarker(linesRemoved), ...tailLines].join("\n")
    if (!fits(tokenizer, truncated, targetTokens)) {
        return truncateTail(tokenizer, content, targetTokens)
    }
    return result(tokenizer, truncated)
}
