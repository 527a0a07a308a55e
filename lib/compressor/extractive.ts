import { ConfigError } from "../errors"
import type { Tokenizer } from "../tokenizer"
import type { UnitScorer } from "./types"

export interface UnitSplit {
    units: string[]
    separator: string
}

/**
 * Paragraphs when there are several, otherwise non-empty lines.
 */
export function splitUnits(content: string): UnitSplit {
    const paragraphs = content
        .split(/\n\s*\n/)
        .map((p) => p.trim())
        .filter((p) => p.length > 0)
    if (paragraphs.length > 1) {
        return { units: paragraphs, separator: "\n\n" }
    }

    const lines = content
        .split("\n")
        .map((l) => l.trimEnd())
        .filter((l) => l.trim().length > 0)
    return { units: lines, separator: "\n" }
}

/** Earlier units score higher. */
export const leadBiasScorer: UnitScorer = (_unit, index) => -index

/**
 * Greedy selection by descending score (ties: earlier unit), accepting a unit
 * whenever the rendered selection still fits. Selected units are rendered in
 * their original order, not score order.
 *
 * Returns the indexes of the selected units, ascending.
 */
export function selectUnits(
    tokenizer: Tokenizer,
    split: UnitSplit,
    targetTokens: number,
    scorer: UnitScorer,
): number[] {
    const scored = split.units.map((unit, index) => {
        const score = scorer(unit, index)
        if (!Number.isFinite(score)) {
            throw new ConfigError("Extractive scorer returned a non-finite score", [
                `unit ${index}: ${String(score)}`,
            ])
        }
        return { index, score }
    })
    scored.sort((a, b) => b.score - a.score || a.index - b.index)

    const selected: number[] = []
    for (const { index } of scored) {
        const candidate = [...selected, index].sort((a, b) => a - b)
        if (tokenizer.countTokens(renderUnits(split, candidate)) <= targetTokens) {
            selected.splice(0, selected.length, ...candidate)
        }
    }
    return selected
}

export function renderUnits(split: UnitSplit, indexes: readonly number[]): string {
    return indexes.map((i) => split.units[i] ?? "").join(split.separator)
}
