import { CompressionInfeasible, ConfigError, DependencyError } from "../errors"
import type { Logger } from "../logger"
import type { Tokenizer } from "../tokenizer"
import { leadBiasScorer, renderUnits, selectUnits, splitUnits } from "./extractive"
import { defaultSignatureExtractor } from "./signature"
import { truncateHead, truncateMiddle, truncateTail } from "./truncation"
import type {
    CompressStrategy,
    ReduceOptions,
    ReduceResult,
    SignatureExtractor,
    Summarizer,
    UnitScorer,
} from "./types"

export interface CompressorDeps {
    tokenizer: Tokenizer
    summarizer?: Summarizer
    signatureExtractor?: SignatureExtractor
    scorer?: UnitScorer
    logger?: Logger
}

/**
 * Fits content into a token target with one of the reduction strategies.
 *
 * All strategies except `abstractive` are deterministic. Content that already
 * fits is returned unchanged by every strategy.
 */
export class Compressor {
    private readonly tokenizer: Tokenizer
    private readonly summarizer: Summarizer | undefined
    private readonly signatureExtractor: SignatureExtractor
    private readonly scorer: UnitScorer
    private readonly logger: Logger | undefined

    constructor(deps: CompressorDeps) {
        this.tokenizer = deps.tokenizer
        this.summarizer = deps.summarizer
        this.signatureExtractor = deps.signatureExtractor ?? defaultSignatureExtractor
        this.scorer = deps.scorer ?? leadBiasScorer
        this.logger = deps.logger
    }

    reduce(
        content: string,
        targetTokens: number,
        strategy: CompressStrategy,
        options: ReduceOptions = {},
    ): ReduceResult {
        if (!Number.isInteger(targetTokens) || targetTokens < 0) {
            throw new ConfigError("Invalid compression target", [
                `targetTokens must be a non-negative integer, got ${targetTokens}`,
            ])
        }

        const originalTokens = this.tokenizer.countTokens(content)
        if (originalTokens <= targetTokens) {
            return { text: content, tokens: originalTokens }
        }

        const reduced = this.apply(content, targetTokens, strategy, options)
        this.logger?.debug(`Reduced content with ${strategy}`, {
            originalTokens,
            targetTokens,
            tokens: reduced.tokens,
        })
        return reduced
    }

    private apply(
        content: string,
        targetTokens: number,
        strategy: CompressStrategy,
        options: ReduceOptions,
    ): ReduceResult {
        switch (strategy) {
            case "none":
                throw new CompressionInfeasible(
                    `Content exceeds ${targetTokens} tokens and strategy 'none' cannot reduce it`,
                    strategy,
                    targetTokens,
                )
            case "truncate_head":
                return truncateHead(this.tokenizer, content, targetTokens)
            case "truncate_tail":
                return truncateTail(this.tokenizer, content, targetTokens)
            case "truncate_middle":
                return truncateMiddle(this.tokenizer, content, targetTokens, options.headRatio)
            case "signature_only":
                return this.signaturesOnly(content, targetTokens, options)
            case "extractive":
                return this.extract(content, targetTokens, options)
            case "abstractive":
                return this.summarize(content, targetTokens)
        }
    }

    private signaturesOnly(
        content: string,
        targetTokens: number,
        options: ReduceOptions,
    ): ReduceResult {
        const extractor = options.signatureExtractor ?? this.signatureExtractor
        const signatures = extractor(content)
        if (signatures.length === 0) {
            throw new CompressionInfeasible(
                "No signatures found to keep",
                "signature_only",
                targetTokens,
            )
        }

        const text = signatures.join("\n")
        const tokens = this.tokenizer.countTokens(text)
        if (tokens > targetTokens) {
            throw new CompressionInfeasible(
                `Signatures alone need ${tokens} tokens, target is ${targetTokens}`,
                "signature_only",
                targetTokens,
            )
        }
        return { text, tokens }
    }

    private extract(content: string, targetTokens: number, options: ReduceOptions): ReduceResult {
        const split = splitUnits(content)
        const selected = selectUnits(
            this.tokenizer,
            split,
            targetTokens,
            options.scorer ?? this.scorer,
        )
        if (selected.length === 0) {
            throw new CompressionInfeasible(
                `No unit fits in ${targetTokens} tokens`,
                "extractive",
                targetTokens,
            )
        }

        const text = renderUnits(split, selected)
        return { text, tokens: this.tokenizer.countTokens(text) }
    }

    private summarize(content: string, targetTokens: number): ReduceResult {
        if (!this.summarizer) {
            throw new ConfigError("Strategy 'abstractive' needs a summarizer")
        }

        let summary: string
        try {
            summary = this.summarizer(content, targetTokens)
        } catch (error) {
            throw error instanceof DependencyError
                ? error
                : new DependencyError("summarizer", error)
        }

        // Summaries are advisory about length; the budget is not.
        return truncateTail(this.tokenizer, summary, targetTokens)
    }
}
