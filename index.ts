import { ContextAssembler } from "./lib/assembler"
import type { AssembledContext, ContentSection } from "./lib/assembler"
import { Compressor } from "./lib/compressor"
import type { SignatureExtractor, Summarizer, UnitScorer } from "./lib/compressor"
import {
    ConfigService,
    DEFAULT_CONFIG,
    DEFAULT_POLICY,
    bucketSpecsFromConfig,
    type EngineConfig,
} from "./lib/config"
import { Logger } from "./lib/logger"
import { PolicyEngine } from "./lib/policy/engine"
import type { PolicyOverrides } from "./lib/policy/types"
import { createTokenizer, type Tokenizer } from "./lib/tokenizer"

export interface ContextEngineOptions {
    /** Used as is. When absent, config is loaded for projectDir, or the defaults apply. */
    config?: EngineConfig
    projectDir?: string
    tokenizer?: Tokenizer
    summarizer?: Summarizer
    signatureExtractor?: SignatureExtractor
    unitScorer?: UnitScorer
    logger?: Logger
}

export interface AssembleOptions {
    overrides?: PolicyOverrides
    /** Defaults to config.model.contextLimit. */
    contextLimit?: number
    /** Defaults to outputTarget + outputHeadroom. */
    outputBudget?: number
    /** Defaults to config.systemOverhead. */
    overhead?: number
    requestId?: string
    signal?: AbortSignal
}

export interface ContextEngine {
    config: EngineConfig
    tokenizer: Tokenizer
    policies: PolicyEngine
    assembler: ContextAssembler
    logger: Logger
    assemble(
        sections: readonly ContentSection[],
        policy?: string,
        options?: AssembleOptions,
    ): AssembledContext
}

export function createContextEngine(options: ContextEngineOptions = {}): ContextEngine {
    const config =
        options.config ??
        (options.projectDir !== undefined
            ? new ConfigService(options.logger).load(options.projectDir)
            : DEFAULT_CONFIG)

    const logger = options.logger ?? new Logger(config.debug, { format: config.logFormat })
    const tokenizer = options.tokenizer ?? createTokenizer(config.tokenizer)
    const policies = new PolicyEngine(
        bucketSpecsFromConfig(config),
        config.policies,
        config.engine,
        logger,
    )
    const compressor = new Compressor({
        tokenizer,
        summarizer: options.summarizer,
        signatureExtractor: options.signatureExtractor,
        scorer: options.unitScorer,
        logger,
    })
    const assembler = new ContextAssembler({ policies, compressor, logger })

    logger.info("Context engine initialized", {
        model: config.model.name,
        tokenizer: tokenizer.name,
        policies: policies.list(),
    })

    return {
        config,
        tokenizer,
        policies,
        assembler,
        logger,
        assemble(sections, policy = DEFAULT_POLICY, assembleOptions = {}) {
            return assembler.assemble({
                sections,
                policy,
                overrides: assembleOptions.overrides,
                contextLimit: assembleOptions.contextLimit ?? config.model.contextLimit,
                outputBudget:
                    assembleOptions.outputBudget ??
                    config.model.outputTarget + config.model.outputHeadroom,
                overhead: assembleOptions.overhead ?? config.systemOverhead,
                requestId: assembleOptions.requestId,
                signal: assembleOptions.signal,
            })
        },
    }
}

export { ContextAssembler, contextStats, formatContextStats } from "./lib/assembler"
export type {
    AssembleRequest,
    AssembledContext,
    ContentSection,
    ContextStats,
    RenderedSection,
} from "./lib/assembler"
export { BudgetManager, DEFAULT_WATER_FILL_CHUNK, allocationFor } from "./lib/budget/manager"
export { KNOWN_BUCKET_IDS, PLACEMENT_GROUPS, isBucketId } from "./lib/budget/types"
export type {
    AllocateRequest,
    Allocation,
    AllocationResult,
    BucketId,
    BucketSpec,
    PlacementGroup,
} from "./lib/budget/types"
export { COMPRESS_STRATEGIES, Compressor } from "./lib/compressor"
export type {
    CompressStrategy,
    ReduceResult,
    SignatureExtractor,
    Summarizer,
    UnitScorer,
} from "./lib/compressor"
export {
    ConfigService,
    DEFAULT_CONFIG,
    DEFAULT_POLICY,
    getGlobalConfigService,
    loadConfig,
    validateConfig,
} from "./lib/config"
export type { ConfigFile, EngineConfig } from "./lib/config"
export {
    AssemblyAborted,
    BudgetExhausted,
    BudgetOverflow,
    CompressionInfeasible,
    ConfigError,
    ContextError,
    DependencyError,
    isContextError,
} from "./lib/errors"
export { toChatMessages } from "./lib/formatter"
export type { ChatMessage, ChatRole } from "./lib/formatter"
export { Logger, createSilentLogger } from "./lib/logger"
export { PolicyEngine } from "./lib/policy/engine"
export type { PolicyDefinition, PolicyOverrides, ResolvedPolicy } from "./lib/policy/types"
export { AnthropicTokenizer, WordTokenizer, createTokenizer } from "./lib/tokenizer"
export type { Tokenizer } from "./lib/tokenizer"
