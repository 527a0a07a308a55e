import { z } from "zod"
import { PLACEMENT_GROUPS, isBucketId, type BucketId, type BucketSpec } from "../budget/types"
import { COMPRESS_STRATEGIES } from "../compressor/types"
import type { LogFormat } from "../logger"
import type { PolicyDefinition, EngineOptions } from "../policy/types"
import type { TokenizerBackend } from "../tokenizer/types"

/**
 * Schemas for one configuration file. Every field is optional: a file only
 * carries what it changes. Unknown keys are rejected so typos surface.
 */

export const BucketIdSchema = z.custom<BucketId>(
    (value) => typeof value === "string" && isBucketId(value),
    { message: "unknown bucket id (custom buckets must match x-<name>)" },
)

export const BucketSettingsSchema = z
    .object({
        min: z.number().int().nonnegative().optional(),
        max: z.number().int().nonnegative().optional(),
        weight: z.number().finite().nonnegative().optional(),
        sticky: z.boolean().optional(),
        compress: z.enum(COMPRESS_STRATEGIES).optional(),
        placement: z.enum(PLACEMENT_GROUPS).optional(),
        contentScore: z.number().finite().optional(),
    })
    .strict()

export const PlacementSchema = z
    .object({
        head: z.array(BucketIdSchema).optional(),
        middle: z.array(BucketIdSchema).optional(),
        tail: z.array(BucketIdSchema).optional(),
    })
    .strict()

export const PolicyOverridesSchema = z
    .object({
        dropOrder: z.array(BucketIdSchema).optional(),
        placement: PlacementSchema.optional(),
        buckets: z.record(BucketIdSchema, BucketSettingsSchema).optional(),
        waterFillChunk: z.number().int().positive().optional(),
        allowMinViolation: z.boolean().optional(),
    })
    .strict()

export const PolicySchema = z
    .object({
        dropOrder: z.array(BucketIdSchema).default([]),
        placement: PlacementSchema.default({}),
        overrides: PolicyOverridesSchema.optional(),
    })
    .strict()

export const ModelSchema = z
    .object({
        name: z.string().min(1).optional(),
        contextLimit: z.number().int().positive().optional(),
        outputTarget: z.number().int().nonnegative().optional(),
        outputHeadroom: z.number().int().nonnegative().optional(),
    })
    .strict()

export const ConfigFileSchema = z
    .object({
        $schema: z.string().optional(),
        debug: z.boolean().optional(),
        logFormat: z.enum(["text", "json"]).optional(),
        tokenizer: z.enum(["anthropic", "simple"]).optional(),
        model: ModelSchema.optional(),
        systemOverhead: z.number().int().nonnegative().optional(),
        engine: z
            .object({
                waterFillChunk: z.number().int().positive().optional(),
                allowMinViolation: z.boolean().optional(),
            })
            .strict()
            .optional(),
        buckets: z.record(BucketIdSchema, BucketSettingsSchema).optional(),
        policies: z.record(z.string().min(1), PolicySchema).optional(),
    })
    .strict()

export type BucketSettingsInput = z.infer<typeof BucketSettingsSchema>
export type ConfigFile = z.infer<typeof ConfigFileSchema>

export type BucketSettings = Omit<BucketSpec, "id">

export interface ModelConfig {
    name: string
    contextLimit: number
    outputTarget: number
    outputHeadroom: number
}

/** Fully resolved configuration. Every field is present. */
export interface EngineConfig {
    debug: boolean
    logFormat: LogFormat
    tokenizer: TokenizerBackend
    model: ModelConfig
    systemOverhead: number
    engine: EngineOptions
    buckets: Partial<Record<BucketId, BucketSettings>>
    policies: Record<string, PolicyDefinition>
}
