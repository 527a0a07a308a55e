import { existsSync, readFileSync, statSync } from "fs"
import { dirname, join } from "path"
import { homedir } from "os"
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser"
import { z } from "zod"
import { isBucketId, type BucketId } from "../budget/types"
import { ConfigError } from "../errors"
import type { Logger } from "../logger"
import { PolicyEngine } from "../policy/engine"
import type { PolicyDefinition } from "../policy/types"
import { DEFAULT_CONFIG } from "./defaults"
import { bucketSpecsFromConfig } from "./specs"
import {
    ConfigFileSchema,
    type BucketSettings,
    type BucketSettingsInput,
    type ConfigFile,
    type EngineConfig,
} from "./schema"

export const CONFIG_DIR_NAME = ".context-fit"
export const CONFIG_DIR_ENV = "CONTEXT_FIT_CONFIG_DIR"
export const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "context-fit")

const CONFIG_FILE_NAMES = ["config.jsonc", "config.json"] as const

export interface ConfigPaths {
    global: string | null
    configDir: string | null
    project: string | null
}

export interface LoadConfigOptions {
    logger?: Logger
    /** Replaces ~/.config/context-fit. */
    globalDir?: string
    env?: NodeJS.ProcessEnv
}

interface ConfigLoadResult {
    data: unknown
    parseError?: string
}

function findConfigFile(dir: string): string | null {
    for (const name of CONFIG_FILE_NAMES) {
        const candidate = join(dir, name)
        if (existsSync(candidate)) return candidate
    }
    return null
}

/**
 * Walks up from startDir to the nearest `.context-fit` directory.
 */
export function findProjectConfigDir(startDir: string): string | null {
    let current = startDir
    for (;;) {
        const candidate = join(current, CONFIG_DIR_NAME)
        if (existsSync(candidate) && statSync(candidate).isDirectory()) {
            return candidate
        }
        const parent = dirname(current)
        if (parent === current) return null
        current = parent
    }
}

export function getConfigPaths(
    projectDir: string | undefined,
    options: Pick<LoadConfigOptions, "globalDir" | "env"> = {},
): ConfigPaths {
    const env = options.env ?? process.env
    const envDir = env[CONFIG_DIR_ENV]
    const projectConfigDir = projectDir ? findProjectConfigDir(projectDir) : null

    return {
        global: findConfigFile(options.globalDir ?? GLOBAL_CONFIG_DIR),
        configDir: envDir ? findConfigFile(envDir) : null,
        project: projectConfigDir ? findConfigFile(projectConfigDir) : null,
    }
}

export function loadConfigFile(configPath: string): ConfigLoadResult {
    let fileContent: string
    try {
        fileContent = readFileSync(configPath, "utf-8")
    } catch (error) {
        return { data: null, parseError: error instanceof Error ? error.message : String(error) }
    }

    const errors: ParseError[] = []
    const data: unknown = parse(fileContent, errors, { allowTrailingComma: true })
    const first = errors[0]
    if (first) {
        return {
            data: null,
            parseError: `${printParseErrorCode(first.error)} at offset ${first.offset}`,
        }
    }
    if (data === undefined || data === null) {
        return { data: null, parseError: "Config file is empty or invalid" }
    }
    return { data }
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join(".")
        return path ? `${path}: ${issue.message}` : issue.message
    })
}

/**
 * Parses one config layer. Throws ConfigError listing every schema issue.
 */
export function parseConfigFile(raw: unknown): ConfigFile {
    const result = ConfigFileSchema.safeParse(raw)
    if (!result.success) {
        throw new ConfigError("Invalid configuration", formatIssues(result.error))
    }
    return result.data
}

function mergeBucket(
    id: BucketId,
    base: BucketSettings | undefined,
    override: BucketSettingsInput,
): BucketSettings {
    if (!base && override.max === undefined) {
        throw new ConfigError("Invalid configuration", [`buckets.${id}: a new bucket needs max`])
    }
    const from: BucketSettings = base ?? {
        min: 0,
        max: 0,
        weight: 1,
        sticky: false,
        compress: "truncate_tail",
        contentScore: 0.5,
    }
    const merged: BucketSettings = {
        min: override.min ?? from.min,
        max: override.max ?? from.max,
        weight: override.weight ?? from.weight,
        sticky: override.sticky ?? from.sticky,
        compress: override.compress ?? from.compress,
        contentScore: override.contentScore ?? from.contentScore,
    }
    const placement = override.placement ?? from.placement
    if (placement) merged.placement = placement
    return merged
}

function mergeBuckets(
    base: EngineConfig["buckets"],
    override?: ConfigFile["buckets"],
): EngineConfig["buckets"] {
    if (!override) return base

    const merged: EngineConfig["buckets"] = { ...base }
    for (const [id, settings] of Object.entries(override)) {
        if (!settings || !isBucketId(id)) continue
        merged[id] = mergeBucket(id, base[id], settings)
    }
    return merged
}

function mergePolicies(
    base: EngineConfig["policies"],
    override?: ConfigFile["policies"],
): EngineConfig["policies"] {
    if (!override) return base

    const merged: Record<string, PolicyDefinition> = { ...base }
    for (const [name, policy] of Object.entries(override)) {
        merged[name] = policy
    }
    return merged
}

/**
 * Overlays one parsed file on a full config. Objects merge per key, buckets
 * per bucket id, policies are replaced per name.
 */
export function mergeConfig(base: EngineConfig, override: ConfigFile): EngineConfig {
    return {
        debug: override.debug ?? base.debug,
        logFormat: override.logFormat ?? base.logFormat,
        tokenizer: override.tokenizer ?? base.tokenizer,
        model: {
            name: override.model?.name ?? base.model.name,
            contextLimit: override.model?.contextLimit ?? base.model.contextLimit,
            outputTarget: override.model?.outputTarget ?? base.model.outputTarget,
            outputHeadroom: override.model?.outputHeadroom ?? base.model.outputHeadroom,
        },
        systemOverhead: override.systemOverhead ?? base.systemOverhead,
        engine: {
            waterFillChunk: override.engine?.waterFillChunk ?? base.engine.waterFillChunk,
            allowMinViolation: override.engine?.allowMinViolation ?? base.engine.allowMinViolation,
        },
        buckets: mergeBuckets(base.buckets, override.buckets),
        policies: mergePolicies(base.policies, override.policies),
    }
}

/**
 * Validates a config object and layers it on the defaults. Used for config
 * handed over in code; throws ConfigError instead of falling back.
 *
 * The merged result is checked as a whole: a file can be valid on its own
 * and still leave a bucket with min > max, or a policy dropping a bucket
 * another layer made sticky.
 */
export function validateConfig(rawConfig: unknown, base: EngineConfig = DEFAULT_CONFIG): EngineConfig {
    const merged = mergeConfig(base, parseConfigFile(rawConfig))
    // Registering every policy over the merged buckets runs the engine's checks.
    new PolicyEngine(bucketSpecsFromConfig(merged), merged.policies, merged.engine)
    return merged
}

/**
 * Loads global, $CONTEXT_FIT_CONFIG_DIR and project config in that order.
 * A file that fails to parse or validate is logged and skipped.
 */
export function loadConfig(projectDir?: string, options: LoadConfigOptions = {}): EngineConfig {
    const paths = getConfigPaths(projectDir, options)
    let config = DEFAULT_CONFIG

    for (const path of [paths.global, paths.configDir, paths.project]) {
        if (!path) continue

        const result = loadConfigFile(path)
        if (result.parseError !== undefined) {
            options.logger?.warn(`Skipping config ${path}: ${result.parseError}`)
            continue
        }
        try {
            config = validateConfig(result.data, config)
        } catch (error) {
            if (!(error instanceof ConfigError)) throw error
            options.logger?.warn(`Skipping config ${path}: ${error.message}`)
            continue
        }
        options.logger?.debug(`Loaded config ${path}`)
    }

    return config
}
