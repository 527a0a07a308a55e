import { ConfigError } from "../errors"
import type { Logger } from "../logger"
import { DEFAULT_CONFIG } from "./defaults"
import { loadConfig, type LoadConfigOptions } from "./loader"
import type { EngineConfig } from "./schema"

/**
 * Holds the configuration for one project directory.
 *
 * ```typescript
 * const configService = new ConfigService()
 * configService.load(projectDir)
 * const config = configService.get()
 * ```
 */
export class ConfigService {
    private config: EngineConfig | null = null
    private projectDir: string | undefined
    private options: LoadConfigOptions = {}
    private loaded = false

    constructor(private readonly logger?: Logger) {}

    /**
     * Loads and merges global, env-dir and project config over the defaults.
     */
    load(projectDir?: string, options: Omit<LoadConfigOptions, "logger"> = {}): EngineConfig {
        this.projectDir = projectDir
        this.options = { ...options, logger: this.logger }
        this.config = loadConfig(projectDir, this.options)
        this.loaded = true
        return this.config
    }

    /**
     * Throws if load() hasn't been called.
     */
    get(): EngineConfig {
        if (!this.config) {
            throw new ConfigError("Configuration not loaded. Call load() first.")
        }
        return this.config
    }

    getOrDefault(): EngineConfig {
        return this.config ?? DEFAULT_CONFIG
    }

    isLoaded(): boolean {
        return this.config !== null
    }

    /** Re-reads the same files; picks up edits made since load(). */
    reload(): EngineConfig {
        if (!this.loaded) {
            throw new ConfigError("Cannot reload before load()")
        }
        return this.load(this.projectDir, this.options)
    }

    reset(): void {
        this.config = null
        this.projectDir = undefined
        this.options = {}
        this.loaded = false
    }
}

let globalConfigService: ConfigService | null = null

export function getGlobalConfigService(): ConfigService {
    if (!globalConfigService) {
        globalConfigService = new ConfigService()
    }
    return globalConfigService
}

/** Drops the global instance; tests call this between cases. */
export function resetGlobalConfigService(): void {
    globalConfigService = null
}
