export { ConfigService, getGlobalConfigService, resetGlobalConfigService } from "./service"
export { DEFAULT_CONFIG, DEFAULT_POLICY } from "./defaults"
export {
    CONFIG_DIR_ENV,
    CONFIG_DIR_NAME,
    findProjectConfigDir,
    getConfigPaths,
    loadConfig,
    loadConfigFile,
    mergeConfig,
    parseConfigFile,
    validateConfig,
} from "./loader"
export type { ConfigPaths, LoadConfigOptions } from "./loader"
export { bucketSpecsFromConfig } from "./specs"
export { ConfigFileSchema } from "./schema"
export type { BucketSettings, ConfigFile, EngineConfig, ModelConfig } from "./schema"
