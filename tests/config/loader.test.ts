import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { mkdirSync, writeFileSync } from "fs"
import { join } from "path"
import {
    bucketSpecsFromConfig,
    DEFAULT_CONFIG,
    findProjectConfigDir,
    getConfigPaths,
    loadConfig,
    validateConfig,
} from "../../lib/config"
import { ConfigError } from "../../lib/errors"
import { createSilentLogger } from "../../lib/logger"
import { createTempDir, type TempDir } from "../fixtures/tmpdir"

describe("config loader", () => {
    let tmp: TempDir
    let globalDir: string
    let projectDir: string

    beforeEach(async () => {
        tmp = await createTempDir()
        globalDir = join(tmp.path, "global")
        projectDir = join(tmp.path, "project")
        mkdirSync(globalDir, { recursive: true })
        mkdirSync(join(projectDir, ".context-fit"), { recursive: true })
    })

    afterEach(async () => {
        await tmp.cleanup()
    })

    it("should return the defaults when no file exists", () => {
        expect(loadConfig(projectDir, { globalDir, env: {} })).toEqual(DEFAULT_CONFIG)
    })

    it("should layer global and project files over the defaults", () => {
        writeFileSync(
            join(globalDir, "config.jsonc"),
            `{
                // comments and trailing commas are fine
                "debug": true,
                "model": { "contextLimit": 16000 },
                "buckets": { "rag": { "max": 6000 } },
            }`,
        )
        writeFileSync(
            join(projectDir, ".context-fit", "config.json"),
            JSON.stringify({
                model: { outputTarget: 2000 },
                policies: { lean: { dropOrder: ["fewshot"], placement: { head: ["system"] } } },
            }),
        )

        const config = loadConfig(projectDir, { globalDir, env: {} })

        expect(config.debug).toBe(true)
        expect(config.model).toEqual({
            name: "gpt-4",
            contextLimit: 16000,
            outputTarget: 2000,
            outputHeadroom: 300,
        })
        expect(config.buckets.rag).toMatchObject({ max: 6000, weight: 2.8, min: 0 })
        expect(Object.keys(config.policies)).toEqual([
            "default",
            "research_heavy",
            "code_generation",
            "lean",
        ])
        expect(config.policies.lean).toEqual({
            dropOrder: ["fewshot"],
            placement: { head: ["system"] },
        })
    })

    it("should read the directory named by CONTEXT_FIT_CONFIG_DIR between global and project", () => {
        const envDir = join(tmp.path, "env")
        mkdirSync(envDir)
        writeFileSync(join(globalDir, "config.json"), JSON.stringify({ systemOverhead: 100 }))
        writeFileSync(join(envDir, "config.json"), JSON.stringify({ systemOverhead: 150 }))
        writeFileSync(
            join(projectDir, ".context-fit", "config.json"),
            JSON.stringify({ logFormat: "json" }),
        )

        const config = loadConfig(projectDir, {
            globalDir,
            env: { CONTEXT_FIT_CONFIG_DIR: envDir },
        })

        expect(config.systemOverhead).toBe(150)
        expect(config.logFormat).toBe("json")
    })

    it("should prefer config.jsonc over config.json in the same directory", () => {
        writeFileSync(join(globalDir, "config.jsonc"), `{ "systemOverhead": 10 }`)
        writeFileSync(join(globalDir, "config.json"), `{ "systemOverhead": 20 }`)

        expect(getConfigPaths(undefined, { globalDir, env: {} })).toEqual({
            global: join(globalDir, "config.jsonc"),
            configDir: null,
            project: null,
        })
    })

    it("should skip a file that fails validation and log why", () => {
        const logger = createSilentLogger()
        const warn = vi.spyOn(logger, "warn")
        const path = join(globalDir, "config.json")
        writeFileSync(path, JSON.stringify({ model: { contextLimit: -5 } }))
        writeFileSync(
            join(projectDir, ".context-fit", "config.json"),
            JSON.stringify({ debug: true }),
        )

        const config = loadConfig(projectDir, { globalDir, env: {}, logger })

        expect(config.model.contextLimit).toBe(8192)
        expect(config.debug).toBe(true)
        expect(warn).toHaveBeenCalledWith(
            `Skipping config ${path}: Invalid configuration: model.contextLimit: Number must be greater than 0`,
        )
    })

    it("should skip a file whose merge leaves a bucket with min above max", () => {
        const logger = createSilentLogger()
        const warn = vi.spyOn(logger, "warn")
        const path = join(projectDir, ".context-fit", "config.json")
        writeFileSync(path, JSON.stringify({ buckets: { system: { min: 900 } } }))

        const config = loadConfig(projectDir, { globalDir, env: {}, logger })

        expect(config.buckets.system).toMatchObject({ min: 300, max: 800 })
        expect(warn).toHaveBeenCalledWith(
            `Skipping config ${path}: Invalid bucket configuration: bucket 'system': min (900) > max (800)`,
        )
    })

    it("should keep earlier layers when a later policy drops a sticky bucket", () => {
        const logger = createSilentLogger()
        const warn = vi.spyOn(logger, "warn")
        writeFileSync(join(globalDir, "config.json"), JSON.stringify({ systemOverhead: 100 }))
        const path = join(projectDir, ".context-fit", "config.json")
        writeFileSync(path, JSON.stringify({ policies: { lean: { dropOrder: ["task"] } } }))

        const config = loadConfig(projectDir, { globalDir, env: {}, logger })

        expect(config.systemOverhead).toBe(100)
        expect(config.policies.lean).toBeUndefined()
        expect(warn).toHaveBeenCalledWith(
            `Skipping config ${path}: Invalid policy 'lean': drop order names sticky bucket 'task'`,
        )
    })

    it("should skip a file that does not parse", () => {
        const logger = createSilentLogger()
        const warn = vi.spyOn(logger, "warn")
        writeFileSync(join(globalDir, "config.json"), "{ not json")

        expect(loadConfig(projectDir, { globalDir, env: {}, logger })).toEqual(DEFAULT_CONFIG)
        expect(warn).toHaveBeenCalledOnce()
    })

    it("should find the nearest .context-fit directory above a nested path", () => {
        const nested = join(projectDir, "src", "deep")
        mkdirSync(nested, { recursive: true })

        expect(findProjectConfigDir(nested)).toBe(join(projectDir, ".context-fit"))
    })
})

describe("validateConfig", () => {
    it("should reject unknown keys", () => {
        expect(() => validateConfig({ colour: "blue" })).toThrow(ConfigError)
    })

    it("should reject bucket ids outside the known set and the x- slot", () => {
        expect(() => validateConfig({ buckets: { notes: { max: 10 } } })).toThrow(
            /unknown bucket id/,
        )
    })

    it("should reject unknown strategies", () => {
        expect(() => validateConfig({ buckets: { rag: { compress: "shrink" } } })).toThrow(
            ConfigError,
        )
    })

    it("should add a custom bucket with defaults for the fields it leaves out", () => {
        const config = validateConfig({ buckets: { "x-notes": { max: 200, placement: "tail" } } })

        expect(config.buckets["x-notes"]).toEqual({
            min: 0,
            max: 200,
            weight: 1,
            sticky: false,
            compress: "truncate_tail",
            contentScore: 0.5,
            placement: "tail",
        })
    })

    it("should require max for a new bucket", () => {
        expect(() => validateConfig({ buckets: { "x-notes": { weight: 2 } } })).toThrow(
            "buckets.x-notes: a new bucket needs max",
        )
    })

    it("should reject a bucket made sticky while a policy still drops it", () => {
        expect(() => validateConfig({ buckets: { rag: { sticky: true } } })).toThrow(
            "Invalid policy 'default': drop order names sticky bucket 'rag'",
        )
    })

    it("should replace a policy by name rather than merging it", () => {
        const config = validateConfig({
            policies: { default: { dropOrder: ["fewshot"] } },
        })

        expect(config.policies.default).toEqual({ dropOrder: ["fewshot"], placement: {} })
    })
})

describe("bucketSpecsFromConfig", () => {
    it("should list the configured buckets in ascending id order", () => {
        expect(bucketSpecsFromConfig(DEFAULT_CONFIG).map((b) => b.id)).toEqual([
            "fewshot",
            "history",
            "memory",
            "rag",
            "scratchpad",
            "system",
            "task",
            "tools",
        ])
    })
})
