import { appendFileSync, existsSync, mkdirSync } from "fs"
import { join } from "path"
import { homedir } from "os"

export type LogLevel = "INFO" | "DEBUG" | "WARN" | "ERROR"

export interface LogEntry {
    timestamp: string
    level: LogLevel
    component: string
    message: string
    correlationId?: string
    data?: Record<string, unknown>
}

export type LogFormat = "text" | "json"

export interface LoggerOptions {
    format?: LogFormat
    /** Directory holding `daily/YYYY-MM-DD.log`. Defaults to ~/.config/context-fit/logs */
    logDir?: string
}

export const DEFAULT_LOG_DIR = join(homedir(), ".config", "context-fit", "logs")

/**
 * Line-oriented file logger. Writes are synchronous because the assembly
 * pipeline is synchronous; a write failure is reported once on stderr and
 * turns the logger off.
 */
export class Logger {
    private readonly logDir: string
    public enabled: boolean
    private readonly format: LogFormat
    private correlationId: string | undefined

    constructor(enabled: boolean, options: LoggerOptions = {}) {
        this.enabled = enabled
        this.format = options.format ?? "text"
        this.logDir = options.logDir ?? DEFAULT_LOG_DIR
    }

    /**
     * Set a correlation ID for tracing related log entries.
     * The assembler sets it to the request id at the start of each call.
     */
    setCorrelationId(id: string | undefined): void {
        this.correlationId = id
    }

    getCorrelationId(): string | undefined {
        return this.correlationId
    }

    /** Path of the file today's entries go to. */
    get currentLogFile(): string {
        return join(this.logDir, "daily", `${new Date().toISOString().split("T")[0]}.log`)
    }

    private formatData(data?: Record<string, unknown>): string {
        if (!data) return ""

        const parts: string[] = []
        for (const [key, value] of Object.entries(data)) {
            if (value === undefined || value === null) continue

            if (Array.isArray(value)) {
                if (value.length === 0) continue
                parts.push(
                    `${key}=[${value.slice(0, 3).join(",")}${value.length > 3 ? `...+${value.length - 3}` : ""}]`,
                )
            } else if (typeof value === "object") {
                const str = JSON.stringify(value)
                if (str.length < 50) {
                    parts.push(`${key}=${str}`)
                }
            } else {
                parts.push(`${key}=${String(value)}`)
            }
        }
        return parts.join(" ")
    }

    private getCallerFile(skipFrames: number = 3): string {
        const stack = new Error().stack?.split("\n").slice(skipFrames) ?? []
        for (const frame of stack) {
            const match = frame.match(/([^/\\(\s]+)\.[cm]?[tj]s:\d+/)
            if (match?.[1] && match[1] !== "logger") {
                return match[1]
            }
        }
        return "unknown"
    }

    /** Renders one entry as it would be written, without the trailing newline. */
    formatEntry(entry: LogEntry): string {
        if (this.format === "json") {
            return JSON.stringify(entry)
        }
        const dataStr = this.formatData(entry.data)
        const correlationStr = entry.correlationId ? `[${entry.correlationId.slice(0, 8)}] ` : ""
        return `${entry.timestamp} ${entry.level.padEnd(5)} ${correlationStr}${entry.component}: ${entry.message}${dataStr ? " | " + dataStr : ""}`
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (!this.enabled) return

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            component: this.getCallerFile(),
            message,
            ...(this.correlationId && { correlationId: this.correlationId }),
            ...(data && { data }),
        }

        try {
            const dailyLogDir = join(this.logDir, "daily")
            if (!existsSync(dailyLogDir)) {
                mkdirSync(dailyLogDir, { recursive: true })
            }
            appendFileSync(this.currentLogFile, this.formatEntry(entry) + "\n")
        } catch (error) {
            this.enabled = false
            const reason = error instanceof Error ? error.message : String(error)
            process.stderr.write(`context-fit: logging disabled, cannot write to ${this.logDir}: ${reason}\n`)
        }
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write("INFO", message, data)
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write("DEBUG", message, data)
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write("WARN", message, data)
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write("ERROR", message, data)
    }
}

/** A logger that drops everything. */
export function createSilentLogger(): Logger {
    return new Logger(false)
}
