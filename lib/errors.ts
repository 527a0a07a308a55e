/**
 * Error taxonomy for budget allocation and context assembly.
 *
 * Every failure the pipeline raises is a ContextError subclass with a stable
 * `code`, so callers can branch on the code without string matching.
 */

export type ContextErrorCode =
    | "CONFIG_ERROR"
    | "BUDGET_EXHAUSTED"
    | "COMPRESSION_INFEASIBLE"
    | "DEPENDENCY_ERROR"
    | "BUDGET_OVERFLOW"
    | "ASSEMBLY_ABORTED"

export class ContextError extends Error {
    constructor(
        message: string,
        public readonly code: ContextErrorCode,
        public readonly details: Record<string, unknown> = {},
        options?: { cause?: unknown },
    ) {
        super(message, options)
        this.name = "ContextError"
    }
}

/**
 * Invalid bucket, policy, configuration or request shape.
 * `issues` holds one line per problem found.
 */
export class ConfigError extends ContextError {
    constructor(
        message: string,
        public readonly issues: string[] = [],
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "CONFIG_ERROR", {
            issues,
        })
        this.name = "ConfigError"
    }
}

export class BudgetExhausted extends ContextError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, "BUDGET_EXHAUSTED", details)
        this.name = "BudgetExhausted"
    }
}

export class CompressionInfeasible extends ContextError {
    constructor(
        message: string,
        public readonly strategy: string,
        public readonly targetTokens: number,
        public readonly bucketId?: string,
    ) {
        super(message, "COMPRESSION_INFEASIBLE", { strategy, targetTokens, bucketId })
        this.name = "CompressionInfeasible"
    }

    /** Same failure, attributed to a bucket. */
    forBucket(bucketId: string): CompressionInfeasible {
        return new CompressionInfeasible(
            `${this.message} (bucket '${bucketId}')`,
            this.strategy,
            this.targetTokens,
            bucketId,
        )
    }
}

/**
 * A collaborator (tokenizer, summarizer) failed. The original error is kept
 * as `cause`; nothing in the pipeline retries.
 */
export class DependencyError extends ContextError {
    constructor(
        public readonly dependency: string,
        cause: unknown,
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause)
        super(`${dependency} failed: ${reason}`, "DEPENDENCY_ERROR", { dependency }, { cause })
        this.name = "DependencyError"
    }
}

/** Assembled output exceeded the budget. Internal invariant violation, never corrected. */
export class BudgetOverflow extends ContextError {
    constructor(totalTokens: number, budget: number) {
        super(
            `Assembled context uses ${totalTokens} tokens but the budget is ${budget}`,
            "BUDGET_OVERFLOW",
            { totalTokens, budget },
        )
        this.name = "BudgetOverflow"
    }
}

export class AssemblyAborted extends ContextError {
    constructor(
        public readonly stage: string,
        reason?: unknown,
    ) {
        super(`Aborted during ${stage}`, "ASSEMBLY_ABORTED", { stage }, { cause: reason })
        this.name = "AssemblyAborted"
    }
}

export function isContextError(error: unknown): error is ContextError {
    return error instanceof ContextError
}

/**
 * Throws AssemblyAborted when the signal has fired.
 */
export function checkAborted(signal: AbortSignal | undefined, stage: string): void {
    if (signal?.aborted) {
        throw new AssemblyAborted(stage, signal.reason)
    }
}
