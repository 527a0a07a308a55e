import type { SignatureExtractor } from "./types"

const SIGNATURE_PATTERNS: readonly RegExp[] = [
    // Markdown headings
    /^\s{0,3}#{1,6}\s+\S/,
    // TS/JS declarations
    /^\s*(?:export\s+)?(?:default\s+)?(?:declare\s+)?(?:abstract\s+)?(?:async\s+)?(?:function\*?|class|interface|type|enum|namespace)\s+[A-Za-z_$]/,
    // Arrow functions bound to a name
    /^\s*(?:export\s+)?(?:const|let)\s+[A-Za-z_$][\w$]*\s*=\s*(?:async\s+)?\([^)]*\)\s*(?::\s*[^=]+)?=>/,
    // Class members with an explicit modifier
    /^\s*(?:(?:public|private|protected|static|readonly|abstract|override|async)\s+)+[A-Za-z_$][\w$]*\s*\(/,
    // Python defs and classes
    /^\s*(?:async\s+)?def\s+\w+\s*\(/,
    /^\s*class\s+\w+\s*[(:]/,
    // JSON tool schemas
    /^\s*"name"\s*:\s*"/,
]

/**
 * Keeps headings and declaration lines, dropping bodies. Trailing opening
 * braces are removed so a signature reads as a one-line summary.
 */
export const defaultSignatureExtractor: SignatureExtractor = (content) => {
    const signatures: string[] = []
    for (const line of content.split("\n")) {
        if (SIGNATURE_PATTERNS.some((pattern) => pattern.test(line))) {
            signatures.push(line.replace(/\s*\{\s*$/, "").trimEnd())
        }
    }
    return signatures
}
