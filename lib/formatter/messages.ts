import type { AssembledContext } from "../assembler/types"
import type { BucketId } from "../budget/types"

export type ChatRole = "system" | "user" | "assistant"

export interface ChatMessage {
    role: ChatRole
    content: string
}

export const DEFAULT_ROLES: Readonly<Partial<Record<BucketId, ChatRole>>> = {
    system: "system",
    tools: "system",
    memory: "system",
    rag: "system",
    scratchpad: "system",
    task: "user",
    history: "user",
    fewshot: "assistant",
}

export interface ChatMessageOptions {
    /** Replaces roles per bucket; unmapped buckets go to system. */
    roles?: Partial<Record<BucketId, ChatRole>>
    /** Join consecutive messages that share a role. */
    merge?: boolean
}

/**
 * One message per assembled section, in assembled order.
 */
export function toChatMessages(
    assembled: AssembledContext,
    options: ChatMessageOptions = {},
): ChatMessage[] {
    const roles = { ...DEFAULT_ROLES, ...options.roles }
    const messages: ChatMessage[] = []

    for (const section of assembled.sections) {
        const content = section.text.trim()
        if (content === "") continue

        const role = roles[section.bucketId] ?? "system"
        const previous = messages[messages.length - 1]
        if (options.merge && previous?.role === role) {
            previous.content = `${previous.content}\n\n${content}`
        } else {
            messages.push({ role, content })
        }
    }

    return messages
}
