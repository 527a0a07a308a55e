export { DEFAULT_ROLES, toChatMessages } from "./messages"
export type { ChatMessage, ChatMessageOptions, ChatRole } from "./messages"
