import type { Message } from "./conversationTypes.js";

/**
 * Keeps the newest `2 * maxRounds` messages plus a leading system message when one exists.
 * Expects: maxRounds is a positive integer.
 */
export function conversationTrim(conversation: Message[], maxRounds: number): Message[] {
    const limit = maxRounds * 2;
    const first = conversation[0];
    const system = first && first.role === "system" ? first : null;
    const rest = system ? conversation.slice(1) : conversation;
    if (rest.length <= limit) {
        return conversation;
    }
    const kept = rest.slice(rest.length - limit);
    return system ? [system, ...kept] : kept;
}
