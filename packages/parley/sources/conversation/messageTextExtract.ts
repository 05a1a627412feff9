import type { Message } from "./conversationTypes.js";

/**
 * Joins every text part of a message, in order, with newlines.
 */
export function messageTextExtract(message: Message): string {
    const texts: string[] = [];
    for (const part of message.content) {
        if (part.type === "text") {
            texts.push(part.text);
        }
    }
    return texts.join("\n");
}

export function messageFirstText(message: Message): string {
    for (const part of message.content) {
        if (part.type === "text") {
            return part.text;
        }
    }
    return "";
}

export function messageHasImages(message: Message): boolean {
    return message.content.some((part) => part.type === "image" || part.type === "imageUrl");
}
