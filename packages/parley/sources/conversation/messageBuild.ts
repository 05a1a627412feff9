import type { ContentPart, ImagePayload, Message, MessageRole } from "./conversationTypes.js";

/**
 * Builds a canonical message from text and attached images.
 * Expects: images carry explicit mime types; text is stored as given.
 */
export function messageBuild(role: MessageRole, text: string, images: ImagePayload[] = []): Message {
    const content: ContentPart[] = [{ type: "text", text }];
    for (const image of images) {
        content.push({ type: "image", data: image.data, mimeType: image.mimeType });
    }
    return { role, content };
}

export function messageBuildSystem(text: string): Message {
    return messageBuild("system", text);
}
