import type { Message } from "../conversation/conversationTypes.js";
import { imageDataUrlBuild } from "../images/imageDataUrl.js";

export type ChatWireMessage = {
    role: Message["role"];
    content: ChatWirePart[];
};

export type ChatWirePart = { type: "text"; text: string } | { type: "image_url"; image_url: { url: string } };

/**
 * Encodes a canonical message in chat-completions form.
 * Content is always a part array in the message's part order, text-only messages included.
 */
export function chatMessageEncode(message: Message): ChatWireMessage {
    const content = message.content.map((part): ChatWirePart => {
        switch (part.type) {
            case "text":
                return { type: "text", text: part.text };
            case "image":
                return { type: "image_url", image_url: { url: imageDataUrlBuild(part.data, part.mimeType) } };
            case "imageUrl":
                return { type: "image_url", image_url: { url: part.url } };
        }
    });
    return { role: message.role, content };
}
