export type MessageRole = "system" | "user" | "assistant";

export type TextPart = {
    type: "text";
    text: string;
};

export type ImagePart = {
    type: "image";
    data: Buffer;
    mimeType: string;
};

/**
 * Remote image reference. Adapters that cannot pass URLs through resolve it to bytes.
 */
export type ImageUrlPart = {
    type: "imageUrl";
    url: string;
};

export type ContentPart = TextPart | ImagePart | ImageUrlPart;

export type Message = {
    role: MessageRole;
    content: ContentPart[];
};

export type ImagePayload = {
    data: Buffer;
    mimeType: string;
};
