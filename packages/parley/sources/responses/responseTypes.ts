import type { ImagePayload } from "../conversation/conversationTypes.js";

export type NormalizedResponse = {
    text: string;
    images: ImagePayload[];
};
