import type { NormalizedResponse } from "./responseTypes.js";

export const NO_IMAGE_NOTE = "[No image was generated for this response.]";
export const IMAGE_GENERATED_NOTE = "[Image generated]";

/**
 * Shapes the final reply to the session's response format.
 * Unknown formats behave like `auto`.
 */
export function responseFormatApply(response: NormalizedResponse, format: string): NormalizedResponse {
    const hasText = response.text.trim().length > 0;
    const hasImages = response.images.length > 0;

    switch (format) {
        case "text":
            return { text: response.text, images: [] };
        case "image":
            if (hasImages) {
                return { text: "", images: response.images };
            }
            return { text: noteAppend(response.text, NO_IMAGE_NOTE), images: [] };
        case "both":
            if (hasImages && !hasText) {
                return { text: IMAGE_GENERATED_NOTE, images: response.images };
            }
            if (hasText && !hasImages) {
                return { text: noteAppend(response.text, NO_IMAGE_NOTE), images: [] };
            }
            return response;
        default:
            return response;
    }
}

function noteAppend(text: string, note: string): string {
    return text.trim() ? `${text}\n\n${note}` : note;
}
