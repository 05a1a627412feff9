import type { ImagePayload } from "../conversation/conversationTypes.js";
import { imageBase64Decode } from "../images/imageBase64Decode.js";
import { imageDataUrlParse } from "../images/imageDataUrl.js";
import { imageMimeSniff } from "../images/imageMimeSniff.js";
import { ImageProcessingError } from "../images/imageProcessingError.js";
import type { ImageCandidate } from "../providers/providerTypes.js";

/**
 * Decodes an inline or data-url candidate into image bytes.
 * Expects: remote candidates are not passed here. Throws ImageProcessingError
 * when the payload is not base64 or not an image.
 */
export function imageCandidateDecode(candidate: Exclude<ImageCandidate, { kind: "remote" }>): ImagePayload {
    let declared: string;
    let base64: string;
    if (candidate.kind === "dataUrl") {
        const parsed = imageDataUrlParse(candidate.url);
        if (!parsed) {
            throw new ImageProcessingError("invalid_base64", "Image data url is not base64 encoded.");
        }
        declared = parsed.mimeType;
        base64 = parsed.base64;
    } else {
        declared = candidate.mimeType.trim().toLowerCase();
        base64 = candidate.base64;
    }

    const data = imageBase64Decode(base64);
    if (declared.startsWith("image/")) {
        return { data, mimeType: declared };
    }
    const sniffed = imageMimeSniff(data);
    if (!sniffed) {
        throw new ImageProcessingError("not_image", `Payload declared as ${declared} is not an image.`);
    }
    return { data, mimeType: sniffed };
}
