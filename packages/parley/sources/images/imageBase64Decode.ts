import { ImageProcessingError } from "./imageProcessingError.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decodes strict base64 into bytes.
 * Expects: whitespace is ignored; anything else outside the alphabet is rejected.
 */
export function imageBase64Decode(value: string): Buffer {
    const compact = value.replace(/\s+/g, "");
    if (compact.length === 0) {
        throw new ImageProcessingError("empty", "Image payload is empty.");
    }
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
        throw new ImageProcessingError("invalid_base64", "Image payload is not valid base64.");
    }
    return Buffer.from(compact, "base64");
}
