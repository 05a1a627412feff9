export type ImageProcessingErrorKind = "invalid_base64" | "empty" | "not_image" | "fetch_failed";

/**
 * Raised when an image payload cannot be turned into usable bytes.
 * Expects: callers skip the offending image and keep the rest of the reply.
 */
export class ImageProcessingError extends Error {
    readonly kind: ImageProcessingErrorKind;

    constructor(kind: ImageProcessingErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "ImageProcessingError";
        this.kind = kind;
    }
}
