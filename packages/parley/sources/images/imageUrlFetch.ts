import type { ImagePayload } from "../conversation/conversationTypes.js";
import { type FetchedBody, fetchWithTimeout } from "../util/fetchWithTimeout.js";
import { networkRetry } from "../util/networkRetry.js";
import { imageMimeSniff } from "./imageMimeSniff.js";
import { ImageProcessingError } from "./imageProcessingError.js";

export const IMAGE_FETCH_TIMEOUT_MS = 30_000;

export type ImageUrlFetchOptions = {
    fetchImpl?: typeof fetch;
    timeoutMs?: number;
    retries?: number;
    signal?: AbortSignal;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Downloads a remote image into bytes with an explicit mime type.
 * Expects: an image/* content-type wins; otherwise magic bytes, then image/jpeg.
 * Timeouts and connection failures are retried like provider calls; what still
 * fails raises ImageProcessingError. Caller cancellation is rethrown as is.
 */
export async function imageUrlFetch(url: string, options: ImageUrlFetchOptions = {}): Promise<ImagePayload> {
    let response: FetchedBody;
    try {
        response = await networkRetry(
            "Image download",
            () =>
                fetchWithTimeout(
                    url,
                    { method: "GET" },
                    {
                        fetchImpl: options.fetchImpl,
                        timeoutMs: options.timeoutMs ?? IMAGE_FETCH_TIMEOUT_MS,
                        signal: options.signal
                    }
                ),
            { retries: options.retries, signal: options.signal, sleep: options.sleep }
        );
    } catch (error) {
        if (options.signal?.aborted) {
            throw error;
        }
        throw new ImageProcessingError("fetch_failed", `Image download failed: ${url}`, { cause: error });
    }

    if (!response.ok) {
        throw new ImageProcessingError("fetch_failed", `Image download failed with status ${response.status}: ${url}`);
    }
    if (response.body.length === 0) {
        throw new ImageProcessingError("empty", `Image download returned no bytes: ${url}`);
    }

    const header = response.headers.get("content-type")?.split(";")[0]?.trim().toLowerCase() ?? "";
    const mimeType = header.startsWith("image/") ? header : (imageMimeSniff(response.body) ?? "image/jpeg");
    return { data: response.body, mimeType };
}
