import { NetworkError } from "../providers/providerErrors.js";
import { abortReason } from "./delay.js";

export type FetchWithTimeoutOptions = {
    fetchImpl?: typeof fetch;
    timeoutMs: number;
    signal?: AbortSignal;
};

export type FetchedBody = {
    status: number;
    ok: boolean;
    headers: Headers;
    body: Buffer;
};

/**
 * Runs one fetch with a deadline covering headers and body.
 * Expects: caller cancellation rethrows the abort reason; timeouts and
 * connection failures become NetworkError.
 */
export async function fetchWithTimeout(
    url: string,
    init: RequestInit,
    options: FetchWithTimeoutOptions
): Promise<FetchedBody> {
    const fetchImpl = options.fetchImpl ?? fetch;
    const outer = options.signal;
    if (outer?.aborted) {
        throw abortReason(outer);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
    }, options.timeoutMs);
    const onOuterAbort = () => controller.abort();
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    try {
        const response = await fetchImpl(url, { ...init, signal: controller.signal });
        const body = Buffer.from(await response.arrayBuffer());
        return { status: response.status, ok: response.ok, headers: response.headers, body };
    } catch (error) {
        if (outer?.aborted) {
            throw abortReason(outer);
        }
        if (timedOut) {
            throw new NetworkError(`Request timed out after ${options.timeoutMs}ms.`, { timedOut: true, cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new NetworkError(`Request failed: ${message}`, { cause: error });
    } finally {
        clearTimeout(timer);
        outer?.removeEventListener("abort", onOuterAbort);
    }
}
