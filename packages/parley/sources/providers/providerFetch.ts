import { fetchWithTimeout } from "../util/fetchWithTimeout.js";
import { networkRetry } from "../util/networkRetry.js";
import { SchemaError } from "./providerErrors.js";
import type { ProviderRequest } from "./providerTypes.js";

export const DEFAULT_TIMEOUT_MS = 120_000;

export type ProviderFetchOptions = {
    timeoutMs?: number;
    retries?: number;
    signal?: AbortSignal;
    fetchImpl?: typeof fetch;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Posts a provider request and returns the parsed JSON body.
 * Expects: only NetworkError is retried (base 500ms, doubling); a body that is
 * not JSON raises SchemaError; error envelopes are returned for the adapter to parse.
 */
export async function providerFetch(request: ProviderRequest, options: ProviderFetchOptions = {}): Promise<unknown> {
    const response = await networkRetry(
        "Provider call",
        () =>
            fetchWithTimeout(
                request.url,
                {
                    method: "POST",
                    headers: request.headers,
                    body: JSON.stringify(request.body)
                },
                {
                    fetchImpl: options.fetchImpl,
                    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
                    signal: options.signal
                }
            ),
        { retries: options.retries, signal: options.signal, sleep: options.sleep }
    );
    return bodyParse(response.body, response.status);
}

function bodyParse(body: Buffer, status: number): unknown {
    const text = body.toString("utf8");
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new SchemaError(`Provider returned a non-JSON body (status ${status}).`, { cause: error });
    }
}
