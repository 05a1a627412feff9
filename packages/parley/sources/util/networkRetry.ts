import { getLogger } from "../log.js";
import { NetworkError } from "../providers/providerErrors.js";
import { delay } from "./delay.js";

export const DEFAULT_RETRIES = 2;
export const RETRY_BASE_DELAY_MS = 500;

export type NetworkRetryOptions = {
    retries?: number;
    signal?: AbortSignal;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const logger = getLogger("util.retry");

/**
 * Runs a network call, retrying NetworkError up to `retries` more times.
 * Expects: waits 500ms, then doubles; other errors and cancellation are thrown at once.
 */
export async function networkRetry<T>(
    label: string,
    run: () => Promise<T>,
    options: NetworkRetryOptions = {}
): Promise<T> {
    const retries = options.retries ?? DEFAULT_RETRIES;
    const sleep = options.sleep ?? delay;
    let attempt = 0;

    while (true) {
        try {
            return await run();
        } catch (error) {
            if (!(error instanceof NetworkError) || attempt >= retries) {
                throw error;
            }
            const wait = RETRY_BASE_DELAY_MS * 2 ** attempt;
            attempt += 1;
            logger.warn(`retry: ${label} failed attempt=${attempt} waitMs=${wait} error=${error.message}`);
            await sleep(wait, options.signal);
        }
    }
}
