import type { ProviderFailure } from "../providers/providerErrors.js";
import type { ExchangeError } from "./exchangeTypes.js";

export const NETWORK_ERROR_REPLY = "The AI service is temporarily unavailable. Please try again later.";
export const SCHEMA_ERROR_REPLY = "API error occurred.";

/**
 * Maps a failed provider call to the user-facing reply and structured error.
 */
export function exchangeErrorReply(failure: ProviderFailure): { text: string; error: ExchangeError } {
    switch (failure.kind) {
        case "network":
            return {
                text: NETWORK_ERROR_REPLY,
                error: { kind: "network", message: failure.message, type: null, code: null }
            };
        case "provider":
            return {
                text: `API Error: ${failure.message}`,
                error: { kind: "provider", message: failure.message, type: failure.type, code: failure.code }
            };
        case "schema":
            return {
                text: SCHEMA_ERROR_REPLY,
                error: { kind: "schema", message: failure.message, type: null, code: null }
            };
    }
}
