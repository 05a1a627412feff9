import { z } from "zod";

import { ProviderError } from "./providerErrors.js";

const errorEnvelopeSchema = z.object({
    error: z.union([
        z.string(),
        z
            .object({
                message: z.string().optional(),
                type: z.string().nullish(),
                code: z.union([z.string(), z.number()]).nullish()
            })
            .passthrough()
    ])
});

/**
 * Extracts a ProviderError from an `{ error: ... }` envelope.
 * Returns null when the payload carries no error.
 */
export function providerErrorParse(wire: unknown): ProviderError | null {
    const parsed = errorEnvelopeSchema.safeParse(wire);
    if (!parsed.success) {
        return null;
    }
    const error = parsed.data.error;
    if (typeof error === "string") {
        return new ProviderError(error);
    }
    const code = error.code === null || error.code === undefined ? null : String(error.code);
    return new ProviderError(error.message ?? "Unknown provider error", { type: error.type ?? null, code });
}
