import { z } from "zod";

import { getLogger } from "../log.js";
import { fetchWithTimeout } from "../util/fetchWithTimeout.js";
import { ProviderError, SchemaError } from "./providerErrors.js";
import type { CatalogModel, ModelCatalog } from "./modelCatalogTypes.js";

export const CATALOG_TTL_MS = 60 * 60 * 1000;
const CATALOG_TIMEOUT_MS = 30_000;

const catalogSchema = z.object({
    data: z.array(
        z
            .object({
                id: z.string(),
                name: z.string().optional(),
                context_length: z.number().nullish(),
                architecture: z
                    .object({
                        output_modalities: z.array(z.string()).nullish()
                    })
                    .passthrough()
                    .nullish()
            })
            .passthrough()
    )
});

export type OpenRouterCatalogOptions = {
    baseUrl: string;
    apiKey?: string | null;
    fetchImpl?: typeof fetch;
    ttlMs?: number;
    now?: () => number;
};

const logger = getLogger("providers.catalog");

/**
 * OpenRouter model list, cached in memory for one hour.
 */
export class OpenRouterCatalog implements ModelCatalog {
    private readonly options: OpenRouterCatalogOptions;
    private cached: { models: CatalogModel[]; fetchedAt: number } | null = null;

    constructor(options: OpenRouterCatalogOptions) {
        this.options = options;
    }

    async list(signal?: AbortSignal): Promise<CatalogModel[]> {
        const now = this.options.now ?? Date.now;
        const ttl = this.options.ttlMs ?? CATALOG_TTL_MS;
        if (this.cached && now() - this.cached.fetchedAt < ttl) {
            return this.cached.models;
        }

        const models = await this.fetchModels(signal);
        this.cached = { models, fetchedAt: now() };
        logger.debug(`load: Model catalog refreshed count=${models.length}`);
        return models;
    }

    async supportsImageOutput(modelId: string): Promise<boolean> {
        try {
            const models = await this.list();
            const model = models.find((entry) => entry.id === modelId);
            return model?.outputModalities.includes("image") ?? false;
        } catch (error) {
            logger.warn({ error }, `event: Model catalog unavailable; assuming text output model=${modelId}`);
            return false;
        }
    }

    private async fetchModels(signal?: AbortSignal): Promise<CatalogModel[]> {
        const headers: Record<string, string> = {};
        if (this.options.apiKey) {
            headers.Authorization = `Bearer ${this.options.apiKey}`;
        }
        const response = await fetchWithTimeout(
            `${this.options.baseUrl}/models`,
            { method: "GET", headers },
            { fetchImpl: this.options.fetchImpl, timeoutMs: CATALOG_TIMEOUT_MS, signal }
        );
        if (!response.ok) {
            throw new ProviderError(`Model catalog request failed with status ${response.status}`, {
                code: String(response.status)
            });
        }

        let json: unknown;
        try {
            json = JSON.parse(response.body.toString("utf8"));
        } catch (error) {
            throw new SchemaError("Model catalog returned a non-JSON body.", { cause: error });
        }
        const parsed = catalogSchema.safeParse(json);
        if (!parsed.success) {
            throw new SchemaError("Model catalog response has an unexpected shape.", { cause: parsed.error });
        }

        return parsed.data.data.map((entry) => ({
            id: entry.id,
            name: entry.name ?? entry.id,
            contextLength: entry.context_length ?? null,
            outputModalities: entry.architecture?.output_modalities ?? []
        }));
    }
}
