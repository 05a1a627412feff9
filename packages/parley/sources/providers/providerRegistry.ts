import type { Config } from "../config/configTypes.js";
import { getLogger } from "../log.js";
import type { ProviderId } from "../settings.js";
import { AnthropicAdapter } from "./anthropicAdapter.js";
import { GroqAdapter } from "./groqAdapter.js";
import type { ModelCatalog } from "./modelCatalogTypes.js";
import { OpenAiAdapter } from "./openaiAdapter.js";
import { OpenRouterAdapter } from "./openrouterAdapter.js";
import { OpenRouterCatalog } from "./openrouterCatalog.js";
import type { ProviderAdapter } from "./providerTypes.js";

export type ProviderRegistryOptions = {
    config: Config;
    fetchImpl?: typeof fetch;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    catalog?: ModelCatalog;
};

const logger = getLogger("providers.registry");

/**
 * Builds adapters from configuration on first use and keeps them for reuse.
 */
export class ProviderRegistry {
    readonly catalog: ModelCatalog;
    private readonly config: Config;
    private readonly fetchImpl?: typeof fetch;
    private readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    private loaded = new Map<ProviderId, ProviderAdapter>();

    constructor(options: ProviderRegistryOptions) {
        this.config = options.config;
        this.fetchImpl = options.fetchImpl;
        this.sleep = options.sleep;
        const openrouter = options.config.settings.providers.openrouter;
        this.catalog =
            options.catalog ??
            new OpenRouterCatalog({
                baseUrl: openrouter.baseUrl,
                apiKey: openrouter.apiKey,
                fetchImpl: options.fetchImpl
            });
    }

    get(id: ProviderId): ProviderAdapter {
        const existing = this.loaded.get(id);
        if (existing) {
            return existing;
        }
        const adapter = this.create(id);
        this.loaded.set(id, adapter);
        logger.debug(`register: Provider adapter created providerId=${id}`);
        return adapter;
    }

    /** Registers a prebuilt adapter, replacing the configured one. */
    register(adapter: ProviderAdapter): void {
        this.loaded.set(adapter.id, adapter);
    }

    private create(id: ProviderId): ProviderAdapter {
        const settings = this.config.settings.providers[id];
        const options = {
            baseUrl: settings.baseUrl,
            apiKey: settings.apiKey,
            timeoutMs: settings.timeoutMs,
            retries: settings.retries,
            fetchImpl: this.fetchImpl,
            sleep: this.sleep
        };
        if (!settings.apiKey) {
            logger.warn({ provider: id }, "event: Provider has no api key configured");
        }
        switch (id) {
            case "openai":
                return new OpenAiAdapter(options);
            case "anthropic":
                return new AnthropicAdapter(options);
            case "groq":
                return new GroqAdapter(options);
            case "openrouter":
                return new OpenRouterAdapter({
                    ...options,
                    appName: this.config.settings.appName,
                    appUrl: this.config.settings.appUrl,
                    catalog: this.catalog
                });
        }
    }
}
