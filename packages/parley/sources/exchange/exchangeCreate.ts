import type { Config } from "../config/configTypes.js";
import { imageDedupPolicyBuild } from "../images/imageDedupPolicy.js";
import { getLogger } from "../log.js";
import { PLUGIN_AI_TIMEOUT_MS, pluginAiBuild } from "../plugins/pluginAiBuild.js";
import { pluginLoad } from "../plugins/pluginLoad.js";
import { PluginPipeline } from "../plugins/pluginPipeline.js";
import type { ConversationPlugin } from "../plugins/pluginTypes.js";
import { modelSelectorParse } from "../providers/modelSelectorParse.js";
import { OpenRouterAdapter } from "../providers/openrouterAdapter.js";
import { ProviderRegistry } from "../providers/providerRegistry.js";
import { SessionStore } from "../sessions/sessionStore.js";
import { Exchange } from "./exchange.js";

export type ExchangeCreateOptions = {
    fetchImpl?: typeof fetch;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    /** Skips loading the configured extension module when set. */
    plugin?: { name: string; plugin: ConversationPlugin | null };
    now?: () => number;
};

export type ExchangeRuntime = {
    exchange: Exchange;
    store: SessionStore;
    providers: ProviderRegistry;
    pipeline: PluginPipeline;
};

const logger = getLogger("exchange.create");

/**
 * Assembles the store, adapters, extension pipeline and orchestrator from config.
 * Expects: defaultModel names a known provider; the extension entry resolves from the config dir.
 */
export async function exchangeCreate(config: Config, options: ExchangeCreateOptions = {}): Promise<ExchangeRuntime> {
    const settings = config.settings;
    const model = modelSelectorParse(settings.defaultModel);
    if (!model) {
        throw new Error(`Unknown default model: ${settings.defaultModel}`);
    }

    const providers = new ProviderRegistry({ config, fetchImpl: options.fetchImpl, sleep: options.sleep });
    const openrouter = settings.providers.openrouter;
    const helper = new OpenRouterAdapter({
        baseUrl: openrouter.baseUrl,
        apiKey: openrouter.apiKey,
        timeoutMs: PLUGIN_AI_TIMEOUT_MS,
        retries: openrouter.retries,
        fetchImpl: options.fetchImpl,
        sleep: options.sleep,
        appName: settings.appName,
        appUrl: settings.appUrl
    });
    const ai = pluginAiBuild({ adapter: helper, defaultModel: settings.plugins.helperModel });

    let loaded = options.plugin ?? { name: "none", plugin: null };
    if (!options.plugin && settings.plugins.enabled && settings.plugins.entry) {
        loaded = await pluginLoad(settings.plugins.entry, { logger: getLogger("plugin.api"), ai }, config.configDir);
    }
    const pipeline = new PluginPipeline({
        name: loaded.name,
        plugin: loaded.plugin,
        timeoutMs: settings.plugins.timeoutMs,
        maxFailures: settings.plugins.maxFailures
    });

    const store = new SessionStore({
        defaults: { model, maxRounds: settings.maxRounds, systemPrompt: settings.systemPrompt },
        now: options.now
    });

    const exchange = new Exchange({
        store,
        providers,
        pipeline,
        ai,
        maxTokens: settings.maxTokens,
        locked: settings.locked,
        dedupPolicy: imageDedupPolicyBuild(settings.images.nearDuplicateRatio)
    });

    logger.debug(`create: Exchange ready model=${settings.defaultModel} plugin=${loaded.name}`);
    return { exchange, store, providers, pipeline };
}
