import path from "node:path";

import { DEFAULT_NEAR_DUPLICATE_RATIO } from "../images/imageDedupPolicy.js";
import { DEFAULT_PARLEY_DIR } from "../paths.js";
import { DEFAULT_PLUGIN_MAX_FAILURES, DEFAULT_PLUGIN_TIMEOUT_MS } from "../plugins/pluginPipeline.js";
import { DEFAULT_TIMEOUT_MS } from "../providers/providerFetch.js";
import { DEFAULT_RETRIES } from "../util/networkRetry.js";
import type {
    ProviderId,
    ProviderSettings,
    ResolvedProviderSettings,
    ResolvedSettingsConfig,
    SettingsConfig
} from "../settings.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_MAX_ROUNDS = 4;
export const DEFAULT_MAX_TOKENS = 3000;
export const DEFAULT_HELPER_MODEL = "openai/gpt-4o-mini";

const PROVIDER_DEFAULTS: Record<ProviderId, { baseUrl: string; envKeys: string[] }> = {
    openai: { baseUrl: "https://api.openai.com/v1", envKeys: ["OPENAI_API_KEY", "API_KEY"] },
    anthropic: { baseUrl: "https://api.anthropic.com/v1", envKeys: ["ANTHROPIC_API_KEY"] },
    groq: { baseUrl: "https://api.groq.com/openai/v1", envKeys: ["GROQ_API_KEY"] },
    openrouter: { baseUrl: "https://openrouter.ai/api/v1", envKeys: ["OPENROUTER_API_KEY"] }
};

/**
 * Resolves defaults and environment credentials into an immutable Config snapshot.
 * Expects: settings already validated by configSettingsParse.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const env = overrides.env ?? process.env;
    const resolved: ResolvedSettingsConfig = {
        defaultModel: overrides.defaultModel ?? settings.defaultModel ?? DEFAULT_MODEL,
        maxRounds: settings.maxRounds ?? DEFAULT_MAX_ROUNDS,
        maxTokens: settings.maxTokens ?? DEFAULT_MAX_TOKENS,
        systemPrompt: settings.systemPrompt ?? null,
        locked: settings.locked ?? false,
        appName: settings.appName ?? "parley",
        appUrl: settings.appUrl ?? null,
        profilesDir: path.resolve(settings.profilesDir ?? path.join(DEFAULT_PARLEY_DIR, "profiles")),
        providers: {
            openai: providerResolve("openai", settings.providers?.openai, env),
            anthropic: providerResolve("anthropic", settings.providers?.anthropic, env),
            groq: providerResolve("groq", settings.providers?.groq, env),
            openrouter: providerResolve("openrouter", settings.providers?.openrouter, env)
        },
        plugins: {
            enabled: settings.plugins?.enabled ?? true,
            entry: settings.plugins?.entry ?? null,
            timeoutMs: settings.plugins?.timeoutMs ?? DEFAULT_PLUGIN_TIMEOUT_MS,
            maxFailures: settings.plugins?.maxFailures ?? DEFAULT_PLUGIN_MAX_FAILURES,
            helperModel: settings.plugins?.helperModel ?? DEFAULT_HELPER_MODEL
        },
        images: {
            nearDuplicateRatio: settings.images?.nearDuplicateRatio ?? DEFAULT_NEAR_DUPLICATE_RATIO
        }
    };

    return Object.freeze({
        settingsPath: resolvedSettingsPath,
        configDir: path.dirname(resolvedSettingsPath),
        settings: Object.freeze(resolved)
    });
}

function providerResolve(
    id: ProviderId,
    settings: ProviderSettings | undefined,
    env: NodeJS.ProcessEnv
): ResolvedProviderSettings {
    const defaults = PROVIDER_DEFAULTS[id];
    return {
        baseUrl: (settings?.baseUrl ?? defaults.baseUrl).replace(/\/+$/, ""),
        apiKey: settings?.apiKey ?? envFirst(env, defaults.envKeys),
        timeoutMs: settings?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        retries: settings?.retries ?? DEFAULT_RETRIES
    };
}

function envFirst(env: NodeJS.ProcessEnv, keys: string[]): string | null {
    for (const key of keys) {
        const value = env[key]?.trim();
        if (value) {
            return value;
        }
    }
    return null;
}
