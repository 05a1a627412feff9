import { resolveParleyPath } from "./paths.js";

export const DEFAULT_SETTINGS_PATH = resolveParleyPath("settings.json");

export type ProviderId = "openai" | "anthropic" | "groq" | "openrouter";

export const PROVIDER_IDS: readonly ProviderId[] = ["openai", "anthropic", "groq", "openrouter"];

export type ResponseFormat = "auto" | "text" | "image" | "both";

export const RESPONSE_FORMATS: readonly ResponseFormat[] = ["auto", "text", "image", "both"];

export type ImageModalities = "auto" | "text" | "image" | "text+image";

export const IMAGE_MODALITIES: readonly ImageModalities[] = ["auto", "text", "image", "text+image"];

export const IMAGE_ASPECT_RATIOS: readonly string[] = ["1:1", "16:9", "9:16", "4:3", "3:4"];

export const IMAGE_SIZES: readonly string[] = ["SD", "HD", "4K"];

export type ProviderSettings = {
    baseUrl?: string;
    apiKey?: string;
    timeoutMs?: number;
    retries?: number;
};

export type PluginSettings = {
    enabled?: boolean;
    entry?: string;
    timeoutMs?: number;
    maxFailures?: number;
    helperModel?: string;
};

export type ImageSettings = {
    nearDuplicateRatio?: number;
};

/**
 * Raw settings file shape, after schema validation and before defaults.
 */
export type SettingsConfig = {
    defaultModel?: string;
    maxRounds?: number;
    maxTokens?: number;
    systemPrompt?: string;
    locked?: boolean;
    appName?: string;
    appUrl?: string;
    profilesDir?: string;
    providers?: Partial<Record<ProviderId, ProviderSettings>>;
    plugins?: PluginSettings;
    images?: ImageSettings;
};

export type ResolvedProviderSettings = {
    baseUrl: string;
    apiKey: string | null;
    timeoutMs: number;
    retries: number;
};

export type ResolvedSettingsConfig = {
    defaultModel: string;
    maxRounds: number;
    maxTokens: number;
    systemPrompt: string | null;
    locked: boolean;
    appName: string;
    appUrl: string | null;
    profilesDir: string;
    providers: Record<ProviderId, ResolvedProviderSettings>;
    plugins: {
        enabled: boolean;
        entry: string | null;
        timeoutMs: number;
        maxFailures: number;
        helperModel: string;
    };
    images: {
        nearDuplicateRatio: number;
    };
};

/**
 * Per-session image generation preference, sent to backends that can emit images.
 */
export type ImageOutput = {
    modalities: ImageModalities;
    aspectRatio: string | null;
    imageSize: string | null;
};

export const DEFAULT_IMAGE_OUTPUT: Readonly<ImageOutput> = Object.freeze({
    modalities: "auto",
    aspectRatio: null,
    imageSize: null
});
