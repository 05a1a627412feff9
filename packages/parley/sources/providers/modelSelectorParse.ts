import type { ProviderId } from "../settings.js";
import type { ModelSelector } from "./providerTypes.js";

export const OPENROUTER_PREFIX = "openrouter:";

const prefixes: Array<{ provider: ProviderId; prefixes: string[] }> = [
    { provider: "openai", prefixes: ["gpt-", "chatgpt-", "o1", "o3", "o4"] },
    { provider: "anthropic", prefixes: ["claude"] },
    { provider: "groq", prefixes: ["llama", "mixtral", "gemma"] }
];

/**
 * Maps a textual model name onto its provider.
 * Expects: `openrouter:<id>` keeps `<id>` as the wire model id; unknown names return null.
 */
export function modelSelectorParse(value: string): ModelSelector | null {
    const model = value.trim();
    if (!model) {
        return null;
    }
    if (model.startsWith(OPENROUTER_PREFIX)) {
        const modelId = model.slice(OPENROUTER_PREFIX.length).trim();
        return modelId ? { provider: "openrouter", modelId } : null;
    }
    const lower = model.toLowerCase();
    for (const entry of prefixes) {
        if (entry.prefixes.some((prefix) => lower.startsWith(prefix))) {
            return { provider: entry.provider, modelId: model };
        }
    }
    return null;
}

export function modelSelectorFormat(selector: ModelSelector): string {
    return selector.provider === "openrouter" ? `${OPENROUTER_PREFIX}${selector.modelId}` : selector.modelId;
}
