import type { SessionSnapshot } from "../sessions/sessionTypes.js";
import type { PluginContextInput } from "./pluginTypes.js";

/**
 * Minimal hook context for specs.
 */
export function pluginTestContext(overrides: Partial<PluginContextInput> = {}): PluginContextInput {
    const session: SessionSnapshot = {
        id: "chat-1",
        conversation: [],
        model: { provider: "openai", modelId: "gpt-4o-mini" },
        tokensUsed: 0,
        maxRounds: 4,
        responseFormat: "auto",
        systemPrompt: null,
        profileName: null,
        imageOutput: { modalities: "auto", aspectRatio: null, imageSize: null },
        started: true,
        createdAt: 0,
        updatedAt: 0
    };
    return {
        chatId: "chat-1",
        session,
        history: [],
        metadata: {},
        ai: {
            callAi: async () => "",
            quickCall: async () => ""
        },
        model: "gpt-4o-mini",
        locked: false,
        ...overrides
    };
}
