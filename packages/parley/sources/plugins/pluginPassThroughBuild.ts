import type { ConversationPlugin } from "./pluginTypes.js";

/**
 * Extension whose hooks return their input, with selected hooks replaced.
 */
export function pluginPassThroughBuild(overrides: Partial<ConversationPlugin> = {}): ConversationPlugin {
    return {
        preUserText: (text) => text,
        postUserText: (text) => text,
        preUserImages: (images) => images,
        postUserImages: (images) => images,
        preAssistantText: (text) => text,
        postAssistantText: (text) => text,
        preAssistantImages: (images) => images,
        postAssistantImages: (images) => images,
        onSessionStart: () => {},
        onMessageComplete: () => {},
        ...overrides
    };
}
