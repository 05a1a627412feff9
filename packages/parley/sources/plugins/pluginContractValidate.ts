import { z } from "zod";

import { PluginContractError } from "./pluginErrors.js";
import type {
    CommandHandler,
    ConversationPlugin,
    ImageHook,
    LifecycleHook,
    PluginCommand,
    TextHook
} from "./pluginTypes.js";

function fn<T>() {
    return z.custom<T>((value) => typeof value === "function");
}

const pluginSchema = z
    .object({
        preUserText: fn<TextHook>(),
        postUserText: fn<TextHook>(),
        preUserImages: fn<ImageHook>(),
        postUserImages: fn<ImageHook>(),
        preAssistantText: fn<TextHook>(),
        postAssistantText: fn<TextHook>(),
        preAssistantImages: fn<ImageHook>(),
        postAssistantImages: fn<ImageHook>(),
        onSessionStart: fn<LifecycleHook>(),
        onMessageComplete: fn<LifecycleHook>(),
        getCommands: fn<() => Record<string, PluginCommand>>().optional()
    })
    .passthrough();

const commandsSchema = z.record(
    z.object({
        description: z.string(),
        handler: fn<CommandHandler>(),
        availableWhenLocked: z.boolean().optional()
    })
);

/**
 * Checks that a created extension implements all ten hooks.
 * Expects: value comes from untrusted code; throws PluginContractError listing what is missing.
 */
export function pluginContractValidate(pluginName: string, value: unknown): ConversationPlugin {
    if (typeof value !== "object" || value === null) {
        throw new PluginContractError(pluginName, ["<object>"]);
    }
    const parsed = pluginSchema.safeParse(value);
    if (!parsed.success) {
        const missing = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? "<object>")))];
        throw new PluginContractError(pluginName, missing);
    }
    const plugin = parsed.data;
    // Bound so class-based extensions keep their `this`.
    return {
        preUserText: plugin.preUserText.bind(value),
        postUserText: plugin.postUserText.bind(value),
        preUserImages: plugin.preUserImages.bind(value),
        postUserImages: plugin.postUserImages.bind(value),
        preAssistantText: plugin.preAssistantText.bind(value),
        postAssistantText: plugin.postAssistantText.bind(value),
        preAssistantImages: plugin.preAssistantImages.bind(value),
        postAssistantImages: plugin.postAssistantImages.bind(value),
        onSessionStart: plugin.onSessionStart.bind(value),
        onMessageComplete: plugin.onMessageComplete.bind(value),
        getCommands: plugin.getCommands?.bind(value)
    };
}

/**
 * Validates a getCommands() result; returns null when its shape is wrong.
 */
export function pluginCommandsValidate(value: unknown): Record<string, PluginCommand> | null {
    const parsed = commandsSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
}
