import { messageBuild, messageBuildSystem } from "../conversation/messageBuild.js";
import type { Message } from "../conversation/conversationTypes.js";
import { getLogger } from "../log.js";
import type { ProviderAdapter } from "../providers/providerTypes.js";
import type { PluginAi } from "./pluginTypes.js";

export const PLUGIN_AI_TIMEOUT_MS = 30_000;
export const PLUGIN_AI_MAX_TOKENS = 500;

export type PluginAiBuildOptions = {
    adapter: ProviderAdapter;
    defaultModel: string;
    timeoutMs?: number;
};

const logger = getLogger("plugins.ai");

/**
 * Builds the model helper handed to hooks.
 * Expects: adapter targets OpenRouter; errors propagate to the calling hook.
 */
export function pluginAiBuild(options: PluginAiBuildOptions): PluginAi {
    const timeoutMs = options.timeoutMs ?? PLUGIN_AI_TIMEOUT_MS;

    const complete = async (conversation: Message[], model: string, maxTokens: number): Promise<string> => {
        const request = await options.adapter.buildRequest(conversation, model, maxTokens);
        const wire = await options.adapter.execute(request, AbortSignal.timeout(timeoutMs));
        const reply = options.adapter.parseResponse(wire);
        if (reply instanceof Error) {
            throw reply;
        }
        logger.debug(`event: Helper call completed model=${model} tokens=${reply.usage}`);
        return reply.text;
    };

    return {
        callAi: (request) =>
            complete(
                [messageBuild("user", request.prompt, request.images ?? [])],
                request.model ?? options.defaultModel,
                request.maxTokens ?? PLUGIN_AI_MAX_TOKENS
            ),
        quickCall: (system, user, model) =>
            complete(
                [messageBuildSystem(system), messageBuild("user", user)],
                model ?? options.defaultModel,
                PLUGIN_AI_MAX_TOKENS
            )
    };
}
