import type { Message } from "../conversation/conversationTypes.js";
import { messageFirstText, messageHasImages } from "../conversation/messageTextExtract.js";
import { getLogger } from "../log.js";
import type { ProviderId } from "../settings.js";
import { OpenAiAdapter } from "./openaiAdapter.js";
import type { ProviderRequest } from "./providerTypes.js";

const logger = getLogger("providers.groq");

/**
 * Groq speaks chat completions but accepts text only: every message is
 * reduced to its first text part.
 */
export class GroqAdapter extends OpenAiAdapter {
    readonly id: ProviderId = "groq";

    async buildRequest(conversation: readonly Message[], modelId: string, maxTokens: number): Promise<ProviderRequest> {
        const notes: string[] = [];
        const newest = conversation[conversation.length - 1];
        if (newest && messageHasImages(newest)) {
            logger.debug(`event: Dropping image input for text-only model model=${modelId}`);
            notes.push(`Image input was ignored: ${modelId} accepts text only.`);
        }

        return {
            url: `${this.options.baseUrl}/chat/completions`,
            headers: this.headersBuild(),
            body: {
                model: modelId,
                max_tokens: maxTokens,
                messages: conversation.map((message) => ({
                    role: message.role,
                    content: messageFirstText(message)
                }))
            },
            notes
        };
    }
}
