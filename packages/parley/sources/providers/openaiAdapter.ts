import type { Message } from "../conversation/conversationTypes.js";
import type { ProviderId } from "../settings.js";
import { chatCompletionParse } from "./chatCompletionParse.js";
import { chatMessageEncode } from "./chatMessageEncode.js";
import { providerFetch } from "./providerFetch.js";
import type { ProviderAdapter, ProviderAdapterOptions, ProviderParseResult, ProviderRequest } from "./providerTypes.js";

/**
 * Chat-completions adapter for OpenAI and compatible servers.
 */
export class OpenAiAdapter implements ProviderAdapter {
    readonly id: ProviderId = "openai";
    protected readonly options: ProviderAdapterOptions;

    constructor(options: ProviderAdapterOptions) {
        this.options = options;
    }

    async buildRequest(conversation: readonly Message[], modelId: string, maxTokens: number): Promise<ProviderRequest> {
        return {
            url: `${this.options.baseUrl}/chat/completions`,
            headers: this.headersBuild(),
            body: {
                model: modelId,
                max_tokens: maxTokens,
                messages: conversation.map(chatMessageEncode)
            },
            notes: []
        };
    }

    parseResponse(wire: unknown): ProviderParseResult {
        return chatCompletionParse(wire);
    }

    execute(request: ProviderRequest, signal?: AbortSignal): Promise<unknown> {
        return providerFetch(request, {
            timeoutMs: this.options.timeoutMs,
            retries: this.options.retries,
            fetchImpl: this.options.fetchImpl,
            sleep: this.options.sleep,
            signal
        });
    }

    protected headersBuild(): Record<string, string> {
        const headers: Record<string, string> = { "Content-Type": "application/json" };
        if (this.options.apiKey) {
            headers.Authorization = `Bearer ${this.options.apiKey}`;
        }
        return headers;
    }
}
