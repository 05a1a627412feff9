import { z } from "zod";

import type { ContentPart, Message } from "../conversation/conversationTypes.js";
import { messageTextExtract } from "../conversation/messageTextExtract.js";
import { imageDataUrlParse } from "../images/imageDataUrl.js";
import { ImageProcessingError } from "../images/imageProcessingError.js";
import { imageUrlFetch } from "../images/imageUrlFetch.js";
import { getLogger } from "../log.js";
import type { ProviderId } from "../settings.js";
import { providerErrorParse } from "./providerErrorParse.js";
import { SchemaError } from "./providerErrors.js";
import { providerFetch } from "./providerFetch.js";
import type {
    ImageCandidate,
    ProviderAdapter,
    ProviderAdapterOptions,
    ProviderBuildOptions,
    ProviderParseResult,
    ProviderRequest
} from "./providerTypes.js";

export const ANTHROPIC_VERSION = "2023-06-01";

type AnthropicBlock =
    | { type: "text"; text: string }
    | { type: "image"; source: { type: "base64"; media_type: string; data: string } };

type AnthropicMessage = {
    role: "user" | "assistant";
    content: AnthropicBlock[];
};

const responseSchema = z
    .object({
        content: z.array(
            z
                .object({
                    type: z.string(),
                    text: z.string().optional(),
                    source: z
                        .object({
                            type: z.string(),
                            media_type: z.string().optional(),
                            data: z.string().optional()
                        })
                        .passthrough()
                        .optional()
                })
                .passthrough()
        ),
        usage: z
            .object({
                input_tokens: z.number().optional(),
                output_tokens: z.number().optional()
            })
            .passthrough()
            .nullish()
    })
    .passthrough();

const logger = getLogger("providers.anthropic");

/**
 * Anthropic messages API. System messages move to the top-level `system`
 * field, remote images are downloaded and sent inline, and turns are merged
 * so roles alternate starting with the user.
 */
export class AnthropicAdapter implements ProviderAdapter {
    readonly id: ProviderId = "anthropic";
    private readonly options: ProviderAdapterOptions;

    constructor(options: ProviderAdapterOptions) {
        this.options = options;
    }

    async buildRequest(
        conversation: readonly Message[],
        modelId: string,
        maxTokens: number,
        options: ProviderBuildOptions = {}
    ): Promise<ProviderRequest> {
        const systemTexts: string[] = [];
        const messages: AnthropicMessage[] = [];

        for (const message of conversation) {
            if (message.role === "system") {
                const text = messageTextExtract(message);
                if (text) {
                    systemTexts.push(text);
                }
                continue;
            }
            const content = await this.blocksBuild(message.content, options.signal);
            if (content.length === 0) {
                continue;
            }
            const previous = messages[messages.length - 1];
            if (previous && previous.role === message.role) {
                previous.content.push(...content);
                continue;
            }
            if (messages.length === 0 && message.role === "assistant") {
                continue;
            }
            messages.push({ role: message.role, content });
        }

        const body: Record<string, unknown> = {
            model: modelId,
            max_tokens: maxTokens,
            messages
        };
        if (systemTexts.length > 0) {
            body.system = systemTexts.join("\n\n");
        }

        const headers: Record<string, string> = {
            "content-type": "application/json",
            "anthropic-version": ANTHROPIC_VERSION
        };
        if (this.options.apiKey) {
            headers["x-api-key"] = this.options.apiKey;
        }

        return {
            url: `${this.options.baseUrl}/messages`,
            headers,
            body,
            notes: []
        };
    }

    parseResponse(wire: unknown): ProviderParseResult {
        const providerError = providerErrorParse(wire);
        if (providerError) {
            return providerError;
        }
        const parsed = responseSchema.safeParse(wire);
        if (!parsed.success) {
            return new SchemaError("Anthropic response is missing content.", { cause: parsed.error });
        }

        const texts: string[] = [];
        const images: ImageCandidate[] = [];
        for (const block of parsed.data.content) {
            if (block.type === "text" && typeof block.text === "string") {
                texts.push(block.text);
            } else if (block.type === "image" && block.source?.type === "base64" && block.source.data) {
                images.push({
                    source: "content",
                    kind: "inline",
                    base64: block.source.data,
                    mimeType: block.source.media_type ?? "image/png"
                });
            }
        }

        const usage = parsed.data.usage;
        return {
            text: texts.join("\n").trim(),
            images,
            usage: (usage?.input_tokens ?? 0) + (usage?.output_tokens ?? 0)
        };
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

    private async blocksBuild(parts: readonly ContentPart[], signal?: AbortSignal): Promise<AnthropicBlock[]> {
        const blocks: AnthropicBlock[] = [];
        for (const part of parts) {
            switch (part.type) {
                case "text":
                    if (part.text) {
                        blocks.push({ type: "text", text: part.text });
                    }
                    break;
                case "image":
                    blocks.push(imageBlock(part.mimeType, part.data.toString("base64")));
                    break;
                case "imageUrl": {
                    const block = await this.remoteImageBlock(part.url, signal);
                    if (block) {
                        blocks.push(block);
                    }
                    break;
                }
            }
        }
        return blocks;
    }

    private async remoteImageBlock(url: string, signal?: AbortSignal): Promise<AnthropicBlock | null> {
        const dataUrl = imageDataUrlParse(url);
        if (dataUrl) {
            return imageBlock(dataUrl.mimeType, dataUrl.base64);
        }
        try {
            const image = await imageUrlFetch(url, {
                fetchImpl: this.options.fetchImpl,
                retries: this.options.retries,
                sleep: this.options.sleep,
                signal
            });
            return imageBlock(image.mimeType, image.data.toString("base64"));
        } catch (error) {
            if (!(error instanceof ImageProcessingError)) {
                throw error;
            }
            logger.warn({ error }, `skip: Remote image omitted from request url=${url}`);
            return null;
        }
    }
}

function imageBlock(mimeType: string, data: string): AnthropicBlock {
    return { type: "image", source: { type: "base64", media_type: mimeType, data } };
}
