import { z } from "zod";

import { providerErrorParse } from "./providerErrorParse.js";
import { SchemaError } from "./providerErrors.js";
import type { ImageCandidate, ImageCandidateSource, ProviderParseResult } from "./providerTypes.js";

const imageUrlSchema = z.union([z.string(), z.object({ url: z.string() }).passthrough()]);

const inlineDataSchema = z
    .object({
        data: z.string(),
        mime_type: z.string().optional(),
        mimeType: z.string().optional()
    })
    .passthrough();

const contentPartSchema = z
    .object({
        type: z.string().optional(),
        text: z.string().optional(),
        image_url: imageUrlSchema.optional(),
        inline_data: inlineDataSchema.optional()
    })
    .passthrough();

const messageSchema = z
    .object({
        content: z.union([z.string(), z.array(contentPartSchema)]).nullish(),
        images: z.array(contentPartSchema).nullish()
    })
    .passthrough();

const chatCompletionSchema = z
    .object({
        choices: z.array(z.object({ message: messageSchema }).passthrough()).min(1),
        usage: z.object({ total_tokens: z.number().optional() }).passthrough().nullish()
    })
    .passthrough();

type ContentPart = z.infer<typeof contentPartSchema>;

/**
 * Parses a chat-completions response (OpenAI, Groq, OpenRouter).
 * Expects: content is a string or a list of typed parts; `images` is the
 * optional side array some backends add to the message.
 */
export function chatCompletionParse(wire: unknown): ProviderParseResult {
    const providerError = providerErrorParse(wire);
    if (providerError) {
        return providerError;
    }

    const parsed = chatCompletionSchema.safeParse(wire);
    if (!parsed.success) {
        return new SchemaError("Chat completion response is missing choices.", { cause: parsed.error });
    }

    const message = parsed.data.choices[0]?.message;
    const texts: string[] = [];
    const images: ImageCandidate[] = [];

    const content = message?.content;
    if (typeof content === "string") {
        texts.push(content);
    } else if (content) {
        for (const part of content) {
            if (typeof part.text === "string" && (part.type === undefined || part.type === "text")) {
                texts.push(part.text);
                continue;
            }
            const candidate = candidateFromPart(part, "content");
            if (candidate) {
                images.push(candidate);
            }
        }
    }

    for (const part of message?.images ?? []) {
        const candidate = candidateFromPart(part, "side");
        if (candidate) {
            images.push(candidate);
        }
    }

    return {
        text: texts.join("\n").trim(),
        images,
        usage: parsed.data.usage?.total_tokens ?? 0
    };
}

function candidateFromPart(part: ContentPart, source: ImageCandidateSource): ImageCandidate | null {
    if (part.image_url !== undefined) {
        const url = typeof part.image_url === "string" ? part.image_url : part.image_url.url;
        return url.startsWith("data:") ? { source, kind: "dataUrl", url } : { source, kind: "remote", url };
    }
    if (part.inline_data) {
        const mimeType = part.inline_data.mime_type ?? part.inline_data.mimeType ?? "image/png";
        return { source, kind: "inline", base64: part.inline_data.data, mimeType };
    }
    return null;
}
