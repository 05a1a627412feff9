import { describe, expect, it } from "vitest";

import { chatCompletionParse } from "./chatCompletionParse.js";
import { ProviderError, SchemaError } from "./providerErrors.js";

describe("chatCompletionParse", () => {
    it("reads string content and total tokens", () => {
        const result = chatCompletionParse({
            choices: [{ message: { role: "assistant", content: "  Hello there.  " } }],
            usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 }
        });

        expect(result).toEqual({ text: "Hello there.", images: [], usage: 7 });
    });

    it("reads typed parts and the side image array", () => {
        const result = chatCompletionParse({
            choices: [
                {
                    message: {
                        content: [
                            { type: "text", text: "Here you go" },
                            { type: "image_url", image_url: { url: "data:image/png;base64,AAEC" } },
                            { type: "image_url", image_url: "https://cdn.test/cat.png" },
                            { type: "inline_data", inline_data: { mime_type: "image/webp", data: "AAAA" } }
                        ],
                        images: [{ type: "image_url", image_url: { url: "data:image/png;base64,AAEC" } }]
                    }
                }
            ]
        });

        expect(result).toEqual({
            text: "Here you go",
            images: [
                { source: "content", kind: "dataUrl", url: "data:image/png;base64,AAEC" },
                { source: "content", kind: "remote", url: "https://cdn.test/cat.png" },
                { source: "content", kind: "inline", base64: "AAAA", mimeType: "image/webp" },
                { source: "side", kind: "dataUrl", url: "data:image/png;base64,AAEC" }
            ],
            usage: 0
        });
    });

    it("returns a ProviderError for an error envelope", () => {
        const result = chatCompletionParse({
            error: { message: "rate limited", type: "rate_limit_error", code: 429 }
        });

        expect(result).toBeInstanceOf(ProviderError);
        expect(result instanceof ProviderError ? [result.message, result.type, result.code] : null).toEqual([
            "rate limited",
            "rate_limit_error",
            "429"
        ]);
    });

    it("returns a SchemaError when choices are missing", () => {
        expect(chatCompletionParse({ choices: [] })).toBeInstanceOf(SchemaError);
        expect(chatCompletionParse("nope")).toBeInstanceOf(SchemaError);
    });

    it("treats null content as empty text", () => {
        expect(chatCompletionParse({ choices: [{ message: { content: null } }] })).toEqual({
            text: "",
            images: [],
            usage: 0
        });
    });
});
