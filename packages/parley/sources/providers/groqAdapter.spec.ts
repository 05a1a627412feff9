import { describe, expect, it } from "vitest";

import { messageBuild } from "../conversation/messageBuild.js";
import { GroqAdapter } from "./groqAdapter.js";

const image = { data: Buffer.from([1, 2, 3]), mimeType: "image/jpeg" };

describe("GroqAdapter", () => {
    it("flattens every message to its first text part", async () => {
        const adapter = new GroqAdapter({ baseUrl: "https://groq.test/openai/v1", apiKey: "test-secret" });
        const request = await adapter.buildRequest(
            [
                { role: "user", content: [{ type: "text", text: "first" }, { type: "text", text: "second" }] },
                messageBuild("assistant", "reply"),
                messageBuild("user", "look", [image])
            ],
            "llama-3.1-8b-instant",
            500
        );

        expect(request.url).toBe("https://groq.test/openai/v1/chat/completions");
        expect(request.body.messages).toEqual([
            { role: "user", content: "first" },
            { role: "assistant", content: "reply" },
            { role: "user", content: "look" }
        ]);
        expect(request.notes).toEqual(["Image input was ignored: llama-3.1-8b-instant accepts text only."]);
    });

    it("adds no note when only older messages carried images", async () => {
        const adapter = new GroqAdapter({ baseUrl: "https://groq.test/openai/v1", apiKey: "test-secret" });
        const request = await adapter.buildRequest(
            [messageBuild("user", "old", [image]), messageBuild("assistant", "ok"), messageBuild("user", "new")],
            "gemma2-9b-it",
            500
        );

        expect(request.notes).toEqual([]);
        expect(adapter.id).toBe("groq");
    });
});
