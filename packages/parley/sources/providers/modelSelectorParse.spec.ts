import { describe, expect, it } from "vitest";

import { modelSelectorFormat, modelSelectorParse } from "./modelSelectorParse.js";

describe("modelSelectorParse", () => {
    it("maps known prefixes to providers", () => {
        expect(modelSelectorParse("gpt-4o-mini")).toEqual({ provider: "openai", modelId: "gpt-4o-mini" });
        expect(modelSelectorParse("o3-mini")).toEqual({ provider: "openai", modelId: "o3-mini" });
        expect(modelSelectorParse("chatgpt-4o-latest")).toEqual({ provider: "openai", modelId: "chatgpt-4o-latest" });
        expect(modelSelectorParse("claude-3-5-sonnet-latest")).toEqual({
            provider: "anthropic",
            modelId: "claude-3-5-sonnet-latest"
        });
        expect(modelSelectorParse("llama-3.1-8b-instant")).toEqual({ provider: "groq", modelId: "llama-3.1-8b-instant" });
        expect(modelSelectorParse("mixtral-8x7b-32768")).toEqual({ provider: "groq", modelId: "mixtral-8x7b-32768" });
    });

    it("strips the openrouter namespace from the wire id", () => {
        expect(modelSelectorParse("openrouter:google/gemini-2.5-flash-image")).toEqual({
            provider: "openrouter",
            modelId: "google/gemini-2.5-flash-image"
        });
    });

    it("rejects unknown names", () => {
        expect(modelSelectorParse("mistral-large")).toBeNull();
        expect(modelSelectorParse("openrouter:")).toBeNull();
        expect(modelSelectorParse("  ")).toBeNull();
    });

    it("formats selectors back to their textual form", () => {
        expect(modelSelectorFormat({ provider: "openrouter", modelId: "x/y" })).toBe("openrouter:x/y");
        expect(modelSelectorFormat({ provider: "groq", modelId: "gemma2-9b-it" })).toBe("gemma2-9b-it");
    });
});
