import { describe, expect, it } from "vitest";

import { ProfileError } from "./profileError.js";
import { profileParse } from "./profileParse.js";

describe("profileParse", () => {
    it("reads model, greeting and a multi-line system prompt", () => {
        const profile = profileParse(
            "tutor",
            "claude-3-haiku\r\nHi, ready to learn?\r\nYou are a patient tutor.\r\nAsk one question at a time.\r\n"
        );

        expect(profile).toEqual({
            name: "tutor",
            model: { provider: "anthropic", modelId: "claude-3-haiku" },
            greeting: "Hi, ready to learn?",
            systemPrompt: "You are a patient tutor.\nAsk one question at a time."
        });
    });

    it("accepts openrouter models", () => {
        const profile = profileParse("artist", "openrouter:google/gemini-flash-image\nHello\nDraw things.");
        expect(profile.model).toEqual({ provider: "openrouter", modelId: "google/gemini-flash-image" });
    });

    it("rejects short files", () => {
        expect(() => profileParse("short", "gpt-4o\nHello")).toThrow(ProfileError);
    });

    it("rejects unknown models", () => {
        expect(() => profileParse("bad", "mistral-large\nHello\nPrompt")).toThrow(
            'Profile "bad" names an unknown model: mistral-large'
        );
    });
});
