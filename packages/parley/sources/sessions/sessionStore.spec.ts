import { describe, expect, it } from "vitest";

import { messageBuild } from "../conversation/messageBuild.js";
import { SessionStore } from "./sessionStore.js";

function storeBuild(systemPrompt: string | null = null): SessionStore {
    return new SessionStore({
        defaults: {
            model: { provider: "openai", modelId: "gpt-4o-mini" },
            maxRounds: 4,
            systemPrompt
        },
        now: () => 1000
    });
}

describe("SessionStore", () => {
    it("creates a default session once", () => {
        const store = storeBuild();
        const first = store.getOrCreate("chat-1");
        const second = store.getOrCreate("chat-1");

        expect(first.created).toBe(true);
        expect(second.created).toBe(false);
        expect(second.session).toBe(first.session);
        expect(first.session).toMatchObject({
            id: "chat-1",
            conversation: [],
            model: { provider: "openai", modelId: "gpt-4o-mini" },
            tokensUsed: 0,
            maxRounds: 4,
            responseFormat: "auto",
            pluginMetadata: {},
            imageOutput: { modalities: "auto", aspectRatio: null, imageSize: null },
            started: false,
            createdAt: 1000
        });
    });

    it("seeds the configured system prompt and keeps it on clear", () => {
        const store = storeBuild("Be brief.");
        const session = store.get("chat-1");
        session.conversation.push(messageBuild("user", "hi"), messageBuild("assistant", "hello"));

        store.clear("chat-1");
        expect(store.get("chat-1").conversation).toEqual([
            { role: "system", content: [{ type: "text", text: "Be brief." }] }
        ]);
    });

    it("clears to an empty conversation without a system prompt", () => {
        const store = storeBuild();
        store.get("chat-1").conversation.push(messageBuild("user", "hi"));
        store.clear("chat-1");
        expect(store.get("chat-1").conversation).toEqual([]);
    });

    it("trims to the round limit", () => {
        const store = storeBuild("sys");
        store.setMaxRounds("chat-1", 1);
        const session = store.get("chat-1");
        for (const text of ["u1", "a1", "u2", "a2"]) {
            session.conversation.push(messageBuild(text.startsWith("u") ? "user" : "assistant", text));
        }

        store.trim("chat-1");
        expect(store.get("chat-1").conversation.map((message) => message.content[0])).toEqual([
            { type: "text", text: "sys" },
            { type: "text", text: "u2" },
            { type: "text", text: "a2" }
        ]);
    });

    it("never throws for unknown ids", () => {
        const store = storeBuild();
        expect(() => store.trim("new")).not.toThrow();
        expect(() => store.clear("other")).not.toThrow();
        expect(store.list()).toEqual(["new", "other"]);
    });

    it("falls back to the default round limit for invalid values", () => {
        const store = storeBuild();
        expect(store.setMaxRounds("chat-1", 0)).toBe(4);
        expect(store.setMaxRounds("chat-1", 2.5)).toBe(4);
        expect(store.setMaxRounds("chat-1", 2)).toBe(2);
    });

    it("validates response formats and image output", () => {
        const store = storeBuild();
        expect(store.setResponseFormat("chat-1", "Both")).toBe(true);
        expect(store.get("chat-1").responseFormat).toBe("both");
        expect(store.setResponseFormat("chat-1", "sepia")).toBe(false);

        expect(store.setImageOutput("chat-1", { aspectRatio: "16:9", imageSize: "HD" })).toBe(true);
        expect(store.setImageOutput("chat-1", { aspectRatio: "7:3" })).toBe(false);
        expect(store.get("chat-1").imageOutput).toEqual({ modalities: "auto", aspectRatio: "16:9", imageSize: "HD" });
    });

    it("applies a profile", () => {
        const store = storeBuild();
        store.get("chat-1").conversation.push(messageBuild("user", "old"));
        store.applyProfile("chat-1", {
            name: "tutor",
            model: { provider: "anthropic", modelId: "claude-3-haiku" },
            greeting: "Hello!",
            systemPrompt: "You are a patient tutor."
        });

        const session = store.get("chat-1");
        expect(session.profileName).toBe("tutor");
        expect(session.model).toEqual({ provider: "anthropic", modelId: "claude-3-haiku" });
        expect(session.conversation).toEqual([
            { role: "system", content: [{ type: "text", text: "You are a patient tutor." }] }
        ]);

        store.clear("chat-1");
        expect(store.get("chat-1").conversation).toHaveLength(1);
    });

    it("deactivates sessions", () => {
        const store = storeBuild();
        store.get("chat-1");
        expect(store.deactivate("chat-1")).toBe(true);
        expect(store.has("chat-1")).toBe(false);
        expect(store.deactivate("chat-1")).toBe(false);
        expect(store.getOrCreate("chat-1").created).toBe(true);
    });

    it("serializes work per chat but not across chats", async () => {
        const store = storeBuild();
        const events: string[] = [];
        let release: () => void = () => {};
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });

        const slow = store.inLock("a", async () => {
            await gate;
            events.push("a1");
        });
        const queued = store.inLock("a", () => {
            events.push("a2");
        });
        const other = store.inLock("b", () => {
            events.push("b1");
        });

        await other;
        expect(events).toEqual(["b1"]);
        release();
        await Promise.all([slow, queued]);
        expect(events).toEqual(["b1", "a1", "a2"]);
    });

    it("marks a session started once, even when a setter created it", () => {
        const store = storeBuild();
        store.setResponseFormat("chat-1", "text");

        expect(store.markStarted("chat-1")).toBe(true);
        expect(store.markStarted("chat-1")).toBe(false);
        expect(store.get("chat-1").responseFormat).toBe("text");
    });

    it("drops a chat's lock once its work is done", async () => {
        const store = storeBuild();
        let inside = -1;

        await store.inLock("chat-1", () => {
            inside = store.lockCount();
        });

        expect(inside).toBe(1);
        expect(store.lockCount()).toBe(0);
    });

    it("keeps a chat's lock while work is queued on it", async () => {
        const store = storeBuild();
        let release: () => void = () => {};
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const order: string[] = [];

        const first = store.inLock("chat-1", async () => {
            await gate;
            order.push("first");
        });
        const second = store.inLock("chat-1", () => {
            order.push(`second locks=${store.lockCount()}`);
        });
        release();
        await Promise.all([first, second]);

        expect(order).toEqual(["first", "second locks=1"]);
        expect(store.lockCount()).toBe(0);
    });

    it("hides plugin metadata from snapshots", () => {
        const store = storeBuild();
        store.get("chat-1").pluginMetadata.visits = 1;
        const snapshot = store.snapshot("chat-1");
        expect("pluginMetadata" in snapshot).toBe(false);
        expect(Object.isFrozen(snapshot)).toBe(true);
    });
});
