import { describe, expect, it } from "vitest";

import { pluginInvoke } from "./pluginInvoke.js";

describe("pluginInvoke", () => {
    it("returns the hook value", async () => {
        await expect(pluginInvoke("preUserText", 1000, () => "ok")).resolves.toEqual({ ok: true, value: "ok" });
    });

    it("captures thrown errors", async () => {
        const result = await pluginInvoke("preUserText", 1000, () => {
            throw new Error("boom");
        });
        expect(result.ok).toBe(false);
        expect(result.ok ? null : [result.failure.reason, result.failure.message]).toEqual([
            "error",
            "Hook preUserText failed: boom"
        ]);
    });

    it("times out slow hooks and aborts their signal", async () => {
        const seen: { signal: AbortSignal | null } = { signal: null };
        const result = await pluginInvoke("postUserText", 20, (signal) => {
            seen.signal = signal;
            return new Promise<string>(() => {});
        });

        expect(result.ok ? null : result.failure.reason).toBe("timeout");
        expect(seen.signal?.aborted).toBe(true);
    });
});
