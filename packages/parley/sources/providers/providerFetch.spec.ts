import { describe, expect, it, vi } from "vitest";

import { NetworkError, SchemaError } from "./providerErrors.js";
import { providerFetch } from "./providerFetch.js";
import type { ProviderRequest } from "./providerTypes.js";

const request: ProviderRequest = {
    url: "https://llm.test/v1/chat/completions",
    headers: { "Content-Type": "application/json" },
    body: { model: "gpt-4o-mini", messages: [] },
    notes: []
};

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function hangingFetch() {
    return vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
            })
    );
}

describe("providerFetch", () => {
    it("posts the json body and returns the parsed response", async () => {
        const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ ok: 1 }));

        await expect(providerFetch(request, { fetchImpl })).resolves.toEqual({ ok: 1 });

        const init = fetchImpl.mock.calls[0]?.[1];
        expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://llm.test/v1/chat/completions");
        expect(init?.method).toBe("POST");
        expect(init?.body).toBe(JSON.stringify(request.body));
    });

    it("retries connection failures with doubling backoff", async () => {
        const fetchImpl = vi
            .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ ok: 1 }))
            .mockRejectedValueOnce(new TypeError("fetch failed"))
            .mockRejectedValueOnce(new TypeError("fetch failed"));
        const sleep = vi.fn(async (_ms: number) => {});

        await expect(providerFetch(request, { fetchImpl, sleep, retries: 2 })).resolves.toEqual({ ok: 1 });
        expect(fetchImpl).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls.map((call) => call[0])).toEqual([500, 1000]);
    });

    it("surfaces NetworkError once retries are exhausted", async () => {
        const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
            throw new TypeError("connect ECONNREFUSED");
        });
        const sleep = vi.fn(async (_ms: number) => {});

        await expect(providerFetch(request, { fetchImpl, sleep, retries: 1 })).rejects.toBeInstanceOf(NetworkError);
        expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it("returns error envelopes without retrying", async () => {
        const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
            jsonResponse({ error: { message: "rate limited" } }, 429)
        );

        await expect(providerFetch(request, { fetchImpl })).resolves.toEqual({ error: { message: "rate limited" } });
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it("raises SchemaError for a non-json body", async () => {
        const fetchImpl = vi.fn(
            async (_input: string | URL | Request, _init?: RequestInit) => new Response("<html>bad gateway</html>", { status: 502 })
        );

        await expect(providerFetch(request, { fetchImpl })).rejects.toBeInstanceOf(SchemaError);
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it("treats a timeout as a network failure", async () => {
        const fetchImpl = hangingFetch();

        const error = await providerFetch(request, { fetchImpl, timeoutMs: 10, retries: 0 }).catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(NetworkError);
        expect(error instanceof NetworkError && error.timedOut).toBe(true);
    });

    it("does not retry a cancelled call", async () => {
        const fetchImpl = hangingFetch();
        const controller = new AbortController();

        const pending = providerFetch(request, { fetchImpl, signal: controller.signal, retries: 3 });
        controller.abort(new Error("cancelled"));

        await expect(pending).rejects.toThrow("cancelled");
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
});
