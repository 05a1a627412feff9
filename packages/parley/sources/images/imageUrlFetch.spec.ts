import { describe, expect, it, vi } from "vitest";

import { ImageProcessingError } from "./imageProcessingError.js";
import { imageUrlFetch } from "./imageUrlFetch.js";

const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);

describe("imageUrlFetch", () => {
    it("falls back to image/jpeg for unrecognized bytes without an image content-type", async () => {
        const fetchImpl = vi.fn(
            async (_input: string | URL | Request, _init?: RequestInit) => new Response(Buffer.from("opaque"))
        );

        await expect(imageUrlFetch("https://cdn.test/blob", { fetchImpl })).resolves.toEqual({
            data: Buffer.from("opaque"),
            mimeType: "image/jpeg"
        });
    });

    it("gives up with fetch_failed once retries are exhausted", async () => {
        const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
            throw new TypeError("fetch failed");
        });
        const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

        const error = await imageUrlFetch("https://cdn.test/cat.jpg", { fetchImpl, sleep, retries: 2 }).catch(
            (caught: unknown) => caught
        );

        expect(error).toBeInstanceOf(ImageProcessingError);
        expect(error instanceof ImageProcessingError ? error.kind : null).toBe("fetch_failed");
        expect(fetchImpl).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls.map((call) => call[0])).toEqual([500, 1000]);
    });

    it("does not retry an error status", async () => {
        const fetchImpl = vi.fn(
            async (_input: string | URL | Request, _init?: RequestInit) => new Response(JPEG, { status: 503 })
        );
        const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

        await expect(imageUrlFetch("https://cdn.test/cat.jpg", { fetchImpl, sleep })).rejects.toBeInstanceOf(
            ImageProcessingError
        );
        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });
});
