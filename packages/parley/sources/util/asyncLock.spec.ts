import { describe, expect, it } from "vitest";

import { AsyncLock } from "./asyncLock.js";

describe("AsyncLock", () => {
    it("runs callers one at a time in arrival order", async () => {
        const lock = new AsyncLock();
        const events: string[] = [];
        let releaseFirst: () => void = () => {};
        const firstGate = new Promise<void>((resolve) => {
            releaseFirst = resolve;
        });

        const first = lock.inLock(async () => {
            events.push("first:start");
            await firstGate;
            events.push("first:end");
            return 1;
        });
        const second = lock.inLock(() => {
            events.push("second");
            return 2;
        });

        await Promise.resolve();
        expect(lock.isBusy()).toBe(true);
        releaseFirst();

        expect(await Promise.all([first, second])).toEqual([1, 2]);
        expect(events).toEqual(["first:start", "first:end", "second"]);
        expect(lock.isBusy()).toBe(false);
    });

    it("releases the lock when work throws", async () => {
        const lock = new AsyncLock();
        await expect(
            lock.inLock(() => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");

        await expect(lock.inLock(() => "next")).resolves.toBe("next");
    });
});
