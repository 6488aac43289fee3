import { describe, expect, it } from "vitest";

import { AsyncLock } from "./lock.js";

describe("AsyncLock", () => {
    it("runs critical sections one at a time in arrival order", async () => {
        const lock = new AsyncLock();
        const order: string[] = [];
        let releaseFirst: () => void = () => {};
        const firstGate = new Promise<void>((resolve) => {
            releaseFirst = resolve;
        });

        const first = lock.inLock(async () => {
            order.push("first:start");
            await firstGate;
            order.push("first:end");
        });
        const second = lock.inLock(() => {
            order.push("second");
        });

        await Promise.resolve();
        expect(order).toEqual(["first:start"]);
        expect(lock.isLocked()).toBe(true);

        releaseFirst();
        await Promise.all([first, second]);

        expect(order).toEqual(["first:start", "first:end", "second"]);
        expect(lock.isLocked()).toBe(false);
    });

    it("releases the lock when the section throws", async () => {
        const lock = new AsyncLock();

        await expect(
            lock.inLock(() => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");

        await expect(lock.inLock(() => 42)).resolves.toBe(42);
        expect(lock.isLocked()).toBe(false);
    });
});
