import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { storageUpgrade } from "./storageUpgrade.js";

describe("storageUpgrade", () => {
    it("applies pending migrations once", async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), "cadence-upgrade-"));
        const db = { path: path.join(dir, "scheduler.pglite"), url: null, autoMigrate: false };
        try {
            const first = await storageUpgrade({ db });
            expect(first).toEqual({
                pendingBefore: ["20260901_add_schedules", "20260901_add_task_runs"],
                applied: ["20260901_add_schedules", "20260901_add_task_runs"]
            });

            expect(await storageUpgrade({ db })).toEqual({ pendingBefore: [], applied: [] });
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});
