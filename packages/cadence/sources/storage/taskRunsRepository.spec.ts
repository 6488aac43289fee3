import { describe, expect, it } from "vitest";

import { storageOpenTest } from "./storageOpenTest.js";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("TaskRunsRepository", () => {
    it("logs a running row and completes it", async () => {
        const storage = await storageOpenTest();
        try {
            const id = await storage.taskRuns.log({ taskId: "report", status: "running", startTime: 1_000 });

            expect(await storage.taskRuns.findRecent("report")).toEqual([
                { id, taskId: "report", status: "running", startTime: 1_000, endTime: null, error: null }
            ]);

            expect(await storage.taskRuns.complete(id, { status: "failed", endTime: 1_500, error: "timeout" })).toBe(
                true
            );
            expect(await storage.taskRuns.findRecent("report")).toEqual([
                { id, taskId: "report", status: "failed", startTime: 1_000, endTime: 1_500, error: "timeout" }
            ]);
        } finally {
            await storage.close();
        }
    });

    it("returns false when completing a missing run", async () => {
        const storage = await storageOpenTest();
        try {
            expect(await storage.taskRuns.complete(999, { status: "completed", endTime: 1, error: null })).toBe(false);
        } finally {
            await storage.close();
        }
    });

    it("lists the newest runs first within the limit", async () => {
        const storage = await storageOpenTest();
        try {
            for (const startTime of [100, 300, 200, 400]) {
                await storage.taskRuns.log({ taskId: "sync", status: "completed", startTime, endTime: startTime + 1 });
            }
            await storage.taskRuns.log({ taskId: "other", status: "completed", startTime: 500 });

            const runs = await storage.taskRuns.findRecent("sync", 3);
            expect(runs.map((run) => run.startTime)).toEqual([400, 300, 200]);
        } finally {
            await storage.close();
        }
    });

    it("returns nothing for a zero limit and the default for a non-finite one", async () => {
        const storage = await storageOpenTest();
        try {
            for (let startTime = 1; startTime <= 12; startTime += 1) {
                await storage.taskRuns.log({ taskId: "sync", status: "completed", startTime });
            }

            expect(await storage.taskRuns.findRecent("sync", 0)).toEqual([]);
            expect(await storage.taskRuns.findRecent("sync", -3)).toEqual([]);
            expect(await storage.taskRuns.findRecent("sync", Number.NaN)).toHaveLength(10);
            expect(await storage.taskRuns.findRecentForTasks(["sync"], 5, 0)).toEqual([]);
        } finally {
            await storage.close();
        }
    });

    it("merges recent runs across tasks with a per-task cap", async () => {
        const storage = await storageOpenTest();
        try {
            for (const startTime of [10, 20, 30]) {
                await storage.taskRuns.log({ taskId: "a", status: "completed", startTime });
            }
            for (const startTime of [15, 25]) {
                await storage.taskRuns.log({ taskId: "b", status: "completed", startTime });
            }

            const runs = await storage.taskRuns.findRecentForTasks(["a", "b"], 2, 3);
            expect(runs.map((run) => `${run.taskId}:${run.startTime}`)).toEqual(["a:30", "b:25", "a:20"]);
        } finally {
            await storage.close();
        }
    });

    it("deletes only runs older than the retention window", async () => {
        const storage = await storageOpenTest();
        try {
            const now = 100 * DAY_MS;
            await storage.taskRuns.log({ taskId: "old", status: "completed", startTime: now - 31 * DAY_MS });
            await storage.taskRuns.log({ taskId: "recent", status: "completed", startTime: now - 29 * DAY_MS });

            expect(await storage.cleanupOldRuns(30, now)).toBe(1);
            expect(await storage.taskRuns.findRecent("old")).toEqual([]);
            expect(await storage.taskRuns.findRecent("recent")).toHaveLength(1);
        } finally {
            await storage.close();
        }
    });
});
