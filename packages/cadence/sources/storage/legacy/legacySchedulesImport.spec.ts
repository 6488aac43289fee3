import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { Storage } from "../storage.js";
import { storageOpenTest } from "../storageOpenTest.js";
import { legacyScheduleValueBuild, legacySchedulesImport } from "./legacySchedulesImport.js";

describe("legacySchedulesImport", () => {
    let dir: string;
    let legacyPath: string;
    let storage: Storage;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), "cadence-legacy-"));
        legacyPath = path.join(dir, "scheduled_tasks.json");
        storage = await storageOpenTest();
    });

    afterEach(async () => {
        await storage.close();
        await rm(dir, { recursive: true, force: true });
    });

    it("imports every entry and renames the file", async () => {
        await writeFile(
            legacyPath,
            JSON.stringify({
                report: {
                    job_id: "task_report_1",
                    next_run_time: "2026-06-01T09:00:00+00:00",
                    trigger: { type: "cron", minute: "0", hour: "9", day: "*", month: "*", day_of_week: "*" }
                },
                sync: { job_id: "task_sync_1", next_run_time: null, trigger: { type: "interval", seconds: 7200 } },
                launch: { job_id: "task_launch_1", trigger: { type: "date", run_date: "2026-07-01T00:00:00Z" } }
            })
        );

        const result = await legacySchedulesImport(storage, legacyPath);

        expect(result).toEqual({
            status: "imported",
            imported: 3,
            skipped: 0,
            renamedTo: `${legacyPath}.migrated`
        });
        await expect(stat(legacyPath)).rejects.toThrow();
        expect(JSON.parse(await readFile(`${legacyPath}.migrated`, "utf8"))).toHaveProperty("report");

        const report = await storage.schedules.findByTaskId("report");
        expect(report).toMatchObject({
            jobId: "task_report_1",
            scheduleType: "cron",
            scheduleValue: "cron:0 9 * * *",
            nextRunTime: Date.parse("2026-06-01T09:00:00Z")
        });
        expect(await storage.schedules.findByTaskId("sync")).toMatchObject({
            scheduleType: "interval",
            scheduleValue: "every 2h",
            nextRunTime: null
        });
        expect(await storage.schedules.findByTaskId("launch")).toMatchObject({
            scheduleType: "date",
            scheduleValue: "at:2026-07-01T00:00:00Z"
        });
    });

    it("skips task ids that already have a schedule", async () => {
        await storage.schedules.save({
            taskId: "report",
            jobId: "task_report_new",
            scheduleType: "interval",
            scheduleValue: "every 5m"
        });
        await writeFile(
            legacyPath,
            JSON.stringify({
                report: { job_id: "task_report_old", trigger: { type: "interval", seconds: 60 } },
                other: { job_id: "task_other_old", trigger: { type: "interval", seconds: 30 } }
            })
        );

        const result = await legacySchedulesImport(storage, legacyPath);

        expect(result).toMatchObject({ status: "imported", imported: 1, skipped: 1 });
        expect((await storage.schedules.findByTaskId("report"))?.jobId).toBe("task_report_new");
        expect((await storage.schedules.findByTaskId("other"))?.scheduleValue).toBe("every 30s");
    });

    it("reports a missing file", async () => {
        expect(await legacySchedulesImport(storage, legacyPath)).toEqual({ status: "missing" });
    });

    it("leaves an empty map in place", async () => {
        await writeFile(legacyPath, "{}");

        expect(await legacySchedulesImport(storage, legacyPath)).toEqual({ status: "empty" });
        expect(await readFile(legacyPath, "utf8")).toBe("{}");
    });

    it("leaves unparseable files in place and imports nothing", async () => {
        await writeFile(legacyPath, "{not json");

        const result = await legacySchedulesImport(storage, legacyPath);

        expect(result.status).toBe("failed");
        expect(await readFile(legacyPath, "utf8")).toBe("{not json");
        expect(await storage.schedules.findAll()).toEqual([]);
    });

    it("stores unrecognized triggers as unknown", async () => {
        await writeFile(
            legacyPath,
            JSON.stringify({
                odd: { job_id: "task_odd_1", trigger: { type: "calendarinterval" } },
                bare: "not an object"
            })
        );

        await legacySchedulesImport(storage, legacyPath);

        expect(await storage.schedules.findByTaskId("odd")).toMatchObject({
            scheduleType: "unknown",
            scheduleValue: "unknown"
        });
        expect(await storage.schedules.findByTaskId("bare")).toMatchObject({
            jobId: "",
            scheduleType: "unknown",
            scheduleValue: "unknown"
        });
    });
});

describe("legacyScheduleValueBuild", () => {
    it("converts interval seconds into the largest fitting unit", () => {
        const value = (seconds: number) => legacyScheduleValueBuild({ type: "interval", seconds }).scheduleValue;

        expect(value(45)).toBe("every 45s");
        expect(value(90)).toBe("every 1m");
        expect(value(3600)).toBe("every 1h");
        expect(value(86399)).toBe("every 23h");
        expect(value(172800)).toBe("every 2d");
        expect(value(0)).toBe("unknown");
    });

    it("keeps the cron type when fields are missing", () => {
        expect(legacyScheduleValueBuild({ type: "cron", minute: "0", hour: "9" })).toEqual({
            scheduleType: "cron",
            scheduleValue: "unknown"
        });
    });

    it("marks date triggers without a run date as unknown", () => {
        expect(legacyScheduleValueBuild({ type: "date" })).toEqual({ scheduleType: "date", scheduleValue: "unknown" });
    });
});
