import { describe, expect, it } from "vitest";

import { runLineFormat, scheduleLineFormat } from "./commandFormat.js";

describe("scheduleLineFormat", () => {
    it("prints the readable schedule and next run", () => {
        expect(
            scheduleLineFormat({
                id: 1,
                taskId: "report",
                jobId: "task_report_1",
                scheduleType: "interval",
                scheduleValue: "every 2h",
                createdAt: 0,
                nextRunTime: Date.parse("2026-05-01T14:00:00.000Z")
            })
        ).toBe("report\tEvery 2 hours\tnext=2026-05-01T14:00:00.000Z");
    });

    it("marks schedules without a next run", () => {
        expect(
            scheduleLineFormat({
                id: 2,
                taskId: "legacy",
                jobId: "",
                scheduleType: "unknown",
                scheduleValue: "unknown",
                createdAt: 0,
                nextRunTime: null
            })
        ).toBe("legacy\tunknown\tnext=-");
    });
});

describe("runLineFormat", () => {
    it("includes duration and error", () => {
        expect(
            runLineFormat({
                id: 1,
                taskId: "report",
                status: "failed",
                startTime: Date.parse("2026-05-01T12:00:00.000Z"),
                endTime: Date.parse("2026-05-01T12:00:01.500Z"),
                error: "timeout"
            })
        ).toBe("2026-05-01T12:00:00.000Z\tfailed\t1500ms\ttimeout");
    });

    it("shows running rows without a duration", () => {
        expect(
            runLineFormat({
                id: 2,
                taskId: "report",
                status: "running",
                startTime: Date.parse("2026-05-01T12:00:00.000Z"),
                endTime: null,
                error: null
            })
        ).toBe("2026-05-01T12:00:00.000Z\trunning\t-");
    });
});
