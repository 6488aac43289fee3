import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { TimerEngine } from "./timerEngine.js";
import { JobLookupError } from "./timerTypes.js";

describe("TimerEngine", () => {
    let engine: TimerEngine;

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date("2026-05-01T12:00:00.000Z"));
        engine = new TimerEngine({ timezone: "UTC", misfireGraceMs: 60_000, maxInstances: 3 });
    });

    afterEach(async () => {
        engine.shutdown();
        await engine.drain();
        vi.useRealTimers();
    });

    it("fires interval jobs every period", async () => {
        const run = vi.fn();
        engine.start();
        engine.addJob({
            id: "job-1",
            trigger: { kind: "interval", unit: "s", count: 10, anchor: new Date() },
            run
        });

        expect(engine.getJob("job-1")?.nextRunTime?.toISOString()).toBe("2026-05-01T12:00:10.000Z");

        await vi.advanceTimersByTimeAsync(10_000);
        expect(run).toHaveBeenCalledTimes(1);
        expect(engine.getJob("job-1")?.nextRunTime?.toISOString()).toBe("2026-05-01T12:00:20.000Z");

        await vi.advanceTimersByTimeAsync(20_000);
        expect(run).toHaveBeenCalledTimes(3);
    });

    it("removes one-shot jobs after they fire", async () => {
        const run = vi.fn();
        engine.start();
        engine.addJob({ id: "once", trigger: { kind: "date", instant: new Date("2026-05-01T12:00:05.000Z") }, run });

        await vi.advanceTimersByTimeAsync(5_000);

        expect(run).toHaveBeenCalledTimes(1);
        expect(engine.getJob("once")).toBeNull();
    });

    it("drops one-shot jobs whose instant is beyond the misfire grace", async () => {
        const run = vi.fn();
        engine.start();
        engine.addJob({ id: "stale", trigger: { kind: "date", instant: new Date("2020-01-01T00:00:00.000Z") }, run });

        expect(engine.getJob("stale")?.nextRunTime?.toISOString()).toBe("2020-01-01T00:00:00.000Z");

        await vi.advanceTimersByTimeAsync(0);

        expect(run).not.toHaveBeenCalled();
        expect(engine.getJob("stale")).toBeNull();
    });

    it("still runs a one-shot that is late but within the grace period", async () => {
        const run = vi.fn();
        engine.addJob({ id: "late", trigger: { kind: "date", instant: new Date("2026-05-01T11:59:30.000Z") }, run });
        engine.start();

        await vi.advanceTimersByTimeAsync(0);

        expect(run).toHaveBeenCalledTimes(1);
    });

    it("enforces the per-job instance ceiling", async () => {
        let release: () => void = () => {};
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const run = vi.fn(() => gate);
        engine.start();
        engine.addJob({
            id: "slow",
            trigger: { kind: "interval", unit: "s", count: 1, anchor: new Date() },
            run,
            maxInstances: 2
        });

        await vi.advanceTimersByTimeAsync(5_000);

        expect(run).toHaveBeenCalledTimes(2);
        expect(engine.getJob("slow")?.runningInstances).toBe(2);

        release();
        await vi.advanceTimersByTimeAsync(1_000);
        expect(run).toHaveBeenCalledTimes(3);
    });

    it("keeps firing after a job rejects", async () => {
        const run = vi.fn(async () => {
            throw new Error("boom");
        });
        engine.start();
        engine.addJob({ id: "flaky", trigger: { kind: "interval", unit: "s", count: 10, anchor: new Date() }, run });

        await vi.advanceTimersByTimeAsync(20_000);

        expect(run).toHaveBeenCalledTimes(2);
        expect(engine.getJob("flaky")?.runningInstances).toBe(0);
    });

    it("rejects duplicate ids unless replacing", () => {
        const trigger = { kind: "interval", unit: "m", count: 1, anchor: new Date() } as const;
        engine.addJob({ id: "dup", trigger, run: vi.fn() });

        expect(() => engine.addJob({ id: "dup", trigger, run: vi.fn() })).toThrow(
            "Job identifier (dup) conflicts with an existing job"
        );
        expect(() => engine.addJob({ id: "dup", trigger, run: vi.fn(), replaceExisting: true })).not.toThrow();
        expect(engine.jobsList()).toHaveLength(1);
    });

    it("throws JobLookupError when removing an unknown job", () => {
        expect(() => engine.removeJob("missing")).toThrow(JobLookupError);
    });

    it("does not fire after shutdown", async () => {
        const run = vi.fn();
        engine.start();
        engine.addJob({ id: "job", trigger: { kind: "interval", unit: "s", count: 10, anchor: new Date() }, run });

        engine.shutdown();
        await vi.advanceTimersByTimeAsync(30_000);

        expect(run).not.toHaveBeenCalled();
    });
});
