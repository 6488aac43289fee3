import path from "node:path";

import { describe, expect, it } from "vitest";

import { configResolve } from "./configResolve.js";

describe("configResolve", () => {
    it("applies defaults under the data directory", () => {
        const config = configResolve({ engine: { dataDir: "/tmp/cadence/data" } }, "/tmp/cadence/settings.json", {
            env: {}
        });

        expect(config.configDir).toBe(path.resolve("/tmp/cadence"));
        expect(config.dataDir).toBe(path.resolve("/tmp/cadence/data"));
        expect(config.db).toEqual({
            path: path.resolve("/tmp/cadence/data/scheduler.pglite"),
            url: null,
            autoMigrate: true
        });
        expect(config.legacySchedulesPath).toBe(path.resolve("/tmp/cadence/data/scheduled_tasks.json"));
        expect(config.scheduler).toEqual({
            timezone: "UTC",
            maxInstances: 3,
            misfireGraceMs: 60_000,
            retentionDays: 30,
            cleanupHour: 2
        });
    });

    it("lets environment variables win over settings", () => {
        const config = configResolve(
            {
                scheduler: { timezone: "Europe/Berlin", maxInstances: 5, retentionDays: 10, cleanupHour: 4 },
                engine: { dataDir: "/tmp/cadence/data" }
            },
            "/tmp/cadence/settings.json",
            {
                env: {
                    SCHEDULER_PERSISTENCE_PATH: "/srv/scheduler",
                    SCHEDULER_TIMEZONE: "America/New_York",
                    SCHEDULER_MAX_INSTANCES: "2",
                    SCHEDULER_MISFIRE_GRACE_SECONDS: "15",
                    SCHEDULER_RETENTION_DAYS: " "
                }
            }
        );

        expect(config.dataDir).toBe(path.resolve("/srv/scheduler"));
        expect(config.scheduler).toEqual({
            timezone: "America/New_York",
            maxInstances: 2,
            misfireGraceMs: 15_000,
            retentionDays: 10,
            cleanupHour: 4
        });
    });

    it("rejects invalid timezones and numbers", () => {
        expect(() =>
            configResolve({}, "/tmp/cadence/settings.json", { env: { SCHEDULER_TIMEZONE: "Mars/Olympus" } })
        ).toThrow("Invalid scheduler timezone: Mars/Olympus");
        expect(() =>
            configResolve({}, "/tmp/cadence/settings.json", { env: { SCHEDULER_MAX_INSTANCES: "many" } })
        ).toThrow(/^Invalid SCHEDULER_MAX_INSTANCES/);
    });

    it("returns a frozen snapshot", () => {
        const config = configResolve({ scheduler: { cleanupHour: 3 } }, "/tmp/cadence/settings.json", { env: {} });

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.scheduler)).toBe(true);
        expect(Object.isFrozen(config.settings.scheduler)).toBe(true);
    });
});
