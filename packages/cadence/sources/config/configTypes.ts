import type { z } from "zod";

import type { settingsSchema } from "./configSettingsParse.js";

export type SettingsConfig = z.infer<typeof settingsSchema>;

/**
 * Scheduler tuning after defaults and environment overrides are applied.
 */
export type SchedulerConfig = {
    timezone: string;
    maxInstances: number;
    misfireGraceMs: number;
    retentionDays: number;
    /** Hour (0-23, scheduler timezone) of the daily run-history cleanup. */
    cleanupHour: number;
};

export type Config = {
    settingsPath: string;
    configDir: string;
    dataDir: string;
    db: {
        path: string;
        url: string | null;
        autoMigrate: boolean;
    };
    legacySchedulesPath: string;
    scheduler: SchedulerConfig;
    settings: SettingsConfig;
};

export type ConfigOverrides = {
    /** Environment used for SCHEDULER_* overrides; defaults to process.env. */
    env?: Record<string, string | undefined>;
};
