import path from "node:path";

import { cronTimezoneResolve } from "../engine/cron/ops/cronTimezoneResolve.js";
import { DATABASE_DIR_NAME, DEFAULT_DATA_DIR, LEGACY_SCHEDULES_FILE_NAME } from "../paths.js";
import { freezeDeep } from "../util/freezeDeep.js";
import { configEnvParse } from "./configEnvParse.js";
import type { Config, ConfigOverrides, SettingsConfig } from "./configTypes.js";

const DEFAULT_MAX_INSTANCES = 3;
const DEFAULT_MISFIRE_GRACE_SECONDS = 60;
const DEFAULT_RETENTION_DAYS = 30;
const DEFAULT_CLEANUP_HOUR = 2;

/**
 * Resolves derived paths and defaults into an immutable Config snapshot.
 * Environment variables win over the settings file.
 * Expects: settings already validated.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const env = configEnvParse(overrides.env ?? process.env);
    const resolvedSettingsPath = path.resolve(settingsPath);
    const configDir = path.dirname(resolvedSettingsPath);
    const dataDir = path.resolve(env.SCHEDULER_PERSISTENCE_PATH ?? settings.engine?.dataDir ?? DEFAULT_DATA_DIR);
    const dbPath = path.resolve(settings.engine?.dbPath ?? path.join(dataDir, DATABASE_DIR_NAME));
    const scheduler = settings.scheduler;

    return freezeDeep({
        settingsPath: resolvedSettingsPath,
        configDir,
        dataDir,
        db: {
            path: dbPath,
            url: env.SCHEDULER_DB_URL ?? settings.engine?.dbUrl ?? null,
            autoMigrate: settings.engine?.autoMigrate ?? true
        },
        legacySchedulesPath: path.join(dataDir, LEGACY_SCHEDULES_FILE_NAME),
        scheduler: {
            timezone: cronTimezoneResolve(env.SCHEDULER_TIMEZONE ?? scheduler?.timezone),
            maxInstances: env.SCHEDULER_MAX_INSTANCES ?? scheduler?.maxInstances ?? DEFAULT_MAX_INSTANCES,
            misfireGraceMs:
                (env.SCHEDULER_MISFIRE_GRACE_SECONDS ??
                    scheduler?.misfireGraceSeconds ??
                    DEFAULT_MISFIRE_GRACE_SECONDS) * 1000,
            retentionDays: env.SCHEDULER_RETENTION_DAYS ?? scheduler?.retentionDays ?? DEFAULT_RETENTION_DAYS,
            cleanupHour: scheduler?.cleanupHour ?? DEFAULT_CLEANUP_HOUR
        },
        settings: freezeDeep(structuredClone(settings))
    });
}
