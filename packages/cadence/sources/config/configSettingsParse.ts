import { z } from "zod";

import type { SettingsConfig } from "./configTypes.js";

export const settingsSchema = z
    .object({
        scheduler: z
            .object({
                timezone: z.string().trim().min(1).optional(),
                maxInstances: z.number().int().positive().optional(),
                misfireGraceSeconds: z.number().int().nonnegative().optional(),
                retentionDays: z.number().int().positive().optional(),
                cleanupHour: z.number().int().min(0).max(23).optional()
            })
            .strict()
            .optional(),
        engine: z
            .object({
                dataDir: z.string().min(1).optional(),
                dbPath: z.string().min(1).optional(),
                dbUrl: z
                    .string()
                    .regex(/^postgres(ql)?:\/\//, "dbUrl must start with postgres:// or postgresql://")
                    .optional(),
                autoMigrate: z.boolean().optional()
            })
            .strict()
            .optional()
    })
    .passthrough();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible; unknown top-level keys are kept.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    return settingsSchema.parse(raw);
}
