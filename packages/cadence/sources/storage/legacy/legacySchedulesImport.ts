import { promises as fs } from "node:fs";

import { isValid, parseISO } from "date-fns";
import { eq } from "drizzle-orm";
import { z } from "zod";

import type { ScheduleType } from "../../engine/triggers/triggerTypes.js";
import { getLogger } from "../../log.js";
import { schedulesTable } from "../../schema.js";
import type { Storage } from "../storage.js";

const logger = getLogger("storage.legacy");

export const LEGACY_MIGRATED_SUFFIX = ".migrated";

export type LegacyImportResult =
    | { status: "missing" | "empty" }
    | { status: "imported"; imported: number; skipped: number; renamedTo: string }
    | { status: "failed"; error: unknown };

const cronFieldSchema = z.union([z.string(), z.number()]).transform(String);

const legacyTriggerSchema = z
    .object({
        type: z.string().optional().catch(undefined),
        minute: cronFieldSchema.optional().catch(undefined),
        hour: cronFieldSchema.optional().catch(undefined),
        day: cronFieldSchema.optional().catch(undefined),
        month: cronFieldSchema.optional().catch(undefined),
        day_of_week: cronFieldSchema.optional().catch(undefined),
        seconds: z.number().optional().catch(undefined),
        run_date: z.string().optional().catch(undefined)
    })
    .passthrough();

const legacyEntrySchema = z
    .object({
        job_id: z.string().optional().catch(undefined),
        next_run_time: z.string().nullable().optional().catch(undefined),
        trigger: legacyTriggerSchema.optional().catch(undefined)
    })
    .passthrough();

const legacyFileSchema = z.record(legacyEntrySchema.catch({}));

export type LegacyTrigger = z.infer<typeof legacyTriggerSchema>;

/**
 * Imports the legacy `scheduled_tasks.json` map into the schedules table.
 * Task ids that already have a row are skipped; the file is renamed with a ".migrated" suffix afterwards.
 * Expects: migrations applied. Failures are logged and leave the file in place for the next start.
 */
export async function legacySchedulesImport(storage: Storage, legacyPath: string): Promise<LegacyImportResult> {
    let raw: string;
    try {
        raw = await fs.readFile(legacyPath, "utf8");
    } catch (error) {
        if (errorCodeIs(error, "ENOENT")) {
            return { status: "missing" };
        }
        logger.error({ legacyPath, error }, "error: Failed to read legacy schedules");
        return { status: "failed", error };
    }

    try {
        const entries = Object.entries(legacyFileSchema.parse(JSON.parse(raw)));
        if (entries.length === 0) {
            return { status: "empty" };
        }

        let imported = 0;
        let skipped = 0;
        await storage.db.transaction(async (tx) => {
            for (const [taskId, entry] of entries) {
                const existing = await tx
                    .select({ id: schedulesTable.id })
                    .from(schedulesTable)
                    .where(eq(schedulesTable.taskId, taskId))
                    .limit(1);
                if (existing.length > 0) {
                    skipped += 1;
                    continue;
                }

                const { scheduleType, scheduleValue } = legacyScheduleValueBuild(entry.trigger);
                await tx.insert(schedulesTable).values({
                    taskId,
                    jobId: entry.job_id ?? "",
                    scheduleType,
                    scheduleValue,
                    createdAt: Date.now(),
                    nextRunTime: legacyTimeParse(entry.next_run_time)
                });
                imported += 1;
            }
        });

        const renamedTo = `${legacyPath}${LEGACY_MIGRATED_SUFFIX}`;
        await fs.rename(legacyPath, renamedTo);
        logger.info({ imported, skipped, renamedTo }, "import: Legacy schedules migrated");
        return { status: "imported", imported, skipped, renamedTo };
    } catch (error) {
        logger.error({ legacyPath, error }, "error: Legacy schedule migration failed");
        return { status: "failed", error };
    }
}

/**
 * Rebuilds a schedule spec from a legacy trigger record.
 * Returns: "unknown" as the value for shapes that cannot be rebuilt, and as the type too when the type is unrecognized.
 */
export function legacyScheduleValueBuild(trigger: LegacyTrigger | undefined): {
    scheduleType: ScheduleType;
    scheduleValue: string;
} {
    switch (trigger?.type) {
        case "cron": {
            const fields = [trigger.minute, trigger.hour, trigger.day, trigger.month, trigger.day_of_week];
            const present = fields.filter((field): field is string => field !== undefined);
            return {
                scheduleType: "cron",
                scheduleValue: present.length === 5 ? `cron:${present.join(" ")}` : "unknown"
            };
        }
        case "interval":
            return { scheduleType: "interval", scheduleValue: legacyIntervalBuild(trigger.seconds ?? 0) };
        case "date":
            return { scheduleType: "date", scheduleValue: trigger.run_date ? `at:${trigger.run_date}` : "unknown" };
        default:
            return { scheduleType: "unknown", scheduleValue: "unknown" };
    }
}

/** Largest whole unit that does not exceed the interval, e.g. 7200 -> "every 2h". */
function legacyIntervalBuild(seconds: number): string {
    if (!(seconds > 0)) {
        return "unknown";
    }
    if (seconds < 60) {
        return `every ${Math.floor(seconds)}s`;
    }
    if (seconds < 3600) {
        return `every ${Math.floor(seconds / 60)}m`;
    }
    if (seconds < 86400) {
        return `every ${Math.floor(seconds / 3600)}h`;
    }
    return `every ${Math.floor(seconds / 86400)}d`;
}

function legacyTimeParse(value: string | null | undefined): number | null {
    if (!value) {
        return null;
    }
    const parsed = parseISO(value);
    return isValid(parsed) ? parsed.getTime() : null;
}

function errorCodeIs(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}
