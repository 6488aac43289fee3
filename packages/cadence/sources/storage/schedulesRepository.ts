import { asc, eq } from "drizzle-orm";

import type { ScheduleType } from "../engine/triggers/triggerTypes.js";
import type { CadenceDb } from "../schema.js";
import { schedulesTable } from "../schema.js";
import type { ScheduleDbRecord, ScheduleSaveInput } from "./databaseTypes.js";

/**
 * Active schedules keyed by task id.
 * Expects: schema migrations already applied for the schedules table.
 */
export class SchedulesRepository {
    private readonly db: CadenceDb;

    constructor(db: CadenceDb) {
        this.db = db;
    }

    /** Inserts or replaces the schedule for a task in one statement. */
    async save(input: ScheduleSaveInput): Promise<ScheduleDbRecord> {
        const values = {
            taskId: input.taskId,
            jobId: input.jobId,
            scheduleType: input.scheduleType,
            scheduleValue: input.scheduleValue,
            createdAt: input.createdAt ?? Date.now(),
            nextRunTime: input.nextRunTime ?? null
        };
        const rows = await this.db
            .insert(schedulesTable)
            .values(values)
            .onConflictDoUpdate({
                target: schedulesTable.taskId,
                set: {
                    jobId: values.jobId,
                    scheduleType: values.scheduleType,
                    scheduleValue: values.scheduleValue,
                    createdAt: values.createdAt,
                    nextRunTime: values.nextRunTime
                }
            })
            .returning();
        const row = rows[0];
        if (!row) {
            throw new Error(`Schedule upsert returned no row for task ${input.taskId}`);
        }
        return scheduleParse(row);
    }

    /** Deletes the schedule for a task; returns false when there was none. */
    async delete(taskId: string): Promise<boolean> {
        const rows = await this.db
            .delete(schedulesTable)
            .where(eq(schedulesTable.taskId, taskId))
            .returning({ id: schedulesTable.id });
        return rows.length > 0;
    }

    async findByTaskId(taskId: string): Promise<ScheduleDbRecord | null> {
        const rows = await this.db.select().from(schedulesTable).where(eq(schedulesTable.taskId, taskId)).limit(1);
        const row = rows[0];
        return row ? scheduleParse(row) : null;
    }

    async findAll(): Promise<ScheduleDbRecord[]> {
        const rows = await this.db
            .select()
            .from(schedulesTable)
            .orderBy(asc(schedulesTable.createdAt), asc(schedulesTable.id));
        return rows.map(scheduleParse);
    }
}

function scheduleParse(row: typeof schedulesTable.$inferSelect): ScheduleDbRecord {
    return {
        id: row.id,
        taskId: row.taskId,
        jobId: row.jobId,
        scheduleType: scheduleTypeParse(row.scheduleType),
        scheduleValue: row.scheduleValue,
        createdAt: row.createdAt,
        nextRunTime: row.nextRunTime
    };
}

function scheduleTypeParse(value: string): ScheduleType {
    switch (value) {
        case "cron":
        case "interval":
        case "date":
            return value;
        default:
            return "unknown";
    }
}
