import { desc, eq, lt } from "drizzle-orm";

import type { CadenceDb } from "../schema.js";
import { taskRunsTable } from "../schema.js";
import type { TaskRunCompleteInput, TaskRunDbRecord, TaskRunLogInput, TaskRunStatus } from "./databaseTypes.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const RECENT_LIMIT_DEFAULT = 10;

/**
 * Task execution history.
 * Rows are written once on start and patched once on completion.
 */
export class TaskRunsRepository {
    private readonly db: CadenceDb;

    constructor(db: CadenceDb) {
        this.db = db;
    }

    /** Appends a run row and returns its id. */
    async log(input: TaskRunLogInput): Promise<number> {
        const rows = await this.db
            .insert(taskRunsTable)
            .values({
                taskId: input.taskId,
                status: input.status,
                startTime: input.startTime,
                endTime: input.endTime ?? null,
                error: input.error ?? null
            })
            .returning({ id: taskRunsTable.id });
        const row = rows[0];
        if (!row) {
            throw new Error(`Task run insert returned no id for task ${input.taskId}`);
        }
        return row.id;
    }

    async complete(id: number, input: TaskRunCompleteInput): Promise<boolean> {
        const rows = await this.db
            .update(taskRunsTable)
            .set({ status: input.status, endTime: input.endTime, error: input.error })
            .where(eq(taskRunsTable.id, id))
            .returning({ id: taskRunsTable.id });
        return rows.length > 0;
    }

    /** Newest first by start time; ties broken by insertion order. */
    async findRecent(taskId: string, limit = RECENT_LIMIT_DEFAULT): Promise<TaskRunDbRecord[]> {
        const rows = await this.db
            .select()
            .from(taskRunsTable)
            .where(eq(taskRunsTable.taskId, taskId))
            .orderBy(desc(taskRunsTable.startTime), desc(taskRunsTable.id))
            .limit(limitNormalize(limit));
        return rows.map(taskRunParse);
    }

    /**
     * Collects the latest runs of several tasks, merged newest first.
     * Expects: perTaskLimit caps each task before the merge; limit caps the result.
     */
    async findRecentForTasks(taskIds: string[], perTaskLimit: number, limit: number): Promise<TaskRunDbRecord[]> {
        const perTask = await Promise.all(taskIds.map((taskId) => this.findRecent(taskId, perTaskLimit)));
        return perTask
            .flat()
            .sort((a, b) => b.startTime - a.startTime || b.id - a.id)
            .slice(0, limitNormalize(limit));
    }

    /**
     * Deletes runs that started more than `retentionDays` before `now`.
     * Returns: number of deleted rows.
     */
    async deleteOlderThan(retentionDays: number, now: number = Date.now()): Promise<number> {
        const cutoff = now - retentionDays * DAY_MS;
        const rows = await this.db
            .delete(taskRunsTable)
            .where(lt(taskRunsTable.startTime, cutoff))
            .returning({ id: taskRunsTable.id });
        return rows.length;
    }
}

function limitNormalize(limit: number): number {
    return Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : RECENT_LIMIT_DEFAULT;
}

function taskRunParse(row: typeof taskRunsTable.$inferSelect): TaskRunDbRecord {
    return {
        id: row.id,
        taskId: row.taskId,
        status: taskRunStatusParse(row.status),
        startTime: row.startTime,
        endTime: row.endTime,
        error: row.error
    };
}

function taskRunStatusParse(value: string): TaskRunStatus {
    switch (value) {
        case "running":
        case "completed":
            return value;
        default:
            return "failed";
    }
}
