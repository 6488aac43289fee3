import { sql } from "drizzle-orm";

import type { Migration } from "./migrationTypes.js";

/**
 * Creates the task_runs history table with its (task_id, start_time) index.
 */
export const migration20260901AddTaskRuns: Migration = {
    name: "20260901_add_task_runs",
    async up(tx): Promise<void> {
        await tx.execute(sql`
            CREATE TABLE IF NOT EXISTS task_runs (
                id serial PRIMARY KEY,
                task_id text NOT NULL,
                status text NOT NULL,
                start_time bigint NOT NULL,
                end_time bigint,
                error text
            )
        `);
        await tx.execute(
            sql`CREATE INDEX IF NOT EXISTS idx_task_runs_task_start ON task_runs (task_id, start_time)`
        );
    }
};
