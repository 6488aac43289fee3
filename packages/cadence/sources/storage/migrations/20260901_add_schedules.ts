import { sql } from "drizzle-orm";

import type { Migration } from "./migrationTypes.js";

/**
 * Creates the schedules table: one row per scheduled task, keyed by task_id.
 */
export const migration20260901AddSchedules: Migration = {
    name: "20260901_add_schedules",
    async up(tx): Promise<void> {
        await tx.execute(sql`
            CREATE TABLE IF NOT EXISTS schedules (
                id serial PRIMARY KEY,
                task_id text NOT NULL,
                job_id text NOT NULL,
                schedule_type text NOT NULL,
                schedule_value text NOT NULL,
                created_at bigint NOT NULL,
                next_run_time bigint,
                CONSTRAINT schedules_task_id_unique UNIQUE (task_id)
            )
        `);
    }
};
