import { PGlite } from "@electric-sql/pglite";
import { drizzle as drizzleNodePg } from "drizzle-orm/node-postgres";
import { bigint, index, pgTable, serial, text } from "drizzle-orm/pg-core";
import { drizzle as drizzlePglite, type PgliteDatabase } from "drizzle-orm/pglite";
import type { Pool } from "pg";

export const migrationsTable = pgTable("_migrations", {
    name: text("name").primaryKey(),
    appliedAt: bigint("applied_at", { mode: "number" }).notNull()
});

/** One active schedule per task; rewritten on every reschedule. */
export const schedulesTable = pgTable("schedules", {
    id: serial("id").primaryKey(),
    taskId: text("task_id").notNull().unique(),
    jobId: text("job_id").notNull(),
    scheduleType: text("schedule_type").notNull(),
    scheduleValue: text("schedule_value").notNull(),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    nextRunTime: bigint("next_run_time", { mode: "number" })
});

/** Execution history; rows are only removed by retention cleanup. */
export const taskRunsTable = pgTable(
    "task_runs",
    {
        id: serial("id").primaryKey(),
        taskId: text("task_id").notNull(),
        status: text("status").notNull(),
        startTime: bigint("start_time", { mode: "number" }).notNull(),
        endTime: bigint("end_time", { mode: "number" }),
        error: text("error")
    },
    (table) => [index("idx_task_runs_task_start").on(table.taskId, table.startTime)]
);

export const schema = {
    migrationsTable,
    schedulesTable,
    taskRunsTable
};

/**
 * Unified Drizzle database type used by all repositories.
 * Both PGlite and node-postgres adapters are structurally compatible
 * at runtime; PgliteDatabase is the canonical type.
 */
export type CadenceDb = PgliteDatabase<typeof schema>;

export type CadenceTx = Parameters<Parameters<CadenceDb["transaction"]>[0]>[0];

export function schemaDrizzle(client: PGlite | Pool): CadenceDb {
    if (client instanceof PGlite) {
        return drizzlePglite(client, { schema });
    }
    return drizzleNodePg(client, { schema }) as unknown as CadenceDb;
}
