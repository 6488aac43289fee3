import { sql } from "drizzle-orm";
import { describe, expect, it } from "vitest";

import { databaseOpen } from "../databaseOpen.js";
import { migrations } from "./_migrations.js";
import { migrationPending } from "./migrationPending.js";
import { migrationRun } from "./migrationRun.js";
import type { Migration } from "./migrationTypes.js";

describe("migrationRun", () => {
    it("applies every migration once and records it", async () => {
        const storage = databaseOpen(":memory:");
        try {
            expect(await migrationPending(storage, migrations)).toHaveLength(migrations.length);

            const first = await migrationRun(storage);
            expect(first).toEqual(["20260901_add_schedules", "20260901_add_task_runs"]);
            expect(await migrationPending(storage, migrations)).toEqual([]);

            const second = await migrationRun(storage);
            expect(second).toEqual([]);
        } finally {
            await storage.close();
        }
    });

    it("rolls back a failing migration and leaves it pending", async () => {
        const storage = databaseOpen(":memory:");
        const broken: Migration = {
            name: "20260902_broken",
            async up(tx): Promise<void> {
                await tx.execute(sql`CREATE TABLE half_done (id integer)`);
                await tx.execute(sql`SELECT * FROM table_that_does_not_exist`);
            }
        };
        try {
            await expect(migrationRun(storage, [...migrations, broken])).rejects.toThrow();

            const pending = await migrationPending(storage, [...migrations, broken]);
            expect(pending.map((migration) => migration.name)).toEqual(["20260902_broken"]);

            const tables = await storage.db.execute<{ table_name: string }>(
                sql`SELECT table_name FROM information_schema.tables WHERE table_name = 'half_done'`
            );
            expect(tables.rows).toEqual([]);
        } finally {
            await storage.close();
        }
    });
});
