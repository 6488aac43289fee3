import { sql } from "drizzle-orm";

import { getLogger } from "../../log.js";
import { migrationsTable } from "../../schema.js";
import type { StorageDatabase } from "../databaseOpen.js";
import { migrations as defaultMigrations } from "./_migrations.js";
import { migrationAppliedNamesRead } from "./migrationPending.js";
import type { Migration } from "./migrationTypes.js";

const logger = getLogger("storage.migrate");

/**
 * Applies pending migrations in order, each in its own transaction.
 * Expects: database connection is open.
 * Returns: names of the migrations applied by this call.
 */
export async function migrationRun(
    storage: StorageDatabase,
    migrations: Migration[] = defaultMigrations
): Promise<string[]> {
    await storage.db.execute(sql`
        CREATE TABLE IF NOT EXISTS _migrations (
            name text PRIMARY KEY NOT NULL,
            applied_at bigint NOT NULL
        )
    `);
    const applied = await migrationAppliedNamesRead(storage);
    const newlyApplied: string[] = [];

    for (const migration of migrations) {
        if (applied.has(migration.name)) {
            continue;
        }
        await storage.db.transaction(async (tx) => {
            await migration.up(tx);
            await tx
                .insert(migrationsTable)
                .values({ name: migration.name, appliedAt: Date.now() })
                .onConflictDoNothing();
        });
        logger.debug({ migration: migration.name }, "migrate: Migration applied");
        newlyApplied.push(migration.name);
    }

    return newlyApplied;
}
