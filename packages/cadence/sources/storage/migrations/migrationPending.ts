import { asc } from "drizzle-orm";

import { migrationsTable } from "../../schema.js";
import type { StorageDatabase } from "../databaseOpen.js";
import type { Migration } from "./migrationTypes.js";

/**
 * Reads the names recorded in _migrations.
 * Returns: an empty set when the table does not exist yet.
 */
export async function migrationAppliedNamesRead(storage: StorageDatabase): Promise<Set<string>> {
    try {
        const rows = await storage.db
            .select({ name: migrationsTable.name })
            .from(migrationsTable)
            .orderBy(asc(migrationsTable.appliedAt), asc(migrationsTable.name));
        return new Set(rows.map((row) => row.name));
    } catch {
        // Fresh database: nothing applied.
        return new Set();
    }
}

/**
 * Returns migrations that are not yet recorded in the _migrations table.
 * Expects: migration names are unique.
 */
export async function migrationPending(storage: StorageDatabase, migrations: Migration[]): Promise<Migration[]> {
    const applied = await migrationAppliedNamesRead(storage);
    return migrations.filter((migration) => !applied.has(migration.name));
}
