import { getLogger } from "../log.js";
import { databaseOpen } from "./databaseOpen.js";
import { legacySchedulesImport } from "./legacy/legacySchedulesImport.js";
import { migrationRun } from "./migrations/migrationRun.js";
import { Storage } from "./storage.js";

const logger = getLogger("storage.open");

export type StorageOpenOptions = {
    url?: string | null;
    autoMigrate?: boolean;
    /** Legacy `scheduled_tasks.json`; imported on every open while it exists. */
    legacyPath?: string | null;
};

/**
 * Opens storage for pglite or postgres, applies migrations and imports legacy schedules.
 * Expects: path points to pglite path or ":memory:"; url overrides with server postgres target.
 */
export async function storageOpen(path: string, options: StorageOpenOptions = {}): Promise<Storage> {
    const dbTarget = options.url ? { kind: "postgres" as const, url: options.url } : path;
    const db = databaseOpen(dbTarget);
    try {
        if (options.autoMigrate ?? true) {
            const applied = await migrationRun(db);
            if (applied.length > 0) {
                logger.info({ applied }, "migrate: Storage migrations applied");
            }
        }
    } catch (error) {
        await db.close();
        throw error;
    }

    const storage = Storage.fromDatabase(db);
    if (options.legacyPath) {
        await legacySchedulesImport(storage, options.legacyPath);
    }
    return storage;
}
