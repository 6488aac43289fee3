import type { Config } from "@/types";
import { getLogger } from "../log.js";
import { databaseOpen } from "./databaseOpen.js";
import { migrations } from "./migrations/_migrations.js";
import { migrationPending } from "./migrations/migrationPending.js";
import { migrationRun } from "./migrations/migrationRun.js";

const logger = getLogger("storage.upgrade");

export type StorageUpgradeResult = {
    pendingBefore: string[];
    applied: string[];
};

/**
 * Opens the configured database and applies pending storage migrations.
 * Expects: config database settings point to a reachable pglite or postgres target.
 */
export async function storageUpgrade(config: Pick<Config, "db">): Promise<StorageUpgradeResult> {
    const db = databaseOpen(config.db.url ? { kind: "postgres", url: config.db.url } : config.db.path);
    try {
        const pendingBefore = (await migrationPending(db, migrations)).map((migration) => migration.name);
        const applied = await migrationRun(db, migrations);
        logger.info(
            { path: config.db.path, dbTarget: db.kind, pendingBefore, applied },
            "event: Storage upgrade complete"
        );
        return { pendingBefore, applied };
    } finally {
        await db.close();
    }
}
