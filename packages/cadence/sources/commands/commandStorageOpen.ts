import path from "node:path";

import type { Config } from "@/types";
import { configLoad } from "../config/configLoad.js";
import { DEFAULT_SETTINGS_PATH } from "../paths.js";
import type { Storage } from "../storage/storage.js";
import { storageOpen } from "../storage/storageOpen.js";

/** Loads config from the --settings path and opens the configured storage. */
export async function commandStorageOpen(settings: string | undefined): Promise<{ config: Config; storage: Storage }> {
    const config = await configLoad(path.resolve(settings ?? DEFAULT_SETTINGS_PATH));
    const storage = await storageOpen(config.db.path, {
        url: config.db.url,
        autoMigrate: config.db.autoMigrate,
        legacyPath: config.legacySchedulesPath
    });
    return { config, storage };
}
