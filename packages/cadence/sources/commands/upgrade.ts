import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { DEFAULT_SETTINGS_PATH } from "../paths.js";
import { storageUpgrade } from "../storage/storageUpgrade.js";

export type UpgradeOptions = {
    settings?: string;
};

/** Applies pending migrations to the configured database and prints what ran. */
export async function upgradeCommand(options: UpgradeOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    const { applied } = await storageUpgrade(config);
    const target = config.db.url ? "postgres" : config.db.path;

    console.log(
        applied.length === 0
            ? `${target}: schema is current`
            : `${target}: applied ${applied.length} migration(s)\n${applied.map((name) => `  ${name}`).join("\n")}`
    );
}
