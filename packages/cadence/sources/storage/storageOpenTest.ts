import type { Storage } from "./storage.js";
import { storageOpen } from "./storageOpen.js";

/**
 * Opens a migrated in-memory pglite storage for tests.
 */
export function storageOpenTest(options: { legacyPath?: string } = {}): Promise<Storage> {
    return storageOpen(":memory:", { legacyPath: options.legacyPath });
}
