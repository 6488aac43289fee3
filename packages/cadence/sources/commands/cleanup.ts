import { commandStorageOpen } from "./commandStorageOpen.js";

export type CleanupOptions = {
    settings?: string;
    days?: number;
};

export async function cleanupCommand(options: CleanupOptions): Promise<void> {
    const { config, storage } = await commandStorageOpen(options.settings);
    try {
        const days = options.days ?? config.scheduler.retentionDays;
        const deleted = await storage.cleanupOldRuns(days);
        console.log(`Removed ${deleted} run${deleted === 1 ? "" : "s"} older than ${days} days.`);
    } finally {
        await storage.close();
    }
}
