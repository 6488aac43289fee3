import { runLineFormat } from "./commandFormat.js";
import { commandStorageOpen } from "./commandStorageOpen.js";

export type RunsOptions = {
    settings?: string;
    limit?: number;
};

export async function runsCommand(taskId: string, options: RunsOptions): Promise<void> {
    const { storage } = await commandStorageOpen(options.settings);
    try {
        const runs = await storage.taskRuns.findRecent(taskId, options.limit ?? 10);
        if (runs.length === 0) {
            console.log(`No runs recorded for ${taskId}.`);
            return;
        }
        for (const run of runs) {
            console.log(runLineFormat(run));
        }
    } finally {
        await storage.close();
    }
}
