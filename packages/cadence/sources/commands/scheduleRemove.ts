import { commandStorageOpen } from "./commandStorageOpen.js";

export type ScheduleRemoveOptions = {
    settings?: string;
};

export async function scheduleRemoveCommand(taskId: string, options: ScheduleRemoveOptions): Promise<void> {
    const { storage } = await commandStorageOpen(options.settings);
    try {
        const removed = await storage.schedules.delete(taskId);
        console.log(removed ? `Removed schedule for ${taskId}.` : `No schedule for ${taskId}.`);
    } finally {
        await storage.close();
    }
}
