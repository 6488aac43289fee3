import { scheduleLineFormat } from "./commandFormat.js";
import { commandStorageOpen } from "./commandStorageOpen.js";

export type SchedulesOptions = {
    settings?: string;
};

export async function schedulesCommand(options: SchedulesOptions): Promise<void> {
    const { storage } = await commandStorageOpen(options.settings);
    try {
        const schedules = await storage.schedules.findAll();
        if (schedules.length === 0) {
            console.log("No schedules.");
            return;
        }
        for (const schedule of schedules) {
            console.log(scheduleLineFormat(schedule));
        }
    } finally {
        await storage.close();
    }
}
