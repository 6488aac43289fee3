import { Scheduler } from "../engine/scheduler/scheduler.js";
import type { SchedulerEvent } from "../engine/scheduler/schedulerTypes.js";
import { TaskRegistryMemory } from "../engine/tasks/taskRegistryMemory.js";
import { getLogger } from "../log.js";
import { awaitShutdown, onShutdown } from "../util/shutdown.js";
import { commandStorageOpen } from "./commandStorageOpen.js";

const logger = getLogger("command.start");

export type StartOptions = {
    settings?: string;
};

/**
 * Runs the scheduler over the persisted schedules until SIGINT/SIGTERM.
 * Every persisted task id is registered; execution is logged.
 */
export async function startCommand(options: StartOptions): Promise<void> {
    const { config, storage } = await commandStorageOpen(options.settings);
    logger.info({ dataDir: config.dataDir, dbTarget: storage.database.kind }, "start: Starting scheduler");

    const registry = new TaskRegistryMemory();
    for (const schedule of await storage.schedules.findAll()) {
        registry.create(schedule.taskId);
    }

    const scheduler = new Scheduler({
        storage,
        registry,
        config: config.scheduler,
        execute: async (taskId) => {
            const record = registry.get(taskId);
            logger.info({ taskId }, "run: Task fired");
            if (record) {
                record.status = "completed";
                record.progress = 100;
            }
        }
    });
    scheduler.addListener((event: SchedulerEvent) => {
        logger.debug({ event }, `event: ${event.type}`);
    });

    onShutdown("scheduler", async () => {
        await scheduler.shutdown();
        await scheduler.drain();
        await storage.close();
    });

    await scheduler.start();
    logger.info("ready: Scheduler running");
    const signal = await awaitShutdown();
    logger.info({ signal }, "event: Shutdown complete");
}
