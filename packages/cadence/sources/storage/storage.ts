import { getLogger } from "../log.js";
import type { CadenceDb } from "../schema.js";
import type { StorageDatabase } from "./databaseOpen.js";
import { SchedulesRepository } from "./schedulesRepository.js";
import { TaskRunsRepository } from "./taskRunsRepository.js";

const logger = getLogger("storage");

/**
 * Facade for database access. Owns one connection and the repository instances.
 * Expects: migrations were applied before repositories are used; see storageOpen().
 */
export class Storage {
    readonly schedules: SchedulesRepository;
    readonly taskRuns: TaskRunsRepository;

    private readonly connection: StorageDatabase;

    private constructor(connection: StorageDatabase) {
        this.connection = connection;
        this.schedules = new SchedulesRepository(connection.db);
        this.taskRuns = new TaskRunsRepository(connection.db);
    }

    static fromDatabase(connection: StorageDatabase): Storage {
        return new Storage(connection);
    }

    get db(): CadenceDb {
        return this.connection.db;
    }

    get database(): StorageDatabase {
        return this.connection;
    }

    /**
     * Applies the run retention window.
     * Returns: number of deleted task_runs rows.
     */
    async cleanupOldRuns(retentionDays: number, now: number = Date.now()): Promise<number> {
        const deleted = await this.taskRuns.deleteOlderThan(retentionDays, now);
        logger.info({ deleted, retentionDays }, "cleanup: Old task runs removed");
        return deleted;
    }

    close(): Promise<void> {
        return this.connection.close();
    }
}
