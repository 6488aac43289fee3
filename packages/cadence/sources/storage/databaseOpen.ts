import { mkdirSync } from "node:fs";
import path from "node:path";

import { PGlite } from "@electric-sql/pglite";
import pg from "pg";

import { type CadenceDb, schemaDrizzle } from "../schema.js";

export type StorageDatabasePath = string;
export type StorageDatabaseTarget = { kind: "pglite"; path: StorageDatabasePath } | { kind: "postgres"; url: string };

/**
 * Open database handle: the Drizzle instance plus the client that backs it.
 */
export class StorageDatabase {
    readonly db: CadenceDb;
    /** Resolved pglite directory; null for in-memory and server targets. */
    readonly path: string | null;
    readonly kind: StorageDatabaseTarget["kind"];

    private readonly clientClose: () => Promise<void>;
    private closePromise: Promise<void> | null = null;

    constructor(options: {
        db: CadenceDb;
        path: string | null;
        kind: StorageDatabaseTarget["kind"];
        close: () => Promise<void>;
    }) {
        this.db = options.db;
        this.path = options.path;
        this.kind = options.kind;
        this.clientClose = options.close;
    }

    get closed(): boolean {
        return this.closePromise !== null;
    }

    close(): Promise<void> {
        if (!this.closePromise) {
            this.closePromise = this.clientClose();
        }
        return this.closePromise;
    }
}

/**
 * Opens a storage database client for either pglite or server postgres targets.
 * Expects: pglite path is ":memory:" or writable; postgres URL uses postgres:// or postgresql://.
 */
export function databaseOpen(target: StorageDatabasePath | StorageDatabaseTarget): StorageDatabase {
    if (typeof target !== "string" && target.kind === "postgres") {
        const pool = new pg.Pool({ connectionString: target.url });
        return new StorageDatabase({
            db: schemaDrizzle(pool),
            path: null,
            kind: "postgres",
            close: () => pool.end()
        });
    }

    const dbPath = typeof target === "string" ? target : target.path;
    if (dbPath === ":memory:") {
        return pgliteOpen(null);
    }

    const resolvedPath = databaseDataPathResolve(dbPath);
    mkdirSync(path.dirname(resolvedPath), { recursive: true });
    return pgliteOpen(resolvedPath);
}

function pgliteOpen(databasePath: string | null): StorageDatabase {
    const client = databasePath ? new PGlite(databasePath) : new PGlite();
    return new StorageDatabase({
        db: schemaDrizzle(client),
        path: databasePath,
        kind: "pglite",
        close: () => client.close()
    });
}

/** Maps "scheduler.db" style paths onto the pglite data directory "scheduler.pglite". */
export function databaseDataPathResolve(dbPath: string): string {
    if (dbPath.endsWith(".pglite")) {
        return dbPath;
    }
    const base = path.basename(dbPath, path.extname(dbPath));
    return path.join(path.dirname(dbPath), `${base}.pglite`);
}
