// src/stateStore.ts

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StorageUnavailable, describeError } from './errors';

export interface StateRecord {
    key: string;
    payload: string;
    updatedAt: number;
}

interface RecordRow {
    key: string;
    payload: string;
    updated_at: number;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS records (
    key TEXT PRIMARY KEY,
    payload TEXT NOT NULL,
    updated_at INTEGER NOT NULL
);
`;

const IN_MEMORY = ':memory:';

/**
 * Durable key/record store on a single SQLite file.
 *
 * Writes go through SQLite's WAL journal, so a crash mid-write leaves the
 * previous committed value in place.
 */
export class StateStore {
    readonly path: string;
    private db: Database.Database | null;

    private constructor(filePath: string, db: Database.Database) {
        this.path = filePath;
        this.db = db;
    }

    /** Opens (creating if needed) the store at `filePath`. */
    static open(filePath: string): StateStore {
        if (filePath !== IN_MEMORY) {
            const dir = path.dirname(path.resolve(filePath));
            try {
                fs.mkdirSync(dir, { recursive: true });
                fs.accessSync(dir, fs.constants.W_OK);
            } catch (error) {
                throw new StorageUnavailable(filePath, `data directory "${dir}" is not writable (${describeError(error)})`, error);
            }
        }

        let db: Database.Database;
        try {
            db = new Database(filePath);
        } catch (error) {
            throw new StorageUnavailable(filePath, describeError(error), error);
        }

        try {
            db.pragma('journal_mode = WAL');
            db.pragma('foreign_keys = ON');
            db.exec(SCHEMA_SQL);
        } catch (error) {
            db.close();
            throw new StorageUnavailable(filePath, describeError(error), error);
        }
        return new StateStore(filePath, db);
    }

    /** The open handle, for repositories that keep their own tables in the same file. */
    get database(): Database.Database {
        if (!this.db) throw new StorageUnavailable(this.path, 'store is closed');
        return this.db;
    }

    get isOpen(): boolean {
        return this.db !== null;
    }

    get(key: string): StateRecord | undefined {
        const row = this.run(db =>
            db.prepare<[string], RecordRow>('SELECT key, payload, updated_at FROM records WHERE key = ?').get(key),
        );
        return row ? { key: row.key, payload: row.payload, updatedAt: row.updated_at } : undefined;
    }

    put(key: string, payload: string): StateRecord {
        const updatedAt = Date.now();
        this.run(db =>
            db.prepare<[string, string, number]>(`
                INSERT INTO records (key, payload, updated_at) VALUES (?, ?, ?)
                ON CONFLICT(key) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at
            `).run(key, payload, updatedAt),
        );
        return { key, payload, updatedAt };
    }

    size(): number {
        const row = this.run(db => db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM records').get());
        return row?.count ?? 0;
    }

    /** Runs `fn` inside one SQLite transaction; a throw rolls everything back. */
    transaction<T>(fn: () => T): T {
        return this.run(db => db.transaction(fn)());
    }

    close(): void {
        if (!this.db) return;
        const db = this.db;
        this.db = null;
        db.close();
    }

    private run<T>(op: (db: Database.Database) => T): T {
        const db = this.database;
        try {
            return op(db);
        } catch (error) {
            if (error instanceof Database.SqliteError) {
                throw new StorageUnavailable(this.path, describeError(error), error);
            }
            throw error;
        }
    }
}
