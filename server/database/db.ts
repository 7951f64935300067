/**
 * SQLite Database Connection Module
 *
 * Provides a singleton connection to the plugin host database.
 * Uses better-sqlite3 for synchronous SQLite operations.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import logger from '../utils/logger';

// PLUGIN_HOST_DB_PATH: direct path to the database file
// DATA_DIR: directory containing plugin-host.db (default behavior)
const DATA_DIR = process.env.DATA_DIR || path.join(__dirname, '..', '..', 'data');
export const DB_PATH = process.env.PLUGIN_HOST_DB_PATH || path.join(DATA_DIR, 'plugin-host.db');

type DatabaseInstance = ReturnType<typeof Database>;

let _db: DatabaseInstance | null = null;

function openDatabase(dbPath: string): DatabaseInstance {
    if (dbPath !== ':memory:') {
        const dbDir = path.dirname(dbPath);
        if (!fs.existsSync(dbDir)) {
            fs.mkdirSync(dbDir, { recursive: true });
        }
    }

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');

    logger.info(`[DB] Connected to SQLite database: ${dbPath}`);
    return db;
}

/**
 * Get the database instance, opening it on first use.
 */
export function getDb(): DatabaseInstance {
    if (!_db) {
        _db = openDatabase(DB_PATH);
    }
    return _db;
}

/**
 * Close the database connection. Called on graceful shutdown.
 */
export function closeDatabase(): void {
    if (_db) {
        _db.close();
        _db = null;
        logger.info('[DB] Database connection closed');
    }
}
