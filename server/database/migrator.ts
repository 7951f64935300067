/**
 * Database Migration System
 *
 * Forward-only schema migrations run on startup.
 * Uses PRAGMA user_version for version tracking; every migration runs in a
 * transaction together with its version bump.
 */

import type Database from 'better-sqlite3';
import logger from '../utils/logger';

type DatabaseInstance = ReturnType<typeof Database>;

export interface Migration {
    version: number;
    name: string;
    up: (db: DatabaseInstance) => void;
}

export interface MigrationResult {
    success: boolean;
    migratedFrom: number;
    migratedTo: number;
    error?: string;
}

export const migrations: Migration[] = [
    {
        version: 1,
        name: 'plugin_configs',
        up: (db) => {
            db.exec(`
                CREATE TABLE IF NOT EXISTS plugin_configs (
                    plugin_id TEXT PRIMARY KEY,
                    config_encrypted TEXT NOT NULL,
                    updated_at INTEGER NOT NULL
                );
            `);
        },
    },
    {
        version: 2,
        name: 'delivery_log',
        up: (db) => {
            db.exec(`
                CREATE TABLE IF NOT EXISTS delivery_log (
                    id TEXT PRIMARY KEY,
                    plugin_id TEXT NOT NULL,
                    title TEXT,
                    success INTEGER NOT NULL,
                    result TEXT NOT NULL,
                    created_at INTEGER NOT NULL
                );
                CREATE INDEX IF NOT EXISTS idx_delivery_log_plugin
                    ON delivery_log(plugin_id, created_at);
            `);
        },
    },
];

export function getCurrentVersion(db: DatabaseInstance): number {
    const result = db.pragma('user_version', { simple: true });
    return typeof result === 'number' ? result : 0;
}

export function getExpectedVersion(): number {
    return Math.max(0, ...migrations.map(m => m.version));
}

/**
 * Apply every migration newer than the database's user_version.
 */
export function runMigrations(db: DatabaseInstance): MigrationResult {
    const currentVersion = getCurrentVersion(db);
    const expectedVersion = getExpectedVersion();

    if (currentVersion > expectedVersion) {
        const error = `Database schema v${currentVersion} is newer than this build (v${expectedVersion})`;
        logger.error(`[Migrator] ${error}`);
        return { success: false, migratedFrom: currentVersion, migratedTo: currentVersion, error };
    }

    const pending = migrations
        .filter(m => m.version > currentVersion)
        .sort((a, b) => a.version - b.version);

    let version = currentVersion;
    for (const migration of pending) {
        try {
            db.transaction(() => {
                migration.up(db);
                db.pragma(`user_version = ${migration.version}`);
            })();
            version = migration.version;
            logger.info(`[Migrator] Applied migration v${migration.version} (${migration.name})`);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`[Migrator] Migration v${migration.version} failed: error="${message}"`);
            return { success: false, migratedFrom: currentVersion, migratedTo: version, error: message };
        }
    }

    return { success: true, migratedFrom: currentVersion, migratedTo: version };
}
