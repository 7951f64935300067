/**
 * Plugin Configs Database Layer
 *
 * One row per plugin holding its settings object as JSON.
 * Settings are encrypted at rest when SECRET_ENCRYPTION_KEY is set.
 */

import { getDb } from '../database/db';
import { encrypt, decrypt } from '../utils/encryption';
import logger from '../utils/logger';

interface PluginConfigRow {
    plugin_id: string;
    config_encrypted: string;
    updated_at: number;
}

export type PluginConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is PluginConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get the stored settings for a plugin, or null if none were saved yet.
 */
export function getPluginConfig(pluginId: string): PluginConfig | null {
    const row = getDb().prepare(`
        SELECT plugin_id, config_encrypted, updated_at
        FROM plugin_configs
        WHERE plugin_id = ?
    `).get(pluginId) as PluginConfigRow | undefined;

    if (!row) return null;

    try {
        const parsed: unknown = JSON.parse(decrypt(row.config_encrypted));
        if (!isPlainObject(parsed)) {
            logger.warn(`[PluginConfigs] Stored config is not an object: plugin=${pluginId}`);
            return null;
        }
        return parsed;
    } catch (error) {
        logger.error(`[PluginConfigs] Failed to read config: plugin=${pluginId} error="${error instanceof Error ? error.message : String(error)}"`);
        return null;
    }
}

/**
 * Insert or replace the settings for a plugin.
 */
export function savePluginConfig(pluginId: string, config: PluginConfig): void {
    const now = Math.floor(Date.now() / 1000);
    getDb().prepare(`
        INSERT INTO plugin_configs (plugin_id, config_encrypted, updated_at)
        VALUES (?, ?, ?)
        ON CONFLICT(plugin_id) DO UPDATE SET
            config_encrypted = excluded.config_encrypted,
            updated_at = excluded.updated_at
    `).run(pluginId, encrypt(JSON.stringify(config)), now);

    logger.debug(`[PluginConfigs] Saved config: plugin=${pluginId}`);
}
