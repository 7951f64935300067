/**
 * Delivery Log Database Layer
 *
 * Records every outbound notification attempt made by a channel plugin.
 * Only the most recent entries per plugin are kept.
 */

import { v4 as uuidv4 } from 'uuid';
import { getDb } from '../database/db';

const MAX_ENTRIES_PER_PLUGIN = 100;

interface DeliveryLogRow {
    id: string;
    plugin_id: string;
    title: string | null;
    success: number;
    result: string;
    created_at: number;
}

export interface DeliveryRecord {
    id: string;
    pluginId: string;
    title: string | null;
    success: boolean;
    result: string;
    createdAt: string;
}

export interface DeliveryRecordCreate {
    pluginId: string;
    title: string | null;
    success: boolean;
    result: string;
}

function rowToRecord(row: DeliveryLogRow): DeliveryRecord {
    return {
        id: row.id,
        pluginId: row.plugin_id,
        title: row.title,
        success: row.success === 1,
        result: row.result,
        createdAt: new Date(row.created_at).toISOString(),
    };
}

/**
 * Append a delivery attempt and prune the plugin's history.
 */
export function recordDelivery(data: DeliveryRecordCreate): DeliveryRecord {
    const db = getDb();
    const id = uuidv4();
    const now = Date.now();

    db.transaction(() => {
        db.prepare(`
            INSERT INTO delivery_log (id, plugin_id, title, success, result, created_at)
            VALUES (?, ?, ?, ?, ?, ?)
        `).run(id, data.pluginId, data.title, data.success ? 1 : 0, data.result, now);

        db.prepare(`
            DELETE FROM delivery_log
            WHERE plugin_id = ? AND id NOT IN (
                SELECT id FROM delivery_log
                WHERE plugin_id = ?
                ORDER BY created_at DESC, rowid DESC
                LIMIT ?
            )
        `).run(data.pluginId, data.pluginId, MAX_ENTRIES_PER_PLUGIN);
    })();

    return {
        id,
        pluginId: data.pluginId,
        title: data.title,
        success: data.success,
        result: data.result,
        createdAt: new Date(now).toISOString(),
    };
}

/**
 * Most recent delivery attempts for a plugin, newest first.
 */
export function getRecentDeliveries(pluginId: string, limit = 10): DeliveryRecord[] {
    const rows = getDb().prepare(`
        SELECT id, plugin_id, title, success, result, created_at
        FROM delivery_log
        WHERE plugin_id = ?
        ORDER BY created_at DESC, rowid DESC
        LIMIT ?
    `).all(pluginId, limit) as DeliveryLogRow[];

    return rows.map(rowToRecord);
}
