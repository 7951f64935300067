/**
 * PluginManager
 *
 * Centralized plugin lifecycle management.
 * - Loads stored settings and initializes every registered plugin at startup
 * - Wires plugin event handlers into the event bus and services into the job scheduler
 * - Re-initializes a plugin when its settings change
 */

import logger from '../utils/logger';
import { eventBus, HostEventData, HostEventType } from './eventBus';
import { registerJob, unregisterJobsByOwner } from './jobScheduler';
import { getPluginConfig, savePluginConfig } from '../db/pluginConfigs';
import { plugins, getPlugin } from '../plugins/registry';
import { extractErrorMessage } from '../plugins/errors';
import { redactConfig, mergeConfigWithExisting } from '../plugins/redact';
import { validateConfigAgainstSchema } from '../plugins/configValidation';
import { isRecord } from '../plugins/configValues';
import {
    ConfigSchema,
    HostPlugin,
    PluginApiResponse,
    PluginConfig,
    PluginContext,
    PluginStatus,
} from '../plugins/types';

const EVENT_TYPES: HostEventType[] = ['notice.message'];

let isInitialized = false;

// ============================================================================
// Types
// ============================================================================

export interface PluginSummary {
    id: string;
    name: string;
    description: string;
    version: string;
    state: boolean;
}

export type ConfigUpdateResult =
    | { ok: true; config: PluginConfig }
    | { ok: false; status: 400 | 404; errors: string[] };

// ============================================================================
// Lifecycle helpers
// ============================================================================

function createContext(plugin: HostPlugin): PluginContext {
    return {
        updateConfig: (config: PluginConfig) => savePluginConfig(plugin.id, config),
        sendEvent<T extends HostEventType>(type: T, data: HostEventData[T]): Promise<void> {
            return eventBus.sendEvent(type, data);
        },
    };
}

async function startPlugin(plugin: HostPlugin): Promise<void> {
    try {
        await plugin.init(getPluginConfig(plugin.id), createContext(plugin));
    } catch (error) {
        logger.error(`[PluginManager] Failed to init plugin: id=${plugin.id} error="${extractErrorMessage(error)}"`);
        return;
    }

    for (const type of EVENT_TYPES) {
        const handler = plugin.eventHandlers?.[type];
        if (handler) {
            eventBus.register(type, plugin.id, handler);
        }
    }

    for (const service of plugin.getServices?.() ?? []) {
        registerJob({
            id: service.id,
            name: service.name,
            cronExpression: service.cronExpression,
            description: `${plugin.name}: ${service.name}`,
            owner: plugin.id,
            execute: service.execute,
        });
    }

    logger.info(`[PluginManager] Plugin started: id=${plugin.id} state=${plugin.getState()}`);
}

async function stopPlugin(plugin: HostPlugin): Promise<void> {
    unregisterJobsByOwner(plugin.id);
    eventBus.unregisterOwner(plugin.id);
    try {
        await plugin.stop();
    } catch (error) {
        logger.error(`[PluginManager] Failed to stop plugin: id=${plugin.id} error="${extractErrorMessage(error)}"`);
    }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Initialize every registered plugin.
 * Called once at server startup, after migrations.
 */
export async function initializePluginManager(): Promise<void> {
    if (isInitialized) {
        logger.warn('[PluginManager] Already initialized');
        return;
    }
    isInitialized = true;

    logger.info(`[PluginManager] Starting ${plugins.length} plugins`);
    for (const plugin of plugins) {
        await startPlugin(plugin);
    }
}

/**
 * Stop every plugin and its jobs.
 * Called on server shutdown (SIGTERM/SIGINT).
 */
export async function shutdownPluginManager(): Promise<void> {
    if (!isInitialized) {
        return;
    }

    logger.info('[PluginManager] Shutting down plugins');
    for (const plugin of plugins) {
        await stopPlugin(plugin);
    }
    isInitialized = false;
}

export function listPlugins(): PluginSummary[] {
    return plugins.map(p => ({
        id: p.id,
        name: p.name,
        description: p.description,
        version: p.version,
        state: p.getState(),
    }));
}

export function getPluginSchemas(): Record<string, ConfigSchema> {
    return Object.fromEntries(plugins.map(p => [p.id, p.configSchema]));
}

/**
 * Stored settings with sensitive values replaced by the sentinel.
 *
 * @returns null for an unknown plugin
 */
export function getRedactedConfig(pluginId: string): PluginConfig | null {
    const plugin = getPlugin(pluginId);
    if (!plugin) return null;
    return redactConfig(getPluginConfig(pluginId) ?? {}, plugin.configSchema);
}

/**
 * Validate, persist and apply new settings, then restart the plugin.
 */
export async function updatePluginConfig(pluginId: string, incoming: unknown): Promise<ConfigUpdateResult> {
    const plugin = getPlugin(pluginId);
    if (!plugin) {
        return { ok: false, status: 404, errors: [`Unknown plugin: ${pluginId}`] };
    }
    if (!isRecord(incoming)) {
        return { ok: false, status: 400, errors: ['Settings must be a JSON object'] };
    }

    const errors = validateConfigAgainstSchema(incoming, plugin.configSchema);
    if (errors.length > 0) {
        return { ok: false, status: 400, errors };
    }

    const merged = mergeConfigWithExisting(incoming, getPluginConfig(pluginId), plugin.configSchema);
    savePluginConfig(pluginId, merged);
    logger.info(`[PluginManager] Settings updated: id=${pluginId}`);

    await stopPlugin(plugin);
    await startPlugin(plugin);

    // init may have rewritten the settings (onlyonce reset)
    return { ok: true, config: redactConfig(getPluginConfig(pluginId) ?? merged, plugin.configSchema) };
}

export function getPluginStatus(pluginId: string): PluginStatus | null {
    const plugin = getPlugin(pluginId);
    if (!plugin) return null;
    return plugin.getStatus?.() ?? { enabled: plugin.getState(), items: [] };
}

/**
 * Dispatch a call to a plugin-specific API endpoint.
 */
export async function invokePluginApi(
    pluginId: string,
    path: string,
    method: string,
    body: unknown
): Promise<PluginApiResponse> {
    const plugin = getPlugin(pluginId);
    if (!plugin) {
        return { code: 404, message: `Unknown plugin: ${pluginId}` };
    }

    const endpoint = plugin.getApi?.().find(e => e.path === path);
    if (!endpoint) {
        return { code: 404, message: `Unknown endpoint: ${path}` };
    }
    if (endpoint.method !== method.toUpperCase()) {
        return { code: 405, message: `${path} expects ${endpoint.method}` };
    }

    try {
        return await endpoint.handler(isRecord(body) ? body : {});
    } catch (error) {
        logger.error(`[PluginManager] Plugin API failed: id=${pluginId} path=${path} error="${extractErrorMessage(error)}"`);
        return { code: 500, message: extractErrorMessage(error) };
    }
}
