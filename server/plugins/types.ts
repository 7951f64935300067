/**
 * Host Plugin System - Canonical Types
 *
 * Every plugin the host loads implements HostPlugin. The host owns settings
 * persistence, scheduling and event dispatch; a plugin only declares what it
 * needs through these interfaces.
 */

import type { HostEventType, HostEventData } from '../services/eventBus';

// ============================================================================
// CONFIG SCHEMA (for auto-generating forms)
// ============================================================================

export type FieldType = 'text' | 'password' | 'url' | 'number' | 'checkbox' | 'select' | 'multiselect' | 'cron';

export interface ConfigField {
    key: string;
    type: FieldType;
    label: string;
    placeholder?: string;
    hint?: string;
    required?: boolean;
    /** If true, this field's value is redacted in API responses (replaced with sentinel) */
    sensitive?: boolean;
    /** Hidden fields are stored but never rendered (OAuth tokens written by the plugin itself) */
    hidden?: boolean;
    options?: Array<{ value: string; label: string }>;
    default?: string | number | boolean | string[];
}

export interface ConfigSchema {
    fields: ConfigField[];
    infoMessage?: {
        icon?: 'info' | 'code' | 'lightbulb';
        title: string;
        content: string;
    };
}

export type PluginConfig = Record<string, unknown>;

// ============================================================================
// CONTEXT (host services handed to a plugin on init)
// ============================================================================

export interface PluginContext {
    /** Persist the plugin's settings (replaces the stored object) */
    updateConfig(config: PluginConfig): void;
    /** Raise a host event; resolves once every handler has finished */
    sendEvent<T extends HostEventType>(type: T, data: HostEventData[T]): Promise<void>;
}

// ============================================================================
// SERVICES (cron jobs)
// ============================================================================

export interface ServiceDefinition {
    id: string;
    name: string;
    /** 5-field crontab expression */
    cronExpression: string;
    execute: () => Promise<void>;
}

// ============================================================================
// API (plugin-specific endpoints)
// ============================================================================

export interface PluginApiResponse {
    code: number;
    message: string;
    data?: unknown;
}

export interface PluginApiEndpoint {
    path: string;
    method: 'GET' | 'POST';
    summary: string;
    description?: string;
    handler: (body: Record<string, unknown>) => Promise<PluginApiResponse>;
}

// ============================================================================
// STATUS (detail page / dashboard)
// ============================================================================

export interface StatusItem {
    label: string;
    value: string;
}

export interface PluginStatus {
    enabled: boolean;
    items: StatusItem[];
    details?: Record<string, unknown>;
}

// ============================================================================
// PLUGIN
// ============================================================================

export type EventHandlers = {
    [T in HostEventType]?: (data: HostEventData[T]) => Promise<void>;
};

export interface HostPlugin {
    // === METADATA ===
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly configSchema: ConfigSchema;

    // === LIFECYCLE ===
    init(config: PluginConfig | null, context: PluginContext): Promise<void>;
    getState(): boolean;
    stop(): Promise<void>;

    // === OPTIONAL CAPABILITIES ===
    getServices?(): ServiceDefinition[];
    getApi?(): PluginApiEndpoint[];
    getStatus?(): PluginStatus;
    readonly eventHandlers?: EventHandlers;
}
