/**
 * Readers for raw plugin settings.
 *
 * Stored settings come from the admin form or older saves, so a boolean may
 * arrive as "true" and a number as "42". These helpers coerce leniently and
 * fall back to the given default.
 */

import { PluginConfig } from './types';

export function readBoolean(config: PluginConfig | null, key: string, fallback: boolean): boolean {
    const value = config?.[key];
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (normalized === 'true' || normalized === '1' || normalized === 'on') return true;
        if (normalized === 'false' || normalized === '0' || normalized === 'off' || normalized === '') return false;
    }
    return fallback;
}

/**
 * Trimmed string value, or null when missing or blank.
 * Numbers are accepted and stringified (ids typed into number fields).
 */
export function readString(config: PluginConfig | null, key: string): string | null {
    const value = config?.[key];
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed || null;
}

/**
 * Secret value exactly as stored, or null when missing or blank.
 */
export function readSecret(config: PluginConfig | null, key: string): string | null {
    const value = config?.[key];
    if (typeof value !== 'string' || value.trim() === '') return null;
    return value;
}

export function readNumber(config: PluginConfig | null, key: string): number | null {
    const value = config?.[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

export function readStringArray(config: PluginConfig | null, key: string): string[] {
    const value = config?.[key];
    if (!Array.isArray(value)) return [];
    return value.filter((item): item is string => typeof item === 'string' && item.length > 0);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
