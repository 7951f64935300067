/**
 * Validates incoming plugin settings against the plugin's ConfigSchema
 * before they are persisted.
 */

import { ConfigField, ConfigSchema, PluginConfig } from './types';

function checkField(field: ConfigField, value: unknown): string | null {
    if (value === null || value === undefined) return null;

    switch (field.type) {
        case 'checkbox':
            return typeof value === 'boolean' ? null : `${field.key} must be a boolean`;
        case 'number':
            return typeof value === 'number' && Number.isFinite(value) ? null : `${field.key} must be a number`;
        case 'select': {
            if (typeof value !== 'string') return `${field.key} must be a string`;
            if (value === '' || !field.options) return null;
            return field.options.some(o => o.value === value)
                ? null
                : `${field.key} must be one of: ${field.options.map(o => o.value).join(', ')}`;
        }
        case 'multiselect': {
            if (!Array.isArray(value) || !value.every(v => typeof v === 'string')) {
                return `${field.key} must be a list of strings`;
            }
            const options = field.options;
            if (!options) return null;
            const unknown = value.filter(v => !options.some(o => o.value === v));
            return unknown.length === 0 ? null : `${field.key} has unknown values: ${unknown.join(', ')}`;
        }
        case 'url': {
            if (typeof value !== 'string') return `${field.key} must be a string`;
            if (value.trim() === '') return null;
            try {
                const parsed = new URL(value);
                return parsed.protocol === 'http:' || parsed.protocol === 'https:'
                    ? null
                    : `${field.key} must be an http(s) URL`;
            } catch {
                return `${field.key} must be a valid URL`;
            }
        }
        default:
            return typeof value === 'string' || typeof value === 'number'
                ? null
                : `${field.key} must be a string`;
    }
}

/**
 * @returns list of problems; empty when the config is acceptable
 */
export function validateConfigAgainstSchema(config: PluginConfig, schema: ConfigSchema): string[] {
    const fields = new Map(schema.fields.map(f => [f.key, f]));
    const errors: string[] = [];

    for (const [key, value] of Object.entries(config)) {
        const field = fields.get(key);
        if (!field) {
            errors.push(`Unknown setting: ${key}`);
            continue;
        }
        const problem = checkField(field, value);
        if (problem) errors.push(problem);
    }

    return errors;
}
