/**
 * Config Redaction Utilities
 *
 * Prevents sensitive fields (passwords, tokens) from being sent in plaintext
 * to the admin UI. Uses a sentinel value pattern:
 * - GET responses replace sensitive fields with "••••••••"
 * - PUT merges sentinel values with existing DB values
 *
 * Which fields are sensitive is determined by the plugin schema
 * (fields with sensitive: true are redacted).
 */

import { ConfigSchema, PluginConfig } from './types';

/** Fixed-length sentinel that replaces real values in API responses */
export const REDACTED_SENTINEL = '••••••••';

/** Any string composed entirely of bullet characters */
const BULLET_ONLY_REGEX = /^•+$/;

export function getSensitiveFieldKeys(schema: ConfigSchema): string[] {
    return schema.fields.filter(f => f.sensitive === true).map(f => f.key);
}

function getHiddenFieldKeys(schema: ConfigSchema): string[] {
    return schema.fields.filter(f => f.hidden === true).map(f => f.key);
}

/**
 * Replace sensitive field values with the sentinel string.
 * Empty values are left as-is so the UI can tell "unset" from "set".
 */
export function redactConfig(config: PluginConfig, schema: ConfigSchema): PluginConfig {
    const redacted = { ...config };
    for (const key of getSensitiveFieldKeys(schema)) {
        if (redacted[key]) {
            redacted[key] = REDACTED_SENTINEL;
        }
    }
    return redacted;
}

/**
 * Merge incoming config with the stored one:
 * - sensitive fields still holding the sentinel keep the stored value
 * - hidden fields the form never sends keep the stored value
 */
export function mergeConfigWithExisting(
    incoming: PluginConfig,
    existing: PluginConfig | null,
    schema: ConfigSchema
): PluginConfig {
    const stored = existing ?? {};
    const merged = { ...incoming };

    for (const key of getSensitiveFieldKeys(schema)) {
        const value = merged[key];
        if (typeof value === 'string' && BULLET_ONLY_REGEX.test(value)) {
            merged[key] = stored[key];
        }
    }

    for (const key of getHiddenFieldKeys(schema)) {
        if (!(key in merged) && key in stored) {
            merged[key] = stored[key];
        }
    }

    return merged;
}
