/**
 * Plugin settings helpers: coercion, schema validation, redaction and
 * notification type resolution.
 */

import { describe, it, expect } from 'vitest';
import { readBoolean, readNumber, readSecret, readString, readStringArray } from '../plugins/configValues';
import { validateConfigAgainstSchema } from '../plugins/configValidation';
import { mergeConfigWithExisting, redactConfig, REDACTED_SENTINEL } from '../plugins/redact';
import { resolveNotificationType } from '../plugins/notificationTypes';
import { configSchema as vpsSchema, parseSettings } from '../plugins/vpsmonitor/config';
import { configSchema as oneBotSchema } from '../plugins/onebotmsg/config';

describe('config value readers', () => {
    it('coerces booleans leniently', () => {
        expect(readBoolean({ a: 'true' }, 'a', false)).toBe(true);
        expect(readBoolean({ a: 'off' }, 'a', true)).toBe(false);
        expect(readBoolean({ a: 1 }, 'a', false)).toBe(true);
        expect(readBoolean({}, 'a', true)).toBe(true);
        expect(readBoolean(null, 'a', false)).toBe(false);
    });

    it('trims strings and treats blanks as missing', () => {
        expect(readString({ a: '  x ' }, 'a')).toBe('x');
        expect(readString({ a: '   ' }, 'a')).toBeNull();
        expect(readString({ a: 10001 }, 'a')).toBe('10001');
        expect(readString({ a: true }, 'a')).toBeNull();
    });

    it('keeps secrets as stored and treats blanks as missing', () => {
        expect(readSecret({ a: ' pa ss ' }, 'a')).toBe(' pa ss ');
        expect(readSecret({ a: '   ' }, 'a')).toBeNull();
        expect(readSecret({ a: 12345 }, 'a')).toBeNull();
        expect(readSecret({}, 'a')).toBeNull();
    });

    it('reads numbers and string lists', () => {
        expect(readNumber({ a: '42' }, 'a')).toBe(42);
        expect(readNumber({ a: 'x' }, 'a')).toBeNull();
        expect(readStringArray({ a: ['Manual', 3, ''] }, 'a')).toEqual(['Manual']);
        expect(readStringArray({ a: 'Manual' }, 'a')).toEqual([]);
    });
});

describe('vpsmonitor parseSettings', () => {
    it('applies defaults', () => {
        expect(parseSettings(null)).toEqual({
            enabled: false,
            cron: null,
            onlyonce: false,
            apiMode: 'soap',
            customer: null,
            password: null,
            notifyAllOk: true,
            insecureTls: false,
            debugDump: false,
            restAccessToken: null,
            restRefreshToken: null,
            restTokenExpiresAt: null,
        });
    });

    it('falls back to soap for an unknown api mode', () => {
        expect(parseSettings({ api_mode: 'graphql' }).apiMode).toBe('soap');
        expect(parseSettings({ api_mode: 'rest' }).apiMode).toBe('rest');
    });
});

describe('validateConfigAgainstSchema', () => {
    it('accepts a well-formed config', () => {
        expect(validateConfigAgainstSchema({
            enabled: true,
            cron: '0 */6 * * *',
            api_mode: 'soap',
            customer: '12345',
            password: REDACTED_SENTINEL,
            notify_all_ok: false,
        }, vpsSchema)).toEqual([]);
    });

    it('reports unknown keys and wrong types', () => {
        expect(validateConfigAgainstSchema({
            enabled: 'yes',
            api_mode: 'graphql',
            region: 'eu',
        }, vpsSchema)).toEqual([
            'enabled must be a boolean',
            'api_mode must be one of: soap, rest',
            'Unknown setting: region',
        ]);
    });

    it('checks urls and multiselect values', () => {
        expect(validateConfigAgainstSchema({
            server: 'ftp://bot.test',
            msgtypes: ['Manual', 'Bogus'],
        }, oneBotSchema)).toEqual([
            'server must be an http(s) URL',
            'msgtypes has unknown values: Bogus',
        ]);
    });
});

describe('redaction', () => {
    const stored = {
        enabled: true,
        password: 'test-secret',
        rest_access_token: 'a1',
        rest_refresh_token: 'r1',
        rest_token_expires_at: 1700000300,
    };

    it('replaces only non-empty sensitive values', () => {
        expect(redactConfig({ ...stored, password: '' }, vpsSchema)).toEqual({
            enabled: true,
            password: '',
            rest_access_token: REDACTED_SENTINEL,
            rest_refresh_token: REDACTED_SENTINEL,
            rest_token_expires_at: 1700000300,
        });
    });

    it('keeps stored secrets for sentinel values and omitted hidden fields', () => {
        const merged = mergeConfigWithExisting(
            { enabled: false, password: '•••' },
            stored,
            vpsSchema
        );

        expect(merged).toEqual({
            enabled: false,
            password: 'test-secret',
            rest_access_token: 'a1',
            rest_refresh_token: 'r1',
            rest_token_expires_at: 1700000300,
        });
    });

    it('takes a newly typed secret', () => {
        const merged = mergeConfigWithExisting({ password: 'new-secret' }, stored, vpsSchema);
        expect(merged.password).toBe('new-secret');
    });
});

describe('resolveNotificationType', () => {
    it('resolves by name or display value', () => {
        expect(resolveNotificationType('SiteMessage')).toBe('SiteMessage');
        expect(resolveNotificationType('Media server')).toBe('MediaServer');
        expect(resolveNotificationType('Manual')).toBe('Manual');
        expect(resolveNotificationType('site message')).toBeNull();
        expect(resolveNotificationType(undefined)).toBeNull();
    });
});
