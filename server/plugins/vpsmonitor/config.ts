import { ConfigSchema, PluginConfig } from '../types';
import { readBoolean, readNumber, readSecret, readString } from '../configValues';

// ============================================================================
// VPS MONITOR PLUGIN METADATA
// ============================================================================

export const id = 'vpsmonitor';
export const name = 'VPS Throttle Monitor';
export const description = 'Checks on a schedule whether any VPS in the ServerControlPanel is traffic-throttled and raises a notification with the result.';
export const version = '0.2.0';

export const SERVICE_ID = 'VPSMonitorService';

// ============================================================================
// VENDOR ENDPOINTS
// ============================================================================

export const SCP_HOST = 'https://www.servercontrolpanel.de';
export const SCP_SOAP_ENDPOINT = `${SCP_HOST}/WSEndUser`;
export const SCP_SOAP_NAMESPACE = 'http://enduser.service.web.vcp.netcup.de/';
export const SCP_REST_BASE = `${SCP_HOST}/scp-core`;
export const SCP_OIDC_BASE = `${SCP_HOST}/realms/scp/protocol/openid-connect`;
export const SCP_CLIENT_ID = 'scp';
export const SCP_LANGUAGE = 'en';

// ============================================================================
// SETTINGS
// ============================================================================

export type ApiMode = 'soap' | 'rest';

export interface VpsMonitorSettings {
    enabled: boolean;
    cron: string | null;
    onlyonce: boolean;
    apiMode: ApiMode;
    customer: string | null;
    password: string | null;
    notifyAllOk: boolean;
    insecureTls: boolean;
    debugDump: boolean;
    restAccessToken: string | null;
    restRefreshToken: string | null;
    /** Epoch seconds */
    restTokenExpiresAt: number | null;
}

export function parseSettings(config: PluginConfig | null): VpsMonitorSettings {
    const apiMode = readString(config, 'api_mode');
    return {
        enabled: readBoolean(config, 'enabled', false),
        cron: readString(config, 'cron'),
        onlyonce: readBoolean(config, 'onlyonce', false),
        apiMode: apiMode === 'rest' ? 'rest' : 'soap',
        customer: readString(config, 'customer'),
        password: readSecret(config, 'password'),
        notifyAllOk: readBoolean(config, 'notify_all_ok', true),
        insecureTls: readBoolean(config, 'insecure_tls', false),
        debugDump: readBoolean(config, 'debug_dump', false),
        restAccessToken: readSecret(config, 'rest_access_token'),
        restRefreshToken: readSecret(config, 'rest_refresh_token'),
        restTokenExpiresAt: readNumber(config, 'rest_token_expires_at'),
    };
}

export function toStoredConfig(settings: VpsMonitorSettings): PluginConfig {
    return {
        enabled: settings.enabled,
        cron: settings.cron,
        onlyonce: settings.onlyonce,
        api_mode: settings.apiMode,
        customer: settings.customer,
        password: settings.password,
        notify_all_ok: settings.notifyAllOk,
        insecure_tls: settings.insecureTls,
        debug_dump: settings.debugDump,
        rest_access_token: settings.restAccessToken,
        rest_refresh_token: settings.restRefreshToken,
        rest_token_expires_at: settings.restTokenExpiresAt,
    };
}

export const configSchema: ConfigSchema = {
    fields: [
        { key: 'enabled', type: 'checkbox', label: 'Enable plugin', default: false },
        { key: 'onlyonce', type: 'checkbox', label: 'Run once now', hint: 'Runs a check as soon as the settings are saved', default: false },
        {
            key: 'cron',
            type: 'cron',
            label: 'Schedule',
            placeholder: '0 */6 * * *',
            hint: '5-field crontab expression',
        },
        {
            key: 'api_mode',
            type: 'select',
            label: 'API mode',
            options: [
                { value: 'soap', label: 'SOAP (customer number + web-service password)' },
                { value: 'rest', label: 'REST (device authorization)' },
            ],
            default: 'soap',
        },
        { key: 'customer', type: 'text', label: 'SCP customer number', placeholder: '12345' },
        { key: 'password', type: 'password', label: 'SCP web-service password', sensitive: true },
        { key: 'notify_all_ok', type: 'checkbox', label: 'Notify when no VPS is throttled', default: true },
        {
            key: 'insecure_tls',
            type: 'checkbox',
            label: 'Skip TLS certificate verification',
            hint: 'Only for short-term use against a server with a broken certificate',
            default: false,
        },
        { key: 'debug_dump', type: 'checkbox', label: 'Log raw per-VPS responses', default: false },
        { key: 'rest_access_token', type: 'password', label: 'REST access token', sensitive: true, hidden: true },
        { key: 'rest_refresh_token', type: 'password', label: 'REST refresh token', sensitive: true, hidden: true },
        { key: 'rest_token_expires_at', type: 'number', label: 'REST token expiry', hidden: true },
    ],
    infoMessage: {
        icon: 'info',
        title: 'Credentials',
        content: 'SOAP mode uses the web-service password set in the ServerControlPanel (not the login password). REST mode is authorized through the device flow endpoints of this plugin.',
    },
};
