/**
 * SCP OpenID Connect Adapter
 *
 * OAuth 2.0 device authorization grant (RFC 8628) against the SCP realm,
 * plus refresh and revocation of the resulting tokens. All requests are
 * form-encoded.
 */

import https from 'https';
import { BaseAdapter } from '../BaseAdapter';
import { AdapterError } from '../errors';
import { isRecord } from '../configValues';
import { httpsAgent, insecureHttpsAgent } from '../../utils/httpsAgent';
import { SCP_CLIENT_ID, SCP_OIDC_BASE, VpsMonitorSettings } from './config';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';

/** Token lifetime assumed when the server omits expires_in */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 300;

export interface DeviceAuthorization {
    device_code: string | null;
    user_code: string | null;
    verification_uri: string | null;
    verification_uri_complete: string | null;
    expires_in: number | null;
    interval: number | null;
}

export interface TokenSet {
    accessToken: string;
    refreshToken: string | null;
    expiresIn: number;
}

export type DeviceTokenPoll =
    | { status: 'granted'; tokens: TokenSet }
    | { status: 'pending'; body: string };

function stringField(data: Record<string, unknown>, key: string): string | null {
    const value = data[key];
    return typeof value === 'string' && value ? value : null;
}

function numberField(data: Record<string, unknown>, key: string): number | null {
    const value = data[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * @throws AdapterError when the token response carries no access token
 */
export function parseTokenSet(data: unknown): TokenSet {
    if (!isRecord(data)) {
        throw new AdapterError('SERVICE_ERROR', 'Token response is not a JSON object');
    }
    const accessToken = stringField(data, 'access_token');
    if (!accessToken) {
        throw new AdapterError('SERVICE_ERROR', 'Token response has no access_token');
    }
    return {
        accessToken,
        refreshToken: stringField(data, 'refresh_token'),
        expiresIn: numberField(data, 'expires_in') || DEFAULT_TOKEN_LIFETIME_SECONDS,
    };
}

export class ScpAuthAdapter extends BaseAdapter<VpsMonitorSettings> {
    readonly name = 'SCP OpenID';

    getBaseUrl(): string {
        return SCP_OIDC_BASE;
    }

    getHttpsAgent(settings: VpsMonitorSettings): https.Agent {
        return settings.insecureTls ? insecureHttpsAgent : httpsAgent;
    }

    async startDeviceFlow(settings: VpsMonitorSettings): Promise<DeviceAuthorization> {
        const form = new URLSearchParams({
            client_id: SCP_CLIENT_ID,
            scope: 'offline_access openid',
        });
        const response = await this.post(settings, '/auth/device', form);
        const data: unknown = response.data;
        const body = isRecord(data) ? data : {};

        return {
            device_code: stringField(body, 'device_code'),
            user_code: stringField(body, 'user_code'),
            verification_uri: stringField(body, 'verification_uri'),
            verification_uri_complete: stringField(body, 'verification_uri_complete'),
            expires_in: numberField(body, 'expires_in'),
            interval: numberField(body, 'interval'),
        };
    }

    /**
     * Exchange a device code for tokens. Any non-200 answer (authorization
     * pending, slow down, expired) is returned as pending with the raw body.
     */
    async pollDeviceToken(settings: VpsMonitorSettings, deviceCode: string): Promise<DeviceTokenPoll> {
        const form = new URLSearchParams({
            grant_type: DEVICE_CODE_GRANT,
            device_code: deviceCode,
            client_id: SCP_CLIENT_ID,
        });
        const response = await this.post(settings, '/token', form, {
            responseType: 'text',
            validateStatus: () => true,
        });

        const raw: unknown = response.data;
        const body = typeof raw === 'string' ? raw : '';
        if (response.status !== 200) {
            return { status: 'pending', body };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch {
            throw new AdapterError('SERVICE_ERROR', 'Token response is not valid JSON');
        }
        return { status: 'granted', tokens: parseTokenSet(parsed) };
    }

    async refreshAccessToken(settings: VpsMonitorSettings, refreshToken: string): Promise<TokenSet> {
        const form = new URLSearchParams({
            grant_type: 'refresh_token',
            refresh_token: refreshToken,
            client_id: SCP_CLIENT_ID,
        });
        const response = await this.post(settings, '/token', form);
        const tokens = parseTokenSet(response.data);
        // Keycloak may omit a rotated refresh token; keep the old one then
        return { ...tokens, refreshToken: tokens.refreshToken ?? refreshToken };
    }

    async revokeToken(settings: VpsMonitorSettings, refreshToken: string): Promise<void> {
        const form = new URLSearchParams({
            client_id: SCP_CLIENT_ID,
            token: refreshToken,
            token_type_hint: 'refresh_token',
        });
        await this.post(settings, '/revoke', form);
    }
}
