/**
 * VPS Throttle Monitor Plugin
 *
 * Periodically asks the ServerControlPanel which VPS are traffic-throttled
 * and raises one notice.message event per run. SOAP mode authenticates with
 * customer number and web-service password; REST mode uses tokens obtained
 * through the device authorization endpoints below.
 */

import logger from '../../utils/logger';
import { extractErrorMessage } from '../errors';
import { isValidCronExpression } from '../../services/jobScheduler';
import {
    HostPlugin,
    PluginApiEndpoint,
    PluginApiResponse,
    PluginConfig,
    PluginContext,
    PluginStatus,
    ServiceDefinition,
} from '../types';
import {
    id,
    name,
    description,
    version,
    configSchema,
    SERVICE_ID,
    VpsMonitorSettings,
    parseSettings,
    toStoredConfig,
} from './config';
import { ScpSoapAdapter } from './soapAdapter';
import { ScpRestAdapter } from './restAdapter';
import { ScpAuthAdapter, TokenSet } from './authAdapter';
import { CheckOutcome, runRestCheck, runSoapCheck } from './checker';

interface LastCheck {
    at: string;
    mode: VpsMonitorSettings['apiMode'];
    total: number;
    throttled: string[];
    error: string | null;
}

function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

export class VpsMonitorPlugin implements HostPlugin {
    readonly id = id;
    readonly name = name;
    readonly description = description;
    readonly version = version;
    readonly configSchema = configSchema;

    private settings: VpsMonitorSettings = parseSettings(null);
    private context: PluginContext | null = null;
    private lastCheck: LastCheck | null = null;

    constructor(
        private readonly soap = new ScpSoapAdapter(),
        private readonly rest = new ScpRestAdapter(),
        private readonly auth = new ScpAuthAdapter()
    ) { }

    async init(config: PluginConfig | null, context: PluginContext): Promise<void> {
        this.context = context;
        this.settings = parseSettings(config);

        if (config && this.settings.onlyonce) {
            logger.info('[VPSMonitor] Run-once requested, checking now');
            await this.runCheck();
            this.settings = { ...this.settings, onlyonce: false };
            this.persist();
        }
    }

    getState(): boolean {
        return this.settings.enabled;
    }

    getServices(): ServiceDefinition[] {
        const { enabled, cron } = this.settings;
        if (!enabled || !cron) {
            return [];
        }
        if (!isValidCronExpression(cron)) {
            logger.error(`[VPSMonitor] Invalid cron expression: "${cron}"`);
            return [];
        }
        return [{
            id: SERVICE_ID,
            name: 'VPS throttle check',
            cronExpression: cron,
            execute: async () => {
                await this.runCheck();
            },
        }];
    }

    /**
     * One monitoring run. Raises at most one notice.message event.
     */
    async runCheck(): Promise<CheckOutcome> {
        let outcome: CheckOutcome;

        if (this.settings.apiMode === 'rest') {
            await this.refreshTokenIfExpired();
            outcome = await runRestCheck(this.rest, this.settings);
        } else {
            outcome = await runSoapCheck(this.soap, this.settings, {
                onInformation: this.settings.debugDump
                    ? (vserverName, info) => logger.info(`[VPSMonitor] Raw information for ${vserverName}`, { raw: info.raw })
                    : undefined,
            });
        }

        this.lastCheck = {
            at: new Date().toISOString(),
            mode: this.settings.apiMode,
            total: outcome.total,
            throttled: outcome.statuses.filter(s => s.throttled).map(s => s.name),
            error: outcome.error ?? null,
        };

        if (outcome.notice && this.context) {
            await this.context.sendEvent('notice.message', {
                title: outcome.notice.title,
                text: outcome.notice.text,
                type: 'Manual',
            });
        }
        return outcome;
    }

    getApi(): PluginApiEndpoint[] {
        return [
            {
                path: 'start_device_flow',
                method: 'POST',
                summary: 'Start SCP device authorization',
                description: 'Returns the user code and verification URL to approve in the browser',
                handler: () => this.startDeviceFlow(),
            },
            {
                path: 'poll_device_token',
                method: 'POST',
                summary: 'Poll for device authorization tokens',
                handler: body => this.pollDeviceToken(body),
            },
            {
                path: 'revoke_device_token',
                method: 'POST',
                summary: 'Revoke and forget the stored REST tokens',
                handler: () => this.revokeDeviceToken(),
            },
        ];
    }

    getStatus(): PluginStatus {
        const items = [
            { label: 'API mode', value: this.settings.apiMode.toUpperCase() },
            { label: 'Schedule', value: this.settings.cron ?? 'not set' },
            { label: 'Skip TLS verification', value: this.settings.insecureTls ? 'yes' : 'no' },
            { label: 'Notify when all OK', value: this.settings.notifyAllOk ? 'yes' : 'no' },
        ];
        if (this.settings.apiMode === 'rest') {
            const expiresAt = this.settings.restTokenExpiresAt;
            items.push({
                label: 'REST token',
                value: !this.settings.restAccessToken
                    ? 'not authorized'
                    : expiresAt
                        ? `expires ${new Date(expiresAt * 1000).toISOString()}`
                        : 'authorized',
            });
        }
        if (this.lastCheck) {
            items.push({ label: 'Last check', value: this.lastCheck.at });
        }
        return {
            enabled: this.settings.enabled,
            items,
            details: this.lastCheck ? { lastCheck: this.lastCheck } : undefined,
        };
    }

    async stop(): Promise<void> {
        this.context = null;
    }

    // ========================================================================
    // Device authorization
    // ========================================================================

    private async startDeviceFlow(): Promise<PluginApiResponse> {
        try {
            const data = await this.auth.startDeviceFlow(this.settings);
            return { code: 200, message: 'OK', data };
        } catch (error) {
            return { code: 500, message: extractErrorMessage(error) };
        }
    }

    private async pollDeviceToken(body: Record<string, unknown>): Promise<PluginApiResponse> {
        const deviceCode = typeof body.device_code === 'string' ? body.device_code.trim() : '';
        if (!deviceCode) {
            return { code: 400, message: 'device_code is required' };
        }

        try {
            const result = await this.auth.pollDeviceToken(this.settings, deviceCode);
            if (result.status === 'pending') {
                return { code: 202, message: result.body };
            }
            this.storeTokens(result.tokens);
            logger.info('[VPSMonitor] Device authorization completed');
            return { code: 200, message: 'ok' };
        } catch (error) {
            return { code: 500, message: extractErrorMessage(error) };
        }
    }

    private async revokeDeviceToken(): Promise<PluginApiResponse> {
        const refreshToken = this.settings.restRefreshToken;
        if (refreshToken) {
            try {
                await this.auth.revokeToken(this.settings, refreshToken);
            } catch (error) {
                logger.warn(`[VPSMonitor] Token revocation failed: error="${extractErrorMessage(error)}"`);
            }
        }

        this.settings = {
            ...this.settings,
            restAccessToken: null,
            restRefreshToken: null,
            restTokenExpiresAt: null,
        };
        this.persist();
        return { code: 200, message: 'revoked' };
    }

    private async refreshTokenIfExpired(): Promise<void> {
        const { restRefreshToken, restTokenExpiresAt } = this.settings;
        if (!restRefreshToken || restTokenExpiresAt === null || restTokenExpiresAt > nowSeconds()) {
            return;
        }

        try {
            const tokens = await this.auth.refreshAccessToken(this.settings, restRefreshToken);
            this.storeTokens(tokens);
            logger.info('[VPSMonitor] REST access token refreshed');
        } catch (error) {
            logger.warn(`[VPSMonitor] Token refresh failed: error="${extractErrorMessage(error)}"`);
        }
    }

    private storeTokens(tokens: TokenSet): void {
        this.settings = {
            ...this.settings,
            restAccessToken: tokens.accessToken,
            restRefreshToken: tokens.refreshToken,
            restTokenExpiresAt: nowSeconds() + tokens.expiresIn,
        };
        this.persist();
    }

    private persist(): void {
        this.context?.updateConfig(toStoredConfig(this.settings));
    }
}

export const plugin: HostPlugin = new VpsMonitorPlugin();
