/**
 * SCP REST Adapter
 *
 * Client for the ServerControlPanel REST API (scp-core), authorized with a
 * Bearer access token obtained through the device flow.
 * The API has answered both bare arrays and wrapped objects over time, so
 * both shapes are accepted.
 */

import https from 'https';
import { BaseAdapter } from '../BaseAdapter';
import { AdapterError } from '../errors';
import { isRecord } from '../configValues';
import { httpsAgent, insecureHttpsAgent } from '../../utils/httpsAgent';
import { SCP_REST_BASE, VpsMonitorSettings } from './config';

export type RestServer = Record<string, unknown>;
export type RestInterface = Record<string, unknown>;

function recordsOf(value: unknown): Record<string, unknown>[] {
    return Array.isArray(value) ? value.filter(isRecord) : [];
}

export class ScpRestAdapter extends BaseAdapter<VpsMonitorSettings> {
    readonly name = 'SCP REST';

    getBaseUrl(): string {
        return SCP_REST_BASE;
    }

    validateConfig(settings: VpsMonitorSettings): boolean {
        return !!settings.restAccessToken;
    }

    getAuthHeaders(settings: VpsMonitorSettings): Record<string, string> {
        return settings.restAccessToken
            ? { Authorization: `Bearer ${settings.restAccessToken}` }
            : {};
    }

    getHttpsAgent(settings: VpsMonitorSettings): https.Agent {
        return settings.insecureTls ? insecureHttpsAgent : httpsAgent;
    }

    /**
     * @throws AdapterError when the response is neither a list nor { servers: [] }
     */
    async listServers(settings: VpsMonitorSettings): Promise<RestServer[]> {
        const response = await this.get(settings, '/api/v1/servers');
        let servers: unknown = response.data;
        if (isRecord(servers) && 'servers' in servers) {
            servers = servers.servers;
        }
        if (!Array.isArray(servers)) {
            throw new AdapterError('SERVICE_ERROR', 'REST response malformed: servers is not a list');
        }
        return recordsOf(servers);
    }

    async getInterfaces(settings: VpsMonitorSettings, serverId: string): Promise<RestInterface[]> {
        const response = await this.get(settings, `/api/v1/servers/${encodeURIComponent(serverId)}/interfaces`);
        const data: unknown = response.data;
        if (isRecord(data) && 'interfaces' in data) {
            return recordsOf(data.interfaces);
        }
        return recordsOf(data);
    }
}
