/**
 * VPS Throttle Checker
 *
 * One run of the monitor: fetch every VPS from the SCP, decide which ones
 * report a throttled interface, and produce the single notice for the run.
 * Sending the notice is left to the plugin.
 */

import logger from '../../utils/logger';
import { extractErrorMessage } from '../errors';
import { VpsMonitorSettings } from './config';
import { ScpSoapAdapter, VServerInformation } from './soapAdapter';
import { ScpRestAdapter, RestInterface, RestServer } from './restAdapter';
import { ERROR_TITLES, NOTICES, Notice, UNKNOWN_IP, VpsStatus, buildSummaryNotice } from './format';

export interface CheckOutcome {
    /** Notice to raise for this run, null when nothing should be sent */
    notice: Notice | null;
    statuses: VpsStatus[];
    /** VPS the run looked at */
    total: number;
    /** Set when the run ended early on an error */
    error?: string;
}

export interface SoapCheckOptions {
    /** Receives each raw getVServerInformation result (debug dump) */
    onInformation?: (vserverName: string, info: VServerInformation) => void;
}

function failed(title: string, error: unknown): CheckOutcome {
    const message = extractErrorMessage(error);
    return { notice: { title, text: message }, statuses: [], total: 0, error: message };
}

// ============================================================================
// SOAP
// ============================================================================

export function statusFromInformation(name: string, info: VServerInformation): VpsStatus {
    return {
        name,
        ip: info.ips[0] ?? UNKNOWN_IP,
        throttled: info.serverInterfaces.some(iface => iface.trafficThrottled),
    };
}

export async function runSoapCheck(
    adapter: ScpSoapAdapter,
    settings: VpsMonitorSettings,
    options: SoapCheckOptions = {}
): Promise<CheckOutcome> {
    if (!settings.customer || !settings.password) {
        logger.warn('[VPSMonitor] SCP credentials not configured (SOAP mode)');
        return { notice: NOTICES.notConfigured, statuses: [], total: 0, error: 'not configured' };
    }

    let names: string[];
    try {
        names = await adapter.getVServers(settings);
    } catch (error) {
        logger.error(`[VPSMonitor] Failed to list VPS: error="${extractErrorMessage(error)}"`);
        return failed(ERROR_TITLES.listFailed, error);
    }

    if (names.length === 0) {
        logger.info(`[VPSMonitor] ${NOTICES.noVps.text}`);
        return { notice: NOTICES.noVps, statuses: [], total: 0 };
    }

    const statuses: VpsStatus[] = [];
    for (const name of names) {
        try {
            const info = await adapter.getVServerInformation(settings, name);
            options.onInformation?.(name, info);

            const status = statusFromInformation(name, info);
            logger.info(`[VPSMonitor] VPS ${name} -> ip=${status.ip} throttled=${status.throttled ? 'yes' : 'no'}`);
            statuses.push(status);
        } catch (error) {
            logger.warn(`[VPSMonitor] Failed to get information for ${name}: error="${extractErrorMessage(error)}"`);
        }
    }

    return {
        notice: buildSummaryNotice(statuses, names.length, settings.notifyAllOk),
        statuses,
        total: names.length,
    };
}

// ============================================================================
// REST
// ============================================================================

function firstTruthy(record: Record<string, unknown>, keys: string[]): string | null {
    for (const key of keys) {
        const value = record[key];
        if (typeof value === 'string' && value) return value;
        if (typeof value === 'number' && value !== 0) return String(value);
    }
    return null;
}

/**
 * First IPv4 address of a server's ips list, else its first entry.
 */
export function primaryServerIp(server: RestServer): string {
    const ips = Array.isArray(server.ips)
        ? server.ips.filter((ip): ip is string => typeof ip === 'string')
        : [];
    return ips.find(ip => !ip.includes(':')) ?? ips[0] ?? UNKNOWN_IP;
}

export function statusFromRest(server: RestServer, name: string, interfaces: RestInterface[]): VpsStatus {
    const throttledInterface = interfaces.find(iface => iface.trafficThrottled === true);
    if (!throttledInterface) {
        return { name, ip: primaryServerIp(server), throttled: false };
    }

    const ipv4 = throttledInterface.ipv4IP;
    const interfaceIp = Array.isArray(ipv4) && typeof ipv4[0] === 'string' ? ipv4[0] : null;
    return { name, ip: interfaceIp ?? primaryServerIp(server), throttled: true };
}

export async function runRestCheck(adapter: ScpRestAdapter, settings: VpsMonitorSettings): Promise<CheckOutcome> {
    if (!settings.restAccessToken) {
        logger.error('[VPSMonitor] REST call failed: access token not configured');
        return failed(ERROR_TITLES.restFailed, 'REST access token (Bearer) is not configured');
    }

    try {
        const servers = await adapter.listServers(settings);
        const statuses: VpsStatus[] = [];

        for (const server of servers) {
            const serverId = firstTruthy(server, ['id', 'serverId', 'uuid', 'vServerName']);
            if (!serverId) continue;
            const name = firstTruthy(server, ['vServerName', 'hostname']) ?? serverId;

            const interfaces = await adapter.getInterfaces(settings, serverId);
            const status = statusFromRest(server, name, interfaces);
            logger.info(`[VPSMonitor] VPS ${name} -> ip=${status.ip} throttled=${status.throttled ? 'yes' : 'no'}`);
            statuses.push(status);
        }

        return {
            notice: buildSummaryNotice(statuses, servers.length, settings.notifyAllOk),
            statuses,
            total: servers.length,
        };
    } catch (error) {
        logger.error(`[VPSMonitor] REST call failed: error="${extractErrorMessage(error)}"`);
        return failed(ERROR_TITLES.restFailed, error);
    }
}
