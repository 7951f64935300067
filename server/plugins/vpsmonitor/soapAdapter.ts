/**
 * SCP SOAP Adapter
 *
 * Thin client for the ServerControlPanel end-user web service
 * (document/literal, JAX-WS style). Envelopes are built and parsed with
 * xml2js; namespace prefixes are stripped on parse, so callers navigate plain
 * element names.
 *
 * Only the two operations the monitor needs are implemented:
 * getVServers and getVServerInformation.
 */

import https from 'https';
import xml2js from 'xml2js';
import { BaseAdapter } from '../BaseAdapter';
import { AdapterError } from '../errors';
import { isRecord } from '../configValues';
import { httpsAgent, insecureHttpsAgent } from '../../utils/httpsAgent';
import logger from '../../utils/logger';
import { SCP_LANGUAGE, SCP_SOAP_ENDPOINT, SCP_SOAP_NAMESPACE, VpsMonitorSettings } from './config';

const SOAP_ENV_NAMESPACE = 'http://schemas.xmlsoap.org/soap/envelope/';

// ============================================================================
// Types
// ============================================================================

export interface ServerInterface {
    trafficThrottled: boolean;
    ipv4IP: string[];
}

export interface VServerInformation {
    ips: string[];
    serverInterfaces: ServerInterface[];
    /** Parsed <return> element, for debug dumps */
    raw: unknown;
}

// ============================================================================
// XML helpers
// ============================================================================

function toArray(value: unknown): unknown[] {
    if (value === undefined || value === null || value === '') return [];
    return Array.isArray(value) ? value : [value];
}

function toStringArray(value: unknown): string[] {
    return toArray(value)
        .filter((item): item is string => typeof item === 'string')
        .map(item => item.trim())
        .filter(Boolean);
}

function child(node: unknown, key: string): unknown {
    return isRecord(node) ? node[key] : undefined;
}

export function buildEnvelope(operation: string, params: Record<string, string>): string {
    const builder = new xml2js.Builder({
        renderOpts: { pretty: false },
        xmldec: { version: '1.0', encoding: 'UTF-8' },
    });

    return builder.buildObject({
        'soapenv:Envelope': {
            $: {
                'xmlns:soapenv': SOAP_ENV_NAMESPACE,
                'xmlns:ns': SCP_SOAP_NAMESPACE,
            },
            'soapenv:Body': {
                [`ns:${operation}`]: params,
            },
        },
    });
}

/**
 * Parse a SOAP response and return the operation's <return> content.
 *
 * @throws AdapterError SOAP_FAULT when the body carries a Fault
 */
export async function parseEnvelope(xml: string, operation: string): Promise<unknown> {
    const parser = new xml2js.Parser({
        explicitArray: false,
        ignoreAttrs: true,
        tagNameProcessors: [xml2js.processors.stripPrefix],
    });

    let parsed: unknown;
    try {
        parsed = await parser.parseStringPromise(xml);
    } catch (error) {
        throw new AdapterError('SERVICE_ERROR',
            `Malformed SOAP response for ${operation}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const body = child(child(parsed, 'Envelope'), 'Body');
    if (!isRecord(body)) {
        throw new AdapterError('SERVICE_ERROR', `SOAP response for ${operation} has no Body`);
    }

    const fault = child(body, 'Fault');
    if (fault !== undefined) {
        const faultString = child(fault, 'faultstring');
        const message = typeof faultString === 'string' && faultString ? faultString : 'Unknown SOAP fault';
        throw new AdapterError('SOAP_FAULT', `SCP SOAP fault: ${message}`, { operation });
    }

    const response = child(body, `${operation}Response`);
    if (response === undefined) {
        throw new AdapterError('SERVICE_ERROR', `SOAP response has no ${operation}Response element`);
    }

    return child(response, 'return');
}

function parseServerInterface(node: unknown): ServerInterface {
    const throttled = child(node, 'trafficThrottled');
    return {
        trafficThrottled: typeof throttled === 'string' && throttled.trim() === 'true',
        ipv4IP: toStringArray(child(node, 'ipv4IP')),
    };
}

// ============================================================================
// SCP SOAP ADAPTER
// ============================================================================

export class ScpSoapAdapter extends BaseAdapter<VpsMonitorSettings> {
    readonly name = 'SCP SOAP';

    getBaseUrl(): string {
        return SCP_SOAP_ENDPOINT;
    }

    validateConfig(settings: VpsMonitorSettings): boolean {
        return !!(settings.customer && settings.password);
    }

    getHttpsAgent(settings: VpsMonitorSettings): https.Agent {
        return settings.insecureTls ? insecureHttpsAgent : httpsAgent;
    }

    /**
     * Invoke an operation and return its parsed <return> content.
     * Faults arrive as HTTP 500 with a Fault body, so 500 is read rather than thrown.
     */
    async call(settings: VpsMonitorSettings, operation: string, params: Record<string, string>): Promise<unknown> {
        const response = await this.post(settings, '', buildEnvelope(operation, params), {
            headers: {
                'Content-Type': 'text/xml; charset=utf-8',
                'SOAPAction': '""',
            },
            responseType: 'text',
            validateStatus: status => status === 200 || status === 500,
        });

        const xml: unknown = response.data;
        if (typeof xml !== 'string' || !xml.trim()) {
            throw new AdapterError('SERVICE_ERROR', `Empty SOAP response for ${operation} (HTTP ${response.status})`);
        }

        try {
            return await parseEnvelope(xml, operation);
        } catch (error) {
            if (error instanceof AdapterError && error.code === 'SOAP_FAULT') {
                logger.warn(`[Adapter:${this.name}] ${operation} fault: ${error.message}`);
            }
            throw error;
        }
    }

    /**
     * Names of every VPS the customer owns.
     */
    async getVServers(settings: VpsMonitorSettings): Promise<string[]> {
        const result = await this.call(settings, 'getVServers', this.credentials(settings));
        return toStringArray(result);
    }

    async getVServerInformation(settings: VpsMonitorSettings, vserverName: string): Promise<VServerInformation> {
        const result = await this.call(settings, 'getVServerInformation', {
            ...this.credentials(settings),
            vservername: vserverName,
            language: SCP_LANGUAGE,
        });

        return {
            ips: toStringArray(child(result, 'ips')),
            serverInterfaces: toArray(child(result, 'serverInterfaces')).map(parseServerInterface),
            raw: result,
        };
    }

    private credentials(settings: VpsMonitorSettings): Record<string, string> {
        return {
            loginName: settings.customer ?? '',
            password: settings.password ?? '',
        };
    }
}
