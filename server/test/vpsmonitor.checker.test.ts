/**
 * VPS Throttle Checker Tests
 *
 * runSoapCheck / runRestCheck with the adapters' methods stubbed, plus the
 * summary texts built from their results.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { ScpSoapAdapter, VServerInformation } from '../plugins/vpsmonitor/soapAdapter';
import { ScpRestAdapter } from '../plugins/vpsmonitor/restAdapter';
import { parseSettings } from '../plugins/vpsmonitor/config';
import { AdapterError } from '../plugins/errors';
import {
    primaryServerIp,
    runRestCheck,
    runSoapCheck,
    statusFromRest,
} from '../plugins/vpsmonitor/checker';
import { buildSummaryNotice, formatStatusLine } from '../plugins/vpsmonitor/format';

// ============================================================================
// Test Data
// ============================================================================

function info(ips: string[], throttled: boolean[]): VServerInformation {
    return {
        ips,
        serverInterfaces: throttled.map(t => ({ trafficThrottled: t, ipv4IP: [] })),
        raw: {},
    };
}

const soapSettings = parseSettings({ enabled: true, customer: '12345', password: 'test-secret' });
const restSettings = parseSettings({ enabled: true, api_mode: 'rest', rest_access_token: 'test-access-token' });

// ============================================================================
// FORMAT
// ============================================================================

describe('buildSummaryNotice', () => {
    it('lists only throttled VPS', () => {
        const notice = buildSummaryNotice([
            { name: 'v1', ip: '203.0.113.1', throttled: true },
            { name: 'v2', ip: '203.0.113.2', throttled: false },
            { name: 'v3', ip: 'unknown', throttled: true },
        ], 3, true);

        expect(notice).toEqual({
            title: '⚠️ VPS throttled',
            text: 'The following VPS are currently throttled:\n• v1 (203.0.113.1)\n• v3 (unknown)',
        });
    });

    it('reports the all-clear with the number of VPS checked', () => {
        const notice = buildSummaryNotice([{ name: 'v1', ip: '203.0.113.1', throttled: false }], 2, true);
        expect(notice).toEqual({ title: '🟢 All VPS normal', text: '2 VPS checked, none throttled.' });
    });

    it('returns null for the all-clear when it is switched off', () => {
        expect(buildSummaryNotice([{ name: 'v1', ip: '203.0.113.1', throttled: false }], 1, false)).toBeNull();
    });

    it('formats a status line', () => {
        expect(formatStatusLine({ name: 'v1', ip: '203.0.113.1', throttled: true })).toBe('• v1 (203.0.113.1)');
    });
});

// ============================================================================
// SOAP
// ============================================================================

describe('runSoapCheck', () => {
    let adapter: ScpSoapAdapter;

    beforeEach(() => {
        adapter = new ScpSoapAdapter();
    });

    it('reports missing credentials without calling the service', async () => {
        const listSpy = vi.spyOn(adapter, 'getVServers');

        const outcome = await runSoapCheck(adapter, parseSettings({ enabled: true, customer: '12345' }));

        expect(outcome.notice).toEqual({
            title: '🔴 VPS monitor not configured',
            text: 'Fill in the SCP customer number and password (SOAP).',
        });
        expect(listSpy).not.toHaveBeenCalled();
    });

    it('reports a listing failure with the error message', async () => {
        vi.spyOn(adapter, 'getVServers').mockRejectedValue(
            new AdapterError('SOAP_FAULT', 'SCP SOAP fault: Validation error')
        );

        const outcome = await runSoapCheck(adapter, soapSettings);

        expect(outcome.notice).toEqual({ title: '🔴 Failed to list VPS', text: 'SCP SOAP fault: Validation error' });
        expect(outcome.error).toBe('SCP SOAP fault: Validation error');
    });

    it('reports when the customer has no VPS', async () => {
        vi.spyOn(adapter, 'getVServers').mockResolvedValue([]);

        const outcome = await runSoapCheck(adapter, soapSettings);

        expect(outcome.notice).toEqual({ title: '🟡 No VPS', text: '📭 No VPS found.' });
        expect(outcome.total).toBe(0);
    });

    it('marks a VPS throttled when any interface is throttled', async () => {
        vi.spyOn(adapter, 'getVServers').mockResolvedValue(['v1', 'v2']);
        vi.spyOn(adapter, 'getVServerInformation').mockImplementation(async (_settings, name) =>
            name === 'v1'
                ? info(['203.0.113.1'], [false, true])
                : info([], [false])
        );

        const outcome = await runSoapCheck(adapter, soapSettings);

        expect(outcome.statuses).toEqual([
            { name: 'v1', ip: '203.0.113.1', throttled: true },
            { name: 'v2', ip: 'unknown', throttled: false },
        ]);
        expect(outcome.notice).toEqual({
            title: '⚠️ VPS throttled',
            text: 'The following VPS are currently throttled:\n• v1 (203.0.113.1)',
        });
    });

    it('skips a VPS whose details fail and still counts it', async () => {
        vi.spyOn(adapter, 'getVServers').mockResolvedValue(['v1', 'v2']);
        vi.spyOn(adapter, 'getVServerInformation').mockImplementation(async (_settings, name) => {
            if (name === 'v1') throw new Error('timeout');
            return info(['203.0.113.2'], [false]);
        });

        const outcome = await runSoapCheck(adapter, soapSettings);

        expect(outcome.statuses).toEqual([{ name: 'v2', ip: '203.0.113.2', throttled: false }]);
        expect(outcome.notice).toEqual({ title: '🟢 All VPS normal', text: '2 VPS checked, none throttled.' });
    });

    it('hands each raw response to onInformation', async () => {
        vi.spyOn(adapter, 'getVServers').mockResolvedValue(['v1']);
        const details = info(['203.0.113.1'], [false]);
        vi.spyOn(adapter, 'getVServerInformation').mockResolvedValue(details);
        const onInformation = vi.fn();

        await runSoapCheck(adapter, soapSettings, { onInformation });

        expect(onInformation).toHaveBeenCalledWith('v1', details);
    });
});

// ============================================================================
// REST
// ============================================================================

describe('REST status helpers', () => {
    it('prefers the first IPv4 address of the server', () => {
        expect(primaryServerIp({ ips: ['2001:db8::1', '203.0.113.5'] })).toBe('203.0.113.5');
        expect(primaryServerIp({ ips: ['2001:db8::1'] })).toBe('2001:db8::1');
        expect(primaryServerIp({})).toBe('unknown');
    });

    it('uses the throttled interface address when it has one', () => {
        const status = statusFromRest(
            { ips: ['203.0.113.5'] },
            'v1',
            [{ trafficThrottled: false }, { trafficThrottled: true, ipv4IP: ['198.51.100.9'] }]
        );
        expect(status).toEqual({ name: 'v1', ip: '198.51.100.9', throttled: true });
    });

    it('falls back to the server address for a throttled interface without one', () => {
        const status = statusFromRest({ ips: ['203.0.113.5'] }, 'v1', [{ trafficThrottled: true }]);
        expect(status).toEqual({ name: 'v1', ip: '203.0.113.5', throttled: true });
    });
});

describe('runRestCheck', () => {
    let adapter: ScpRestAdapter;

    beforeEach(() => {
        adapter = new ScpRestAdapter();
    });

    it('reports a missing access token', async () => {
        const outcome = await runRestCheck(adapter, parseSettings({ enabled: true, api_mode: 'rest' }));

        expect(outcome.notice).toEqual({
            title: '🔴 REST call failed',
            text: 'REST access token (Bearer) is not configured',
        });
    });

    it('resolves ids and names from the server records', async () => {
        vi.spyOn(adapter, 'listServers').mockResolvedValue([
            { id: 101, vServerName: 'v1', ips: ['203.0.113.1'] },
            { uuid: 'abc', hostname: 'web.example.test', ips: ['203.0.113.2'] },
            { hostname: 'no-id' },
        ]);
        const interfacesSpy = vi.spyOn(adapter, 'getInterfaces').mockImplementation(async (_settings, serverId) =>
            serverId === '101' ? [{ trafficThrottled: true }] : []
        );

        const outcome = await runRestCheck(adapter, restSettings);

        expect(interfacesSpy).toHaveBeenCalledTimes(2);
        expect(interfacesSpy.mock.calls.map(call => call[1])).toEqual(['101', 'abc']);
        expect(outcome.statuses).toEqual([
            { name: 'v1', ip: '203.0.113.1', throttled: true },
            { name: 'web.example.test', ip: '203.0.113.2', throttled: false },
        ]);
        expect(outcome.total).toBe(3);
        expect(outcome.notice).toEqual({
            title: '⚠️ VPS throttled',
            text: 'The following VPS are currently throttled:\n• v1 (203.0.113.1)',
        });
    });

    it('turns any failure into a REST failure notice', async () => {
        vi.spyOn(adapter, 'listServers').mockRejectedValue(
            new AdapterError('SERVICE_ERROR', 'REST response malformed: servers is not a list')
        );

        const outcome = await runRestCheck(adapter, restSettings);

        expect(outcome.notice).toEqual({
            title: '🔴 REST call failed',
            text: 'REST response malformed: servers is not a list',
        });
    });
});
