/**
 * OneBot Notification Plugin Tests
 *
 * Delivery results for every OneBot answer, the notice.message filters and
 * the test message sent on save. axios and the delivery log are mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockRequest = vi.fn();
vi.mock('axios', () => ({
    default: {
        request: (...args: unknown[]) => mockRequest(...args),
        isAxiosError: (error: unknown) => typeof error === 'object' && error !== null && 'isAxiosError' in error,
    },
}));

const mockRecordDelivery = vi.fn();
const mockGetRecentDeliveries = vi.fn();
vi.mock('../db/deliveryLog', () => ({
    recordDelivery: (...args: unknown[]) => mockRecordDelivery(...args),
    getRecentDeliveries: (...args: unknown[]) => mockGetRecentDeliveries(...args),
}));

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { OneBotPlugin } from '../plugins/onebotmsg';
import { buildMessage, parseTargetId } from '../plugins/onebotmsg/format';
import { PluginConfig } from '../plugins/types';

// ============================================================================
// Setup
// ============================================================================

const PRIVATE_CONFIG: PluginConfig = {
    enabled: true,
    server: 'http://bot.test:5700/',
    access_token: 'test-token',
    message_type: 'private',
    user_id: '10001',
};

const GROUP_CONFIG: PluginConfig = {
    enabled: true,
    server: 'http://bot.test:5700',
    message_type: 'group',
    group_id: '20002',
};

function createContext() {
    return {
        updateConfig: vi.fn(),
        sendEvent: vi.fn().mockResolvedValue(undefined),
    };
}

async function createPlugin(config: PluginConfig | null, context = createContext()): Promise<OneBotPlugin> {
    const plugin = new OneBotPlugin();
    await plugin.init(config, context);
    return plugin;
}

function botResponse(data: unknown, status = 200, statusText = 'OK') {
    return { status, statusText, data, headers: {} };
}

const OK_BODY = { status: 'ok', retcode: 0, data: { message_id: 1 } };

// ============================================================================
// TESTS
// ============================================================================

describe('format helpers', () => {
    it('joins title and text with a blank line', () => {
        expect(buildMessage('Title', 'Body')).toBe('Title\n\nBody');
        expect(buildMessage('', 'Body')).toBe('Body');
        expect(buildMessage(null, 'Body')).toBe('Body');
        expect(buildMessage('Title', null)).toBe('Title\n\n');
    });

    it('parses integer ids only', () => {
        expect(parseTargetId('10001')).toBe(10001);
        expect(parseTargetId(' 42 ')).toBe(42);
        expect(parseTargetId('-7')).toBe(-7);
        expect(parseTargetId('12.5')).toBeNull();
        expect(parseTargetId('abc')).toBeNull();
        expect(parseTargetId(null)).toBeNull();
    });
});

describe('OneBotPlugin', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    beforeEach(() => {
        mockRequest.mockReset();
        mockRecordDelivery.mockReset();
        mockGetRecentDeliveries.mockReset();
        mockGetRecentDeliveries.mockReturnValue([]);
    });

    describe('getState', () => {
        it('requires enabled, server and the target for the message type', async () => {
            expect((await createPlugin(PRIVATE_CONFIG)).getState()).toBe(true);
            expect((await createPlugin(GROUP_CONFIG)).getState()).toBe(true);
            expect((await createPlugin({ ...PRIVATE_CONFIG, enabled: false })).getState()).toBe(false);
            expect((await createPlugin({ ...PRIVATE_CONFIG, server: '' })).getState()).toBe(false);
            expect((await createPlugin({ ...PRIVATE_CONFIG, user_id: '' })).getState()).toBe(false);
            expect((await createPlugin({ ...GROUP_CONFIG, group_id: '' })).getState()).toBe(false);
            expect((await createPlugin({ ...PRIVATE_CONFIG, message_type: 'channel' })).getState()).toBe(false);
            expect((await createPlugin(null)).getState()).toBe(false);
        });
    });

    describe('send', () => {
        it('refuses to send when not configured', async () => {
            const plugin = await createPlugin(null);

            await expect(plugin.send('Title', 'Body'))
                .resolves.toEqual({ success: false, message: 'Plugin disabled or not configured' });
            expect(mockRequest).not.toHaveBeenCalled();
        });

        it('sends a private message with the access token', async () => {
            mockRequest.mockResolvedValue(botResponse(OK_BODY));
            const plugin = await createPlugin(PRIVATE_CONFIG);

            const result = await plugin.send('Title', 'Body');

            expect(result).toEqual({ success: true, message: 'Sent' });
            const config = mockRequest.mock.calls[0][0];
            expect(config.method).toBe('POST');
            expect(config.url).toBe('http://bot.test:5700/send_private_msg');
            expect(config.data).toEqual({ user_id: 10001, message: 'Title\n\nBody' });
            expect(config.headers).toEqual({
                Authorization: 'Bearer test-token',
                'Content-Type': 'application/json',
            });
            expect(mockRecordDelivery).toHaveBeenCalledWith({
                pluginId: 'onebotmsg',
                title: 'Title',
                success: true,
                result: 'Sent',
            });
        });

        it('sends a group message without auth when no token is set', async () => {
            mockRequest.mockResolvedValue(botResponse(OK_BODY));
            const plugin = await createPlugin(GROUP_CONFIG);

            await plugin.send(null, 'Body only');

            const config = mockRequest.mock.calls[0][0];
            expect(config.url).toBe('http://bot.test:5700/send_group_msg');
            expect(config.data).toEqual({ group_id: 20002, message: 'Body only' });
            expect(config.headers).toEqual({ 'Content-Type': 'application/json' });
        });

        it('keeps a loopback server address inside a container', async () => {
            vi.stubEnv('DOCKER', '1');
            mockRequest.mockResolvedValue(botResponse(OK_BODY));
            const plugin = await createPlugin({ ...PRIVATE_CONFIG, server: 'http://127.0.0.1:5700/' });

            await plugin.send('T', 'B');

            expect(mockRequest.mock.calls[0][0].url).toBe('http://127.0.0.1:5700/send_private_msg');
            expect(mockRequest.mock.calls[0][0].timeout).toBe(15000);
        });

        it('sends the access token exactly as stored', async () => {
            mockRequest.mockResolvedValue(botResponse(OK_BODY));
            const plugin = await createPlugin({ ...PRIVATE_CONFIG, access_token: ' test-token ' });

            await plugin.send('T', 'B');

            expect(mockRequest.mock.calls[0][0].headers.Authorization).toBe('Bearer  test-token ');
        });

        it('rejects a user id that is not an integer', async () => {
            const plugin = await createPlugin({ ...PRIVATE_CONFIG, user_id: 'abc' });

            await expect(plugin.send('Title', 'Body'))
                .resolves.toEqual({ success: false, message: 'Invalid user ID format: abc' });
            expect(mockRequest).not.toHaveBeenCalled();
            expect(mockRecordDelivery).toHaveBeenCalledWith({
                pluginId: 'onebotmsg',
                title: 'Title',
                success: false,
                result: 'Invalid user ID format: abc',
            });
        });

        it('rejects a group id that is not an integer', async () => {
            const plugin = await createPlugin({ ...GROUP_CONFIG, group_id: '20002x' });

            await expect(plugin.send('Title', 'Body'))
                .resolves.toEqual({ success: false, message: 'Invalid group ID format: 20002x' });
        });

        it('reports the OneBot error message on a failed action', async () => {
            const plugin = await createPlugin(PRIVATE_CONFIG);

            mockRequest.mockResolvedValueOnce(botResponse({ status: 'failed', retcode: 100, msg: 'bot offline' }));
            await expect(plugin.send('T', 'B')).resolves.toEqual({ success: false, message: 'Send failed: bot offline' });

            mockRequest.mockResolvedValueOnce(botResponse({ status: 'failed', retcode: 1400, message: 'bad param' }));
            await expect(plugin.send('T', 'B')).resolves.toEqual({ success: false, message: 'Send failed: bad param' });

            mockRequest.mockResolvedValueOnce(botResponse({ status: 'ok', retcode: 1 }));
            await expect(plugin.send('T', 'B')).resolves.toEqual({ success: false, message: 'Send failed: unknown error' });
        });

        it('reports the HTTP status of a non-200 answer', async () => {
            mockRequest.mockResolvedValue(botResponse('', 403, 'Forbidden'));
            const plugin = await createPlugin(PRIVATE_CONFIG);

            await expect(plugin.send('T', 'B'))
                .resolves.toEqual({ success: false, message: 'Send failed, HTTP 403: Forbidden' });
            expect(mockRequest.mock.calls[0][0].validateStatus(403)).toBe(true);
        });

        it('reports transport errors', async () => {
            mockRequest.mockRejectedValue(Object.assign(new Error('connect ECONNREFUSED'), {
                isAxiosError: true,
                code: 'ECONNREFUSED',
            }));
            const plugin = await createPlugin(PRIVATE_CONFIG);

            await expect(plugin.send('T', 'B'))
                .resolves.toEqual({ success: false, message: 'Send error: Cannot reach OneBot: ECONNREFUSED' });
        });

        it('still returns the result when the delivery log fails', async () => {
            mockRequest.mockResolvedValue(botResponse(OK_BODY));
            mockRecordDelivery.mockImplementation(() => {
                throw new Error('database is locked');
            });
            const plugin = await createPlugin(PRIVATE_CONFIG);

            await expect(plugin.send('T', 'B')).resolves.toEqual({ success: true, message: 'Sent' });
        });
    });

    describe('notice.message handling', () => {
        async function handle(config: PluginConfig, data: unknown): Promise<void> {
            const plugin = await createPlugin(config);
            const handler = plugin.eventHandlers['notice.message'];
            if (!handler) throw new Error('handler missing');
            await handler(data);
        }

        beforeEach(() => {
            mockRequest.mockResolvedValue(botResponse(OK_BODY));
        });

        it('forwards a notice without a type', async () => {
            await handle(PRIVATE_CONFIG, { title: 'Hello', text: 'World' });

            expect(mockRequest).toHaveBeenCalledTimes(1);
            expect(mockRequest.mock.calls[0][0].data).toEqual({ user_id: 10001, message: 'Hello\n\nWorld' });
        });

        it('ignores notices while the plugin is not usable', async () => {
            await handle({ ...PRIVATE_CONFIG, enabled: false }, { title: 'Hello' });
            expect(mockRequest).not.toHaveBeenCalled();
        });

        it('ignores payloads that are not objects', async () => {
            await handle(PRIVATE_CONFIG, 'Hello');
            await handle(PRIVATE_CONFIG, null);
            expect(mockRequest).not.toHaveBeenCalled();
        });

        it('ignores notices addressed to a channel', async () => {
            await handle(PRIVATE_CONFIG, { title: 'Hello', channel: 'wechat' });
            expect(mockRequest).not.toHaveBeenCalled();
        });

        it('stringifies a title or text that is not a string', async () => {
            await handle(PRIVATE_CONFIG, { title: 42, text: false });

            expect(mockRequest.mock.calls[0][0].data).toEqual({ user_id: 10001, message: '42\n\nfalse' });
        });

        it('ignores notices with neither title nor text', async () => {
            await handle(PRIVATE_CONFIG, { type: 'Manual' });
            expect(mockRequest).not.toHaveBeenCalled();
        });

        it('skips types outside the selected list', async () => {
            await handle({ ...PRIVATE_CONFIG, msgtypes: ['Download'] }, { title: 'Hello', type: 'Manual' });
            expect(mockRequest).not.toHaveBeenCalled();
        });

        it('matches a type given by its display value', async () => {
            await handle({ ...PRIVATE_CONFIG, msgtypes: ['SiteMessage'] }, { title: 'Hello', type: 'Site message' });
            expect(mockRequest).toHaveBeenCalledTimes(1);
        });

        it('forwards an unrecognised type even with a selection', async () => {
            await handle({ ...PRIVATE_CONFIG, msgtypes: ['Download'] }, { title: 'Hello', type: 'Custom' });
            expect(mockRequest).toHaveBeenCalledTimes(1);
        });
    });

    describe('init', () => {
        it('sends a test message when onlyonce is set and resets it', async () => {
            mockRequest.mockResolvedValue(botResponse(OK_BODY));
            const context = createContext();

            await createPlugin({ ...PRIVATE_CONFIG, onlyonce: true, msgtypes: ['Manual'] }, context);

            expect(mockRequest.mock.calls[0][0].data).toEqual({
                user_id: 10001,
                message: 'OneBot test notification\n\nOneBot notification plugin enabled',
            });
            expect(context.updateConfig).toHaveBeenCalledWith({
                enabled: true,
                onlyonce: false,
                msgtypes: ['Manual'],
                server: 'http://bot.test:5700/',
                access_token: 'test-token',
                user_id: '10001',
                group_id: null,
                message_type: 'private',
            });
        });
    });

    describe('getStatus', () => {
        it('summarises the target and the forwarded types', async () => {
            const plugin = await createPlugin({ ...GROUP_CONFIG, msgtypes: ['Manual', 'SiteMessage'] });

            const status = plugin.getStatus();

            expect(status.enabled).toBe(true);
            expect(status.items).toEqual([
                { label: 'Server', value: 'http://bot.test:5700' },
                { label: 'Message type', value: 'Group message' },
                { label: 'Target ID', value: '20002' },
                { label: 'Forwarded types', value: 'Site message, Manual' },
            ]);
            expect(mockGetRecentDeliveries).toHaveBeenCalledWith('onebotmsg');
        });
    });
});
