/**
 * Host Event Bus Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockError = vi.fn();
vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: (...args: unknown[]) => mockError(...args), debug: vi.fn() },
}));

import { HostEventBus } from '../services/eventBus';

describe('HostEventBus', () => {
    let bus: HostEventBus;

    beforeEach(() => {
        bus = new HostEventBus();
        mockError.mockReset();
    });

    it('delivers an event to every handler and waits for them', async () => {
        const received: string[] = [];
        bus.register('notice.message', 'a', async () => {
            await new Promise(resolve => setTimeout(resolve, 5));
            received.push('a');
        });
        bus.register('notice.message', 'b', async () => {
            received.push('b');
        });

        await bus.sendEvent('notice.message', { title: 'Hello' });

        expect(received.sort()).toEqual(['a', 'b']);
    });

    it('logs a failing handler without affecting the others', async () => {
        const other = vi.fn().mockResolvedValue(undefined);
        bus.register('notice.message', 'broken', async () => {
            throw new Error('boom');
        });
        bus.register('notice.message', 'onebotmsg', other);

        await expect(bus.sendEvent('notice.message', { text: 'x' })).resolves.toBeUndefined();

        expect(other).toHaveBeenCalledWith({ text: 'x' });
        expect(mockError).toHaveBeenCalledWith('[EventBus] Handler failed: type=notice.message owner=broken error="boom"');
    });

    it('removes handlers by unsubscribe function and by owner', async () => {
        const first = vi.fn().mockResolvedValue(undefined);
        const second = vi.fn().mockResolvedValue(undefined);
        const unsubscribe = bus.register('notice.message', 'a', first);
        bus.register('notice.message', 'b', second);

        unsubscribe();
        expect(bus.listenerCount('notice.message')).toBe(1);

        bus.unregisterOwner('b');
        expect(bus.listenerCount('notice.message')).toBe(0);

        await bus.sendEvent('notice.message', { title: 'Hello' });
        expect(first).not.toHaveBeenCalled();
        expect(second).not.toHaveBeenCalled();
    });
});
