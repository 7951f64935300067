/**
 * Host Event Bus
 *
 * In-process dispatch of host events to plugin handlers. A plugin raises an
 * event (e.g. the VPS monitor's summary) and every plugin subscribed to that
 * type (e.g. the OneBot channel) receives it.
 *
 * Handler failures are logged and never propagate to the sender.
 */

import logger from '../utils/logger';
import { extractErrorMessage } from '../plugins/errors';

// ============================================================================
// Types
// ============================================================================

/**
 * notice.message carries { title?, text?, type?, channel? }. Raisers outside
 * the host's own plugins may send anything, so handlers receive `unknown`
 * and narrow it themselves.
 */
export interface HostEventData {
    'notice.message': unknown;
}

export type HostEventType = keyof HostEventData;

type EventHandler = (data: unknown) => Promise<void>;

interface Subscription {
    owner: string;
    handler: EventHandler;
}

// ============================================================================
// HostEventBus Class
// ============================================================================

export class HostEventBus {
    private subscriptions = new Map<HostEventType, Subscription[]>();

    /**
     * Subscribe a handler. Returns a function that removes it again.
     */
    register<T extends HostEventType>(
        type: T,
        owner: string,
        handler: (data: HostEventData[T]) => Promise<void>
    ): () => void {
        const subscription: Subscription = { owner, handler };
        const list = this.subscriptions.get(type) ?? [];
        list.push(subscription);
        this.subscriptions.set(type, list);
        logger.debug(`[EventBus] Registered handler: type=${type} owner=${owner}`);

        return () => {
            const current = this.subscriptions.get(type) ?? [];
            this.subscriptions.set(type, current.filter(s => s !== subscription));
        };
    }

    /**
     * Remove every handler registered by an owner (plugin id).
     */
    unregisterOwner(owner: string): void {
        for (const [type, list] of this.subscriptions) {
            this.subscriptions.set(type, list.filter(s => s.owner !== owner));
        }
    }

    listenerCount(type: HostEventType): number {
        return this.subscriptions.get(type)?.length ?? 0;
    }

    /**
     * Dispatch an event to every handler and wait for all of them.
     */
    async sendEvent<T extends HostEventType>(type: T, data: HostEventData[T]): Promise<void> {
        const list = [...(this.subscriptions.get(type) ?? [])];
        if (list.length === 0) {
            logger.debug(`[EventBus] No handlers for event: type=${type}`);
            return;
        }

        logger.debug(`[EventBus] Dispatching event: type=${type} handlers=${list.length}`);

        const results = await Promise.allSettled(list.map(s => s.handler(data)));
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                logger.error(`[EventBus] Handler failed: type=${type} owner=${list[index].owner} error="${extractErrorMessage(result.reason)}"`);
            }
        });
    }

    clear(): void {
        this.subscriptions.clear();
    }
}

export const eventBus = new HostEventBus();
