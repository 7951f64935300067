/**
 * OneBot Notification Plugin
 *
 * Notification channel: every notice.message event that is not addressed to
 * a specific channel is forwarded to one private chat or group through the
 * OneBot v11 HTTP API.
 */

import logger from '../../utils/logger';
import { extractErrorMessage } from '../errors';
import { isRecord } from '../configValues';
import { NOTIFICATION_TYPES, notificationTypeNames, resolveNotificationType } from '../notificationTypes';
import { getRecentDeliveries, recordDelivery } from '../../db/deliveryLog';
import { EventHandlers, HostPlugin, PluginConfig, PluginContext, PluginStatus } from '../types';
import {
    id,
    name,
    description,
    version,
    configSchema,
    MESSAGE_TYPE_LABELS,
    OneBotSettings,
    isUsable,
    parseSettings,
    toStoredConfig,
} from './config';
import { OneBotAdapter, OneBotAction, OneBotPayload } from './adapter';
import { actionErrorMessage, buildMessage, isActionOk, parseTargetId } from './format';

export interface SendResult {
    success: boolean;
    message: string;
}

export const TEST_NOTICE = {
    title: 'OneBot test notification',
    text: 'OneBot notification plugin enabled',
} as const;

export class OneBotPlugin implements HostPlugin {
    readonly id = id;
    readonly name = name;
    readonly description = description;
    readonly version = version;
    readonly configSchema = configSchema;

    readonly eventHandlers: EventHandlers = {
        'notice.message': data => this.handleNoticeMessage(data),
    };

    private settings: OneBotSettings = parseSettings(null);

    constructor(private readonly adapter = new OneBotAdapter()) { }

    async init(config: PluginConfig | null, context: PluginContext): Promise<void> {
        this.settings = parseSettings(config);

        if (config && this.settings.onlyonce) {
            await this.send(TEST_NOTICE.title, TEST_NOTICE.text);
            this.settings = { ...this.settings, onlyonce: false };
            context.updateConfig(toStoredConfig(this.settings));
        }
    }

    getState(): boolean {
        return isUsable(this.settings);
    }

    /**
     * Deliver one message. Never throws; the outcome is returned and logged
     * to the delivery history.
     */
    async send(title: string | null | undefined, text: string | null | undefined): Promise<SendResult> {
        if (!this.getState()) {
            return { success: false, message: 'Plugin disabled or not configured' };
        }

        const result = await this.deliver(title, text);
        try {
            recordDelivery({
                pluginId: this.id,
                title: title || null,
                success: result.success,
                result: result.message,
            });
        } catch (error) {
            logger.error(`[OneBot] Failed to record delivery: error="${extractErrorMessage(error)}"`);
        }
        return result;
    }

    async handleNoticeMessage(data: unknown): Promise<void> {
        if (!this.getState() || !data) {
            return;
        }
        if (!isRecord(data)) {
            logger.error(`[OneBot] Malformed notice payload: ${JSON.stringify(data)}`);
            return;
        }
        if (data.channel) {
            return;
        }

        const title = data.title === undefined || data.title === null ? null : String(data.title);
        const text = data.text === undefined || data.text === null ? null : String(data.text);
        if (!title && !text) {
            logger.warn('[OneBot] Notice has neither title nor text');
            return;
        }

        const type = resolveNotificationType(data.type);
        if (type && this.settings.msgtypes.length > 0 && !this.settings.msgtypes.includes(type)) {
            logger.info(`[OneBot] Notification type ${NOTIFICATION_TYPES[type]} is not forwarded`);
            return;
        }

        await this.send(title, text);
    }

    getStatus(): PluginStatus {
        const { server, messageType, userId, groupId, msgtypes } = this.settings;
        const isPrivate = messageType === 'private';
        const targetId = isPrivate ? userId : groupId;
        const allowed = notificationTypeNames
            .filter(typeName => msgtypes.length === 0 || msgtypes.includes(typeName))
            .map(typeName => NOTIFICATION_TYPES[typeName]);

        return {
            enabled: this.getState(),
            items: [
                { label: 'Server', value: server ?? 'not configured' },
                { label: 'Message type', value: isPrivate ? MESSAGE_TYPE_LABELS.private : MESSAGE_TYPE_LABELS.group },
                { label: 'Target ID', value: targetId ?? 'not configured' },
                { label: 'Forwarded types', value: allowed.length > 0 ? allowed.join(', ') : 'none' },
            ],
            details: {
                recentDeliveries: getRecentDeliveries(this.id),
            },
        };
    }

    async stop(): Promise<void> {
        // No background work to stop
    }

    private target(): { action: OneBotAction; payload: (message: string) => OneBotPayload } | SendResult {
        if (this.settings.messageType === 'private') {
            const userId = parseTargetId(this.settings.userId);
            if (userId === null) {
                return { success: false, message: `Invalid user ID format: ${this.settings.userId ?? ''}` };
            }
            return { action: 'send_private_msg', payload: message => ({ user_id: userId, message }) };
        }

        const groupId = parseTargetId(this.settings.groupId);
        if (groupId === null) {
            return { success: false, message: `Invalid group ID format: ${this.settings.groupId ?? ''}` };
        }
        return { action: 'send_group_msg', payload: message => ({ group_id: groupId, message }) };
    }

    private async deliver(title: string | null | undefined, text: string | null | undefined): Promise<SendResult> {
        const message = buildMessage(title, text);
        const target = this.target();
        if ('success' in target) {
            return target;
        }

        try {
            const response = await this.adapter.callAction(this.settings, target.action, target.payload(message));

            if (response.status === 200) {
                if (isActionOk(response.data)) {
                    logger.info(`[OneBot] Message sent: type=${this.settings.messageType} title="${title ?? ''}"`);
                    return { success: true, message: 'Sent' };
                }
                const reason = actionErrorMessage(response.data);
                logger.warn(`[OneBot] Send failed: ${reason}`);
                return { success: false, message: `Send failed: ${reason}` };
            }

            logger.warn(`[OneBot] Send failed: HTTP ${response.status} ${response.statusText}`);
            return { success: false, message: `Send failed, HTTP ${response.status}: ${response.statusText}` };
        } catch (error) {
            const reason = extractErrorMessage(error);
            logger.error(`[OneBot] Send error: ${reason}`);
            return { success: false, message: `Send error: ${reason}` };
        }
    }
}

export const plugin: HostPlugin = new OneBotPlugin();
