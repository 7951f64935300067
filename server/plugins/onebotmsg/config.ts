import { ConfigSchema, PluginConfig } from '../types';
import { readBoolean, readSecret, readString, readStringArray } from '../configValues';
import { NOTIFICATION_TYPES, notificationTypeNames } from '../notificationTypes';

// ============================================================================
// ONEBOT PLUGIN METADATA
// ============================================================================

export const id = 'onebotmsg';
export const name = 'OneBot Notifications';
export const description = 'Forwards host notifications to a chat bot over the OneBot v11 HTTP API.';
export const version = '1.0.0';

// ============================================================================
// SETTINGS
// ============================================================================

export const MESSAGE_TYPE_LABELS = {
    private: 'Private message',
    group: 'Group message',
} as const;

export interface OneBotSettings {
    enabled: boolean;
    onlyonce: boolean;
    /** NotificationType names; empty means every type */
    msgtypes: string[];
    server: string | null;
    accessToken: string | null;
    userId: string | null;
    groupId: string | null;
    /** 'private' or 'group'; anything else leaves the plugin unusable */
    messageType: string | null;
}

export function parseSettings(config: PluginConfig | null): OneBotSettings {
    return {
        enabled: readBoolean(config, 'enabled', false),
        onlyonce: readBoolean(config, 'onlyonce', false),
        msgtypes: readStringArray(config, 'msgtypes'),
        server: readString(config, 'server'),
        accessToken: readSecret(config, 'access_token'),
        userId: readString(config, 'user_id'),
        groupId: readString(config, 'group_id'),
        messageType: readString(config, 'message_type'),
    };
}

export function toStoredConfig(settings: OneBotSettings): PluginConfig {
    return {
        enabled: settings.enabled,
        onlyonce: settings.onlyonce,
        msgtypes: settings.msgtypes,
        server: settings.server,
        access_token: settings.accessToken,
        user_id: settings.userId,
        group_id: settings.groupId,
        message_type: settings.messageType,
    };
}

/**
 * Whether the settings are enough to deliver a message.
 */
export function isUsable(settings: OneBotSettings): boolean {
    if (!settings.enabled || !settings.server) {
        return false;
    }
    if (settings.messageType === 'private') return !!settings.userId;
    if (settings.messageType === 'group') return !!settings.groupId;
    return false;
}

export const configSchema: ConfigSchema = {
    fields: [
        { key: 'enabled', type: 'checkbox', label: 'Enable plugin', default: false },
        { key: 'onlyonce', type: 'checkbox', label: 'Send a test message', hint: 'Sent once when the settings are saved', default: false },
        {
            key: 'server',
            type: 'url',
            label: 'OneBot server',
            placeholder: 'http://localhost:5700',
            default: 'http://localhost:5700',
        },
        {
            key: 'access_token',
            type: 'password',
            label: 'Access token',
            hint: 'Set the same access_token as in the OneBot implementation',
            sensitive: true,
        },
        {
            key: 'message_type',
            type: 'select',
            label: 'Message type',
            options: [
                { value: 'private', label: MESSAGE_TYPE_LABELS.private },
                { value: 'group', label: MESSAGE_TYPE_LABELS.group },
            ],
            default: 'private',
        },
        { key: 'user_id', type: 'text', label: 'User ID', placeholder: 'Recipient of private messages' },
        { key: 'group_id', type: 'text', label: 'Group ID', placeholder: 'Recipient of group messages' },
        {
            key: 'msgtypes',
            type: 'multiselect',
            label: 'Notification types',
            hint: 'Leave empty to forward every type',
            options: notificationTypeNames.map(typeName => ({
                value: typeName,
                label: NOTIFICATION_TYPES[typeName],
            })),
            default: [],
        },
    ],
};
