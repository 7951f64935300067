/**
 * Notification categories raised on the host event bus.
 * Channel plugins filter on the name; events may carry either form.
 */

export const NOTIFICATION_TYPES = {
    Download: 'Download',
    Organize: 'Organize',
    Subscribe: 'Subscribe',
    SiteMessage: 'Site message',
    MediaServer: 'Media server',
    Manual: 'Manual',
    Plugin: 'Plugin',
    Other: 'Other',
} as const;

export type NotificationType = keyof typeof NOTIFICATION_TYPES;

export const notificationTypeNames: readonly NotificationType[] = [
    'Download',
    'Organize',
    'Subscribe',
    'SiteMessage',
    'MediaServer',
    'Manual',
    'Plugin',
    'Other',
];

/**
 * Resolve a type given by name ("SiteMessage") or display value ("Site message").
 */
export function resolveNotificationType(value: unknown): NotificationType | null {
    if (typeof value !== 'string' || !value) return null;
    for (const name of notificationTypeNames) {
        if (name === value || NOTIFICATION_TYPES[name] === value) {
            return name;
        }
    }
    return null;
}
