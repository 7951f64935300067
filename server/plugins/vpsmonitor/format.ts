/**
 * Notification texts for VPS monitor runs.
 */

export interface VpsStatus {
    name: string;
    ip: string;
    throttled: boolean;
}

export interface Notice {
    title: string;
    text: string;
}

export const UNKNOWN_IP = 'unknown';

export const NOTICES: Record<'notConfigured' | 'noVps', Notice> = {
    notConfigured: {
        title: '🔴 VPS monitor not configured',
        text: 'Fill in the SCP customer number and password (SOAP).',
    },
    noVps: {
        title: '🟡 No VPS',
        text: '📭 No VPS found.',
    },
};

export const ERROR_TITLES = {
    listFailed: '🔴 Failed to list VPS',
    restFailed: '🔴 REST call failed',
} as const;

export function formatStatusLine(status: VpsStatus): string {
    return `• ${status.name} (${status.ip})`;
}

/**
 * Summary for a completed run, or null when everything is fine and the
 * all-clear message is switched off.
 *
 * @param total number of VPS the run looked at, including ones whose details failed
 */
export function buildSummaryNotice(statuses: VpsStatus[], total: number, notifyAllOk: boolean): Notice | null {
    const throttled = statuses.filter(s => s.throttled);

    if (throttled.length > 0) {
        return {
            title: '⚠️ VPS throttled',
            text: 'The following VPS are currently throttled:\n' + throttled.map(formatStatusLine).join('\n'),
        };
    }

    if (!notifyAllOk) {
        return null;
    }

    return {
        title: '🟢 All VPS normal',
        text: `${total} VPS checked, none throttled.`,
    };
}
