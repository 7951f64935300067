/**
 * Message building for OneBot deliveries.
 */

import { isRecord } from '../configValues';

export function buildMessage(title: string | null | undefined, text: string | null | undefined): string {
    const body = text ?? '';
    return title ? `${title}\n\n${body}` : body;
}

/**
 * Parse a configured user or group id. Accepts an optionally signed run of
 * digits, surrounding whitespace allowed.
 */
export function parseTargetId(raw: string | null): number | null {
    if (raw === null) return null;
    const trimmed = raw.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * A 200 answer counts as delivered only when status is "ok" and retcode is 0.
 */
export function isActionOk(data: unknown): boolean {
    return isRecord(data) && data.status === 'ok' && data.retcode === 0;
}

export function actionErrorMessage(data: unknown): string {
    if (isRecord(data)) {
        if (typeof data.msg === 'string' && data.msg) return data.msg;
        if (typeof data.message === 'string' && data.message) return data.message;
    }
    return 'unknown error';
}
