/**
 * OneBot v11 HTTP Adapter
 *
 * Posts JSON actions to a OneBot implementation's HTTP API. Every answer is
 * returned to the caller; a non-200 status is not thrown.
 */

import { AxiosResponse } from 'axios';
import { BaseAdapter } from '../BaseAdapter';
import { trimTrailingSlash } from '../../utils/urlHelper';
import { OneBotSettings } from './config';

export type OneBotAction = 'send_private_msg' | 'send_group_msg';

export type OneBotPayload =
    | { user_id: number; message: string }
    | { group_id: number; message: string };

export class OneBotAdapter extends BaseAdapter<OneBotSettings> {
    readonly name = 'OneBot';

    getBaseUrl(settings: OneBotSettings): string {
        return trimTrailingSlash(settings.server ?? '');
    }

    validateConfig(settings: OneBotSettings): boolean {
        return !!settings.server;
    }

    getAuthHeaders(settings: OneBotSettings): Record<string, string> {
        return settings.accessToken
            ? { Authorization: `Bearer ${settings.accessToken}` }
            : {};
    }

    async callAction(settings: OneBotSettings, action: OneBotAction, payload: OneBotPayload): Promise<AxiosResponse> {
        return this.post(settings, `/${action}`, payload, {
            headers: { 'Content-Type': 'application/json' },
            validateStatus: () => true,
        });
    }
}
