/**
 * HTTP Options for BaseAdapter requests
 *
 * Shared type used by get(), post(), and request() methods.
 *
 * @module server/plugins/httpTypes
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpOpts {
    /** Request timeout in milliseconds (default: 15000) */
    timeout?: number;
    /** URL query parameters */
    params?: Record<string, unknown>;
    /** Response type (default: 'json') */
    responseType?: 'json' | 'text';
    /** Additional headers merged with auth headers */
    headers?: Record<string, string>;
    /**
     * Statuses that resolve instead of throwing (default: 2xx).
     * Callers that interpret error bodies themselves widen this.
     */
    validateStatus?: (status: number) => boolean;
}
