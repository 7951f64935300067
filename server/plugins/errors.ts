/**
 * Plugin Adapter Error Types
 *
 * Structured error classification for all adapter HTTP operations.
 * Every error flowing through BaseAdapter gets classified into one
 * of these codes.
 *
 * @module server/plugins/errors
 */

import axios from 'axios';

// ============================================================================
// ERROR CODES
// ============================================================================

export type AdapterErrorCode =
    | 'CONFIG_INVALID'      // Missing URL, credentials, etc.
    | 'AUTH_FAILED'         // 401/403 — credentials wrong or expired
    | 'SERVICE_UNREACHABLE' // ECONNREFUSED, ETIMEDOUT — service is down
    | 'SERVICE_ERROR'       // 5xx — service is up but erroring
    | 'REQUEST_ERROR'       // Other HTTP errors (404, 400, etc.)
    | 'NETWORK_ERROR'       // DNS failure, SSL error, etc.
    | 'SOAP_FAULT';         // SOAP envelope carried a Fault element

// ============================================================================
// ADAPTER ERROR CLASS
// ============================================================================

export class AdapterError extends Error {
    public readonly name = 'AdapterError';

    constructor(
        public readonly code: AdapterErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
    }
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

/**
 * Classify a raw error (typically from axios) into an AdapterError.
 */
export function classifyError(error: unknown, pluginName: string): AdapterError {
    if (error instanceof AdapterError) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;

        if (status !== undefined) {
            if (status === 401 || status === 403) {
                return new AdapterError('AUTH_FAILED',
                    `Authentication failed for ${pluginName} (HTTP ${status})`,
                    { status, pluginName }
                );
            }

            if (status >= 500) {
                return new AdapterError('SERVICE_ERROR',
                    `${pluginName} returned server error (HTTP ${status})`,
                    { status, pluginName }
                );
            }

            return new AdapterError('REQUEST_ERROR',
                `${pluginName} request failed (HTTP ${status})`,
                { status, pluginName }
            );
        }

        if (error.code === 'ECONNREFUSED' || error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
            return new AdapterError('SERVICE_UNREACHABLE',
                `Cannot reach ${pluginName}: ${error.code}`,
                { code: error.code, pluginName }
            );
        }
    }

    return new AdapterError('NETWORK_ERROR',
        `Network error for ${pluginName}: ${extractErrorMessage(error) || 'Unknown error'}`,
        { pluginName }
    );
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extract a human-readable error message from any error type.
 */
export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
