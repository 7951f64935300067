/**
 * Base Adapter - Abstract HTTP Client for All Plugins
 *
 * Every outbound client a plugin uses extends this class. It provides:
 * - Centralized HTTP methods (get, post, request)
 * - Settings validation before every request
 * - Structured error classification (AdapterError)
 * - Consistent structured logging
 *
 * Adapters are stateless: the plugin passes its current settings into every
 * call, so a settings change takes effect on the next request.
 *
 * @module server/plugins/BaseAdapter
 */

import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import http from 'http';
import https from 'https';
import { httpsAgent } from '../utils/httpsAgent';
import logger from '../utils/logger';
import { HttpMethod, HttpOpts } from './httpTypes';
import { AdapterError, classifyError } from './errors';

const DEFAULT_TIMEOUT_MS = 15000;

export abstract class BaseAdapter<TSettings> {
    /** Name used in log lines and error messages */
    abstract readonly name: string;

    /** Base URL every request path is appended to */
    abstract getBaseUrl(settings: TSettings): string;

    /**
     * Validate that the settings carry what this adapter needs.
     * Default: always valid.
     */
    validateConfig(_settings: TSettings): boolean {
        return true;
    }

    /** Auth headers for requests. Default: none. */
    getAuthHeaders(_settings: TSettings): Record<string, string> {
        return {};
    }

    /** TLS agent for https requests. Override for per-settings TLS policy. */
    getHttpsAgent(_settings: TSettings): https.Agent {
        return httpsAgent;
    }

    // ========================================================================
    // CORE HTTP METHODS (throw AdapterError on failure)
    // ========================================================================

    async get(settings: TSettings, path: string, opts?: HttpOpts): Promise<AxiosResponse> {
        return this.request(settings, 'GET', path, undefined, opts);
    }

    async post(settings: TSettings, path: string, body?: unknown, opts?: HttpOpts): Promise<AxiosResponse> {
        return this.request(settings, 'POST', path, body, opts);
    }

    /**
     * Core HTTP request method. All other methods route through here.
     * Validates settings, builds URL + headers, calls axios, classifies errors.
     *
     * @throws AdapterError on any failure
     */
    async request(
        settings: TSettings,
        method: HttpMethod,
        path: string,
        body?: unknown,
        opts?: HttpOpts
    ): Promise<AxiosResponse> {
        if (!this.validateConfig(settings)) {
            throw new AdapterError('CONFIG_INVALID', `Missing required configuration for ${this.name}`);
        }

        const url = `${this.getBaseUrl(settings)}${path}`;

        const config: AxiosRequestConfig = {
            method,
            url,
            headers: {
                ...this.getAuthHeaders(settings),
                ...opts?.headers,
            },
            params: opts?.params,
            data: body,
            httpAgent: new http.Agent({ keepAlive: false }),
            httpsAgent: this.getHttpsAgent(settings),
            timeout: opts?.timeout ?? DEFAULT_TIMEOUT_MS,
            ...(opts?.responseType ? { responseType: opts.responseType } : {}),
            ...(opts?.validateStatus ? { validateStatus: opts.validateStatus } : {}),
        };

        logger.debug(`[Adapter:${this.name}] ${method} ${path}`);

        try {
            return await axios.request(config);
        } catch (error) {
            const adapterError = classifyError(error, this.name);
            // Transient network blips are warn-level, auth and server errors are error-level
            const logLevel = adapterError.code === 'SERVICE_UNREACHABLE' || adapterError.code === 'NETWORK_ERROR'
                ? 'warn' : 'error';
            logger[logLevel](
                `[Adapter:${this.name}] ${adapterError.code}: ${adapterError.message}`,
                { path, status: adapterError.context?.status }
            );
            throw adapterError;
        }
    }
}
