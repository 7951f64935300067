/**
 * HTTPS Agents
 *
 * Outbound TLS settings for plugin HTTP clients. The VPS vendor's endpoints
 * still negotiate legacy cipher suites, so every agent lowers OpenSSL's
 * security level to 1. Certificate verification stays on unless a plugin
 * explicitly opts into insecure mode.
 */

import https from 'https';

export interface HttpsAgentOptions {
    /** Skip certificate and hostname verification */
    insecure?: boolean;
}

const LEGACY_CIPHERS = 'DEFAULT@SECLEVEL=1';

export function createHttpsAgent(options: HttpsAgentOptions = {}): https.Agent {
    const insecure = options.insecure ?? false;
    return new https.Agent({
        keepAlive: false,
        ciphers: LEGACY_CIPHERS,
        rejectUnauthorized: !insecure,
        ...(insecure ? { checkServerIdentity: () => undefined } : {}),
    });
}

/** Shared verifying agent */
export const httpsAgent = createHttpsAgent();

/** Shared non-verifying agent, used only when a plugin enables insecure TLS */
export const insecureHttpsAgent = createHttpsAgent({ insecure: true });
