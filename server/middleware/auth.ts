/**
 * Admin API authentication.
 *
 * When HOST_API_TOKEN is set every /api route except health requires
 * `Authorization: Bearer <token>`. Without it the API is open, which is
 * only meant for a host bound to localhost.
 */

import crypto from 'crypto';
import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

let warnedOpen = false;

function tokensMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function requireAuth(req: Request, res: Response, next: NextFunction): void {
    const expected = process.env.HOST_API_TOKEN;
    if (!expected) {
        if (!warnedOpen) {
            logger.warn('[Auth] HOST_API_TOKEN is not set, admin API is unauthenticated');
            warnedOpen = true;
        }
        next();
        return;
    }

    const header = req.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match || !tokensMatch(match[1].trim(), expected)) {
        logger.warn(`[Auth] Rejected request: path=${req.path}`);
        res.status(401).json({ error: 'Unauthorized' });
        return;
    }

    next();
}
