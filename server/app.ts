/**
 * Express application: middleware, routes and error handlers.
 * Started by index.ts; tests mount it directly.
 */

import express, { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';

import logger from './utils/logger';
import pluginsRoutes from './routes/plugins';
import jobsRoutes from './routes/jobs';
import notificationsRoutes from './routes/notifications';

interface ServerError extends Error {
    status?: number;
    code?: string;
}

export function createApp(): express.Express {
    const app = express();

    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));

    // Health check (no auth)
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ ok: true });
    });

    app.use('/api/plugins', pluginsRoutes);
    app.use('/api/jobs', jobsRoutes);
    app.use('/api/notifications', notificationsRoutes);

    // 404 handler
    app.use((req: Request, res: Response) => {
        logger.warn(`[Router] 404 Not Found: path=${req.path} method=${req.method}`);
        res.status(404).json({
            success: false,
            error: {
                code: 'NOT_FOUND',
                message: 'Endpoint not found'
            }
        });
    });

    // Error handling middleware
    app.use((err: ServerError, req: Request, res: Response, _next: NextFunction) => {
        logger.error(`[Server] Error: path=${req.path} error="${err.message}"`);

        res.status(err.status || 500).json({
            success: false,
            error: {
                code: err.code || 'INTERNAL_ERROR',
                message: process.env.NODE_ENV === 'production'
                    ? 'An error occurred'
                    : err.message
            }
        });
    });

    return app;
}
