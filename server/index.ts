/**
 * Plugin Host - Server Entry Point
 */

// Load environment variables from .env file (development only)
import 'dotenv/config';

import { createServer } from 'http';
import { createApp } from './app';
import logger from './utils/logger';
import { getDb, closeDatabase } from './database/db';
import { runMigrations } from './database/migrator';
import { initializePluginManager, shutdownPluginManager } from './services/PluginManager';
import { shutdownAllJobs } from './services/jobScheduler';

const PORT = parseInt(process.env.PORT || '3001', 10);
const NODE_ENV = process.env.NODE_ENV || 'development';

const app = createApp();
const httpServer = createServer(app);

// Start server with proper async initialization
(async () => {
    try {
        logger.info(`[Startup] Plugin host starting: env=${NODE_ENV}`);

        const result = runMigrations(getDb());
        if (!result.success) {
            logger.error(`[Startup] Migration failed: error="${result.error}"`);
            process.exit(1);
        }
        if (result.migratedTo !== result.migratedFrom) {
            logger.info(`Database migrated (v${result.migratedFrom} → v${result.migratedTo})`);
        } else {
            logger.info(`Database ready (v${result.migratedTo})`);
        }

        await initializePluginManager();

        httpServer.listen(PORT, () => {
            logger.info(`[Server] Listening on port ${PORT}`);
            logger.info('[Server] Ready ✓');
        });
    } catch (error) {
        logger.error(`[Startup] Failed to start server: error="${error instanceof Error ? error.message : String(error)}"`);
        process.exit(1);
    }
})();

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
    logger.info(`${signal} received, shutting down gracefully`);
    await shutdownPluginManager();
    shutdownAllJobs();
    httpServer.close();
    closeDatabase();
    process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

export default app;
