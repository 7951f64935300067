/**
 * Plugin Routes
 *
 * Settings, status and plugin-specific endpoints for every registered plugin.
 * Sensitive settings are redacted on the way out and restored on the way in.
 */

import { Router, Request, Response } from 'express';
import { requireAuth } from '../middleware/auth';
import {
    getPluginSchemas,
    getPluginStatus,
    getRedactedConfig,
    invokePluginApi,
    listPlugins,
    updatePluginConfig,
} from '../services/PluginManager';
import { extractErrorMessage } from '../plugins/errors';
import logger from '../utils/logger';

const router = Router();

/**
 * GET /api/plugins
 */
router.get('/', requireAuth, (_req: Request, res: Response): void => {
    res.json({ plugins: listPlugins() });
});

/**
 * GET /api/plugins/schemas
 *
 * Config schemas keyed by plugin id, for form generation.
 */
router.get('/schemas', requireAuth, (_req: Request, res: Response): void => {
    res.json({ schemas: getPluginSchemas() });
});

/**
 * GET /api/plugins/:id/config
 */
router.get('/:id/config', requireAuth, (req: Request, res: Response): void => {
    try {
        const config = getRedactedConfig(req.params.id);
        if (!config) {
            res.status(404).json({ error: 'Plugin not found' });
            return;
        }
        res.json({ config });
    } catch (error) {
        logger.error(`[PluginsAPI] Failed to read config: plugin=${req.params.id} error="${extractErrorMessage(error)}"`);
        res.status(500).json({ error: 'Failed to read plugin settings' });
    }
});

/**
 * PUT /api/plugins/:id/config
 *
 * Replace the plugin's settings and re-initialize it.
 */
router.put('/:id/config', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
        const result = await updatePluginConfig(req.params.id, req.body);
        if (!result.ok) {
            res.status(result.status).json({ error: result.errors.join('; '), errors: result.errors });
            return;
        }
        res.json({ success: true, config: result.config });
    } catch (error) {
        logger.error(`[PluginsAPI] Failed to update config: plugin=${req.params.id} error="${extractErrorMessage(error)}"`);
        res.status(500).json({ error: 'Failed to update plugin settings' });
    }
});

/**
 * GET /api/plugins/:id/status
 */
router.get('/:id/status', requireAuth, (req: Request, res: Response): void => {
    try {
        const status = getPluginStatus(req.params.id);
        if (!status) {
            res.status(404).json({ error: 'Plugin not found' });
            return;
        }
        res.json(status);
    } catch (error) {
        logger.error(`[PluginsAPI] Failed to get status: plugin=${req.params.id} error="${extractErrorMessage(error)}"`);
        res.status(500).json({ error: 'Failed to get plugin status' });
    }
});

/**
 * ALL /api/plugins/:id/api/:path
 *
 * Plugin-specific endpoints. The HTTP status mirrors the handler's code.
 */
router.all('/:id/api/:path', requireAuth, async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.method === 'GET' ? req.query : req.body;
    const result = await invokePluginApi(req.params.id, req.params.path, req.method, body);
    res.status(result.code).json(result);
});

export default router;
