/**
 * Notification Routes
 *
 * Lets external callers raise a notice.message event, which every channel
 * plugin (OneBot) receives like one raised by a plugin.
 */

import { Router, Request, Response } from 'express';
import { requireAuth } from '../middleware/auth';
import { eventBus } from '../services/eventBus';
import { isRecord } from '../plugins/configValues';
import logger from '../utils/logger';

const router = Router();

/**
 * POST /api/notifications
 *
 * Body: { title?, text?, type?, channel? }
 */
router.post('/', requireAuth, async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
        res.status(400).json({ error: 'Body must be a JSON object' });
        return;
    }

    const { title, text, type, channel } = body;
    if (!title && !text) {
        res.status(400).json({ error: 'title or text is required' });
        return;
    }

    logger.info(`[NotificationsAPI] Raising notice: title="${typeof title === 'string' ? title : ''}"`);
    await eventBus.sendEvent('notice.message', { title, text, type, channel });
    res.status(202).json({ success: true });
});

export default router;
