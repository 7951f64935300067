/**
 * Jobs Routes
 *
 * API endpoints for inspecting and triggering scheduled plugin jobs.
 */

import { Router, Request, Response } from 'express';
import { requireAuth } from '../middleware/auth';
import { getJobStatus, getJobStatuses, hasJob, triggerJob } from '../services/jobScheduler';
import logger from '../utils/logger';

const router = Router();

/**
 * GET /api/jobs
 *
 * Get status of all registered jobs.
 */
router.get('/', requireAuth, (_req: Request, res: Response): void => {
    res.json({ jobs: getJobStatuses() });
});

/**
 * POST /api/jobs/:id/run
 *
 * Run a job now and answer when it has finished.
 */
router.post('/:id/run', requireAuth, async (req: Request, res: Response): Promise<void> => {
    const { id } = req.params;

    if (!hasJob(id)) {
        res.status(404).json({ error: `Job ${id} not found` });
        return;
    }

    const success = await triggerJob(id);
    if (success) {
        res.json({ success: true, message: `Job ${id} completed` });
        return;
    }

    const status = getJobStatus(id);
    if (status?.status === 'running') {
        res.status(409).json({ error: `Job ${id} is already running` });
        return;
    }

    logger.warn(`[JobsAPI] Manual run failed: job=${id}`);
    res.status(500).json({ error: status?.lastError ?? `Job ${id} failed` });
});

export default router;
