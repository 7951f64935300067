/**
 * Job Scheduler Service
 *
 * Central registry for all cron-based plugin jobs.
 * Uses node-cron for wall-clock reliable scheduling.
 *
 * A job never overlaps itself: a tick that fires while the previous run is
 * still going is skipped.
 */

import cron, { ScheduledTask } from 'node-cron';
import logger from '../utils/logger';
import { extractErrorMessage } from '../plugins/errors';

// ============================================================================
// Types
// ============================================================================

export interface JobConfig {
    /** Unique job identifier */
    id: string;
    /** Human-readable name */
    name: string;
    /** Cron expression (e.g. '0 * * * *' for hourly) */
    cronExpression: string;
    /** Human-readable schedule description */
    description: string;
    /** Plugin that registered the job, if any */
    owner?: string;
    /** The function to execute */
    execute: () => Promise<void> | void;
}

export interface JobStatus {
    id: string;
    name: string;
    owner: string | null;
    cronExpression: string;
    description: string;
    status: 'idle' | 'running';
    lastRun: string | null;
    lastError: string | null;
}

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask;
    status: 'idle' | 'running';
    lastRun: Date | null;
    lastError: string | null;
}

type TriggerSource = 'cron' | 'manual';

// ============================================================================
// State
// ============================================================================

const jobs = new Map<string, RegisteredJob>();

// ============================================================================
// Execution
// ============================================================================

async function runJob(job: RegisteredJob, source: TriggerSource): Promise<boolean> {
    const { id } = job.config;
    job.status = 'running';
    logger.info(`[JobScheduler] Executing job: ${id} (${source})`);

    try {
        await job.config.execute();
        job.lastError = null;
        logger.info(`[JobScheduler] Completed job: ${id}`);
        return true;
    } catch (error) {
        job.lastError = extractErrorMessage(error);
        logger.error(`[JobScheduler] Job failed: ${id}, error="${job.lastError}"`);
        return false;
    } finally {
        job.lastRun = new Date();
        job.status = 'idle';
    }
}

function toStatus(job: RegisteredJob): JobStatus {
    return {
        id: job.config.id,
        name: job.config.name,
        owner: job.config.owner ?? null,
        cronExpression: job.config.cronExpression,
        description: job.config.description,
        status: job.status,
        lastRun: job.lastRun?.toISOString() ?? null,
        lastError: job.lastError,
    };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a 5-field crontab expression (minute hour day month weekday).
 * node-cron also accepts a leading seconds field; plugin schedules do not.
 */
export function isValidCronExpression(expression: string): boolean {
    const parts = expression.trim().split(/\s+/);
    return parts.length === 5 && cron.validate(expression.trim());
}

/**
 * Register a job with the scheduler.
 * If a job with the same ID exists, it will be replaced.
 *
 * @returns false when the cron expression is invalid
 */
export function registerJob(config: JobConfig): boolean {
    if (jobs.has(config.id)) {
        unregisterJob(config.id);
    }

    if (!isValidCronExpression(config.cronExpression)) {
        logger.error(`[JobScheduler] Invalid cron expression for job ${config.id}: "${config.cronExpression}"`);
        return false;
    }

    const task = cron.schedule(config.cronExpression.trim(), () => {
        const job = jobs.get(config.id);
        if (!job || job.status === 'running') {
            logger.debug(`[JobScheduler] Skipping ${config.id} (already running or removed)`);
            return;
        }
        void runJob(job, 'cron');
    });

    jobs.set(config.id, {
        config,
        task,
        status: 'idle',
        lastRun: null,
        lastError: null,
    });
    logger.info(`[JobScheduler] Registered job: ${config.id} (${config.description})`);
    return true;
}

/**
 * Unregister and stop a job.
 */
export function unregisterJob(id: string): void {
    const job = jobs.get(id);
    if (job) {
        job.task.stop();
        jobs.delete(id);
        logger.info(`[JobScheduler] Unregistered job: ${id}`);
    }
}

/**
 * Unregister every job a plugin registered.
 */
export function unregisterJobsByOwner(owner: string): void {
    for (const [id, job] of jobs) {
        if (job.config.owner === owner) {
            unregisterJob(id);
        }
    }
}

/**
 * Manually trigger a job to run now.
 *
 * @returns false when the job is unknown, already running, or failed
 */
export async function triggerJob(id: string): Promise<boolean> {
    const job = jobs.get(id);
    if (!job) {
        logger.warn(`[JobScheduler] Cannot trigger unknown job: ${id}`);
        return false;
    }

    if (job.status === 'running') {
        logger.warn(`[JobScheduler] Job already running: ${id}`);
        return false;
    }

    return runJob(job, 'manual');
}

export function hasJob(id: string): boolean {
    return jobs.has(id);
}

export function getJobStatuses(): JobStatus[] {
    return [...jobs.values()].map(toStatus);
}

export function getJobStatus(id: string): JobStatus | null {
    const job = jobs.get(id);
    return job ? toStatus(job) : null;
}

/**
 * Stop all registered jobs. Called on server shutdown.
 */
export function shutdownAllJobs(): void {
    logger.info(`[JobScheduler] Shutting down ${jobs.size} jobs...`);
    for (const [id] of jobs) {
        unregisterJob(id);
    }
}
