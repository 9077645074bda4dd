import { AutomationConfig } from './AutomationConfig';
import { PublishOutcomes } from './Publishing';
import { JobTransitionError } from '../errors';

/** How long finished job records are kept */
export const JOB_RETENTION_SECONDS = 7 * 24 * 60 * 60;

/**
 * Possible statuses for an AutomationJob.
 */
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

/**
 * Outcome of one product within a run.
 */
export interface ProductRunResult {
    rowIndex: number;
    productName: string;
    videoId: string;
    outcomes: PublishOutcomes;
}

/**
 * Summary stored on a completed job.
 */
export interface JobResult {
    message: string;
    productsProcessed: number;
    products: ProductRunResult[];
}

/**
 * AutomationJob is one externally observable run of the executor.
 * It exists for status polling only; failed jobs are never resumed.
 */
export interface AutomationJob {
    jobId: string;
    profileId: string;
    config: AutomationConfig;
    status: JobStatus;
    /** ISO timestamps */
    createdAt: string;
    startedAt: string | null;
    completedAt: string | null;
    /** Failure message when status is failed */
    error: string | null;
    /** Run summary when status is completed */
    result: JobResult | null;
}

export function createAutomationJob(
    jobId: string,
    profileId: string,
    config: AutomationConfig,
    now: Date = new Date()
): AutomationJob {
    if (!jobId.trim()) {
        throw new Error('AutomationJob id cannot be empty');
    }
    if (!profileId.trim()) {
        throw new Error('AutomationJob profileId cannot be empty');
    }

    return {
        jobId: jobId.trim(),
        profileId: profileId.trim(),
        config,
        status: 'pending',
        createdAt: now.toISOString(),
        startedAt: null,
        completedAt: null,
        error: null,
        result: null,
    };
}

function assertStatus(job: AutomationJob, expected: JobStatus, next: JobStatus): void {
    if (job.status !== expected) {
        throw new JobTransitionError(job.jobId, job.status, next);
    }
}

/**
 * pending -> running
 */
export function startJob(job: AutomationJob, now: Date = new Date()): AutomationJob {
    assertStatus(job, 'pending', 'running');
    return {
        ...job,
        status: 'running',
        startedAt: now.toISOString(),
    };
}

/**
 * running -> completed
 */
export function completeJob(job: AutomationJob, result: JobResult, now: Date = new Date()): AutomationJob {
    assertStatus(job, 'running', 'completed');
    return {
        ...job,
        status: 'completed',
        completedAt: now.toISOString(),
        error: null,
        result,
    };
}

/**
 * running -> failed
 */
export function failJob(job: AutomationJob, error: string, now: Date = new Date()): AutomationJob {
    assertStatus(job, 'running', 'failed');
    return {
        ...job,
        status: 'failed',
        completedAt: now.toISOString(),
        error,
        result: null,
    };
}

/**
 * Checks if a job is in a terminal state.
 */
export function isJobTerminal(job: AutomationJob): boolean {
    return job.status === 'completed' || job.status === 'failed';
}

/**
 * True once a finished job has outlived the retention window.
 */
export function isJobExpired(job: AutomationJob, now: Date): boolean {
    if (!isJobTerminal(job) || !job.completedAt) {
        return false;
    }
    return now.getTime() - Date.parse(job.completedAt) > JOB_RETENTION_SECONDS * 1000;
}

const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'completed', 'failed'];

/**
 * Shape check for job records read back from storage.
 */
export function isAutomationJob(value: unknown): value is AutomationJob {
    if (typeof value !== 'object' || value === null || !('status' in value)) {
        return false;
    }
    const recordStatus = value.status;
    return (
        JOB_STATUSES.some(status => status === recordStatus) &&
        'jobId' in value && typeof value.jobId === 'string' &&
        'profileId' in value && typeof value.profileId === 'string' &&
        'createdAt' in value && typeof value.createdAt === 'string' &&
        'config' in value && typeof value.config === 'object' && value.config !== null
    );
}

/**
 * Sort comparator: most recently created first.
 */
export function compareNewestFirst(a: AutomationJob, b: AutomationJob): number {
    if (a.createdAt === b.createdAt) return 0;
    return a.createdAt < b.createdAt ? 1 : -1;
}
