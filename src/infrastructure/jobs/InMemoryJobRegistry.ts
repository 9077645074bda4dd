import { v4 as uuidv4 } from 'uuid';
import { IJobRegistry } from '../../domain/ports/IJobRegistry';
import { AutomationConfig } from '../../domain/entities/AutomationConfig';
import {
    AutomationJob,
    JobResult,
    compareNewestFirst,
    completeJob,
    createAutomationJob,
    failJob,
    isJobExpired,
    startJob,
} from '../../domain/entities/AutomationJob';
import { JobNotFoundError } from '../../domain/errors';

export interface JobRegistryOptions {
    now?: () => Date;
    generateId?: () => string;
}

/**
 * Process-local job registry. Records are lost on restart; finished jobs are dropped
 * once they pass the retention window.
 */
export class InMemoryJobRegistry implements IJobRegistry {
    private readonly jobs = new Map<string, AutomationJob>();
    private readonly now: () => Date;
    private readonly generateId: () => string;

    constructor(options: JobRegistryOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.generateId = options.generateId ?? uuidv4;
    }

    async submit(profileId: string, config: AutomationConfig): Promise<AutomationJob> {
        this.pruneExpired();
        const job = createAutomationJob(this.generateId(), profileId, config, this.now());
        this.jobs.set(job.jobId, job);
        return job;
    }

    async start(jobId: string): Promise<AutomationJob> {
        return this.replace(jobId, job => startJob(job, this.now()));
    }

    async complete(jobId: string, result: JobResult): Promise<AutomationJob> {
        return this.replace(jobId, job => completeJob(job, result, this.now()));
    }

    async fail(jobId: string, error: string): Promise<AutomationJob> {
        return this.replace(jobId, job => failJob(job, error, this.now()));
    }

    async get(jobId: string): Promise<AutomationJob | null> {
        return this.jobs.get(jobId) ?? null;
    }

    async list(): Promise<AutomationJob[]> {
        this.pruneExpired();
        return Array.from(this.jobs.values()).reverse().sort(compareNewestFirst);
    }

    private pruneExpired(): void {
        const now = this.now();
        for (const [jobId, job] of this.jobs) {
            if (isJobExpired(job, now)) {
                this.jobs.delete(jobId);
            }
        }
    }

    private replace(jobId: string, transition: (job: AutomationJob) => AutomationJob): AutomationJob {
        const job = this.jobs.get(jobId);
        if (!job) {
            throw new JobNotFoundError(jobId);
        }
        const updated = transition(job);
        this.jobs.set(jobId, updated);
        return updated;
    }
}
