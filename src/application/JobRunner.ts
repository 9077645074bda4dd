import { IJobRegistry } from '../domain/ports/IJobRegistry';
import { AutomationConfig } from '../domain/entities/AutomationConfig';
import { AutomationJob, JobResult } from '../domain/entities/AutomationJob';
import { JobNotFoundError, getErrorMessage } from '../domain/errors';
import { RunSummary } from './RunExecutor';

export const COMPLETED_MESSAGE = 'Automation completed successfully';

/**
 * Something that runs `processCount` products.
 */
export interface Runnable {
    run(processCount: number): Promise<RunSummary>;
}

/**
 * Builds the collaborators for one run. Secret lookups happen here, so a missing
 * credential fails the job rather than the submission.
 */
export type RunFactory = (config: AutomationConfig) => Promise<Runnable>;

/**
 * Registers jobs and drives each one through its lifecycle in the background.
 */
export class JobRunner {
    private readonly inFlight = new Map<string, Promise<void>>();

    constructor(
        private readonly registry: IJobRegistry,
        private readonly createRun: RunFactory
    ) { }

    /**
     * Registers a pending job and starts it without waiting for the outcome.
     */
    async submit(profileId: string, config: AutomationConfig): Promise<AutomationJob> {
        const job = await this.registry.submit(profileId, config);
        console.log(`[JobRunner] Job ${job.jobId} submitted for profile ${job.profileId}`);

        const task = this.execute(job.jobId, config).finally(() => {
            this.inFlight.delete(job.jobId);
        });
        this.inFlight.set(job.jobId, task);
        return job;
    }

    /**
     * Submits a job and resolves with its terminal record.
     */
    async runNow(profileId: string, config: AutomationConfig): Promise<AutomationJob> {
        const job = await this.submit(profileId, config);
        await this.inFlight.get(job.jobId);

        const finished = await this.registry.get(job.jobId);
        if (!finished) {
            throw new JobNotFoundError(job.jobId);
        }
        return finished;
    }

    /**
     * Resolves once every in-flight job has settled.
     */
    async waitForIdle(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled(Array.from(this.inFlight.values()));
        }
    }

    get activeJobCount(): number {
        return this.inFlight.size;
    }

    private async execute(jobId: string, config: AutomationConfig): Promise<void> {
        try {
            await this.registry.start(jobId);
            console.log(`[JobRunner] Job ${jobId} running (${config.productsPerRun} product(s))`);

            const runner = await this.createRun(config);
            const summary = await runner.run(config.productsPerRun);

            const result: JobResult = {
                message: COMPLETED_MESSAGE,
                productsProcessed: summary.productsProcessed,
                products: summary.products,
            };
            await this.registry.complete(jobId, result);
            console.log(`[JobRunner] ✅ Job ${jobId} completed (${summary.productsProcessed} product(s))`);
        } catch (error) {
            const message = getErrorMessage(error);
            console.error(`[JobRunner] ❌ Job ${jobId} failed: ${message}`);
            try {
                await this.registry.fail(jobId, message);
            } catch (recordError) {
                console.error(`[JobRunner] Could not record failure for job ${jobId}:`, getErrorMessage(recordError));
            }
        }
    }
}
