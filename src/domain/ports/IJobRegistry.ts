import { AutomationConfig } from '../entities/AutomationConfig';
import { AutomationJob, JobResult } from '../entities/AutomationJob';

/**
 * Port for job lifecycle tracking.
 * Mutations replace the whole record, so concurrent readers never observe a partial update.
 */
export interface IJobRegistry {
    /**
     * Registers a new pending job with a fresh id.
     */
    submit(profileId: string, config: AutomationConfig): Promise<AutomationJob>;

    /** pending -> running */
    start(jobId: string): Promise<AutomationJob>;

    /** running -> completed */
    complete(jobId: string, result: JobResult): Promise<AutomationJob>;

    /** running -> failed */
    fail(jobId: string, error: string): Promise<AutomationJob>;

    get(jobId: string): Promise<AutomationJob | null>;

    /**
     * Returns all known jobs, newest first.
     */
    list(): Promise<AutomationJob[]>;
}
