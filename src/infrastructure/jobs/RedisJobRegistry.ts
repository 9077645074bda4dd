import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { IJobRegistry } from '../../domain/ports/IJobRegistry';
import { AutomationConfig } from '../../domain/entities/AutomationConfig';
import {
    AutomationJob,
    JOB_RETENTION_SECONDS,
    JobResult,
    completeJob,
    createAutomationJob,
    failJob,
    isAutomationJob,
    startJob,
} from '../../domain/entities/AutomationJob';
import { JobNotFoundError, getErrorMessage } from '../../domain/errors';
import { Semaphore } from '../concurrency/Semaphore';
import { JobRegistryOptions } from './InMemoryJobRegistry';

const JOB_KEY_PREFIX = 'automation:job:';
const JOB_INDEX_KEY = 'automation:jobs';

/**
 * The Redis commands the registry uses.
 */
export interface JobStoreClient {
    get(key: string): Promise<string | null>;
    setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
    zadd(key: string, score: number, member: string): Promise<void>;
    zrevrange(key: string, start: number, stop: number): Promise<string[]>;
    zremrangebyscore(key: string, min: number, max: number): Promise<void>;
    quit(): Promise<void>;
}

/**
 * Job registry persisted in Redis so job history survives restarts.
 *
 * Each job is one JSON value under `automation:job:<id>` with a 7 day TTL.
 * The sorted set `automation:jobs` indexes ids by creation time.
 */
export class RedisJobRegistry implements IJobRegistry {
    private readonly now: () => Date;
    private readonly generateId: () => string;
    private readonly lock = new Semaphore(1);

    constructor(private readonly client: JobStoreClient, options: JobRegistryOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.generateId = options.generateId ?? uuidv4;
    }

    async submit(profileId: string, config: AutomationConfig): Promise<AutomationJob> {
        const job = createAutomationJob(this.generateId(), profileId, config, this.now());
        await this.lock.runExclusive(async () => {
            await this.write(job);
            await this.client.zadd(JOB_INDEX_KEY, Date.parse(job.createdAt), job.jobId);
        });
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
        const data = await this.client.get(`${JOB_KEY_PREFIX}${jobId}`);
        if (!data) {
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(data);
        } catch (error) {
            console.error(`[JobRegistry] Discarding unreadable record ${jobId}:`, getErrorMessage(error));
            return null;
        }
        return isAutomationJob(parsed) ? parsed : null;
    }

    async list(): Promise<AutomationJob[]> {
        const expiredBefore = this.now().getTime() - JOB_RETENTION_SECONDS * 1000;
        await this.client.zremrangebyscore(JOB_INDEX_KEY, 0, expiredBefore);

        const ids = await this.client.zrevrange(JOB_INDEX_KEY, 0, -1);
        const jobs = await Promise.all(ids.map(id => this.get(id)));
        return jobs.filter((job): job is AutomationJob => job !== null);
    }

    async disconnect(): Promise<void> {
        await this.client.quit();
    }

    private async replace(
        jobId: string,
        transition: (job: AutomationJob) => AutomationJob
    ): Promise<AutomationJob> {
        return this.lock.runExclusive(async () => {
            const job = await this.get(jobId);
            if (!job) {
                throw new JobNotFoundError(jobId);
            }
            const updated = transition(job);
            await this.write(updated);
            return updated;
        });
    }

    private async write(job: AutomationJob): Promise<void> {
        await this.client.setWithTtl(`${JOB_KEY_PREFIX}${job.jobId}`, JSON.stringify(job), JOB_RETENTION_SECONDS);
    }
}

/**
 * Connects to Redis at `redisUrl` and returns a registry on top of it.
 */
export function createRedisJobRegistry(redisUrl: string): RedisJobRegistry {
    const redis = new Redis(redisUrl, {
        retryStrategy: (times) => Math.min(times * 50, 2000),
        maxRetriesPerRequest: 3,
    });

    redis.on('error', (err) => {
        console.error('[JobRegistry] Redis error:', getErrorMessage(err));
    });

    const client: JobStoreClient = {
        get: (key) => redis.get(key),
        setWithTtl: async (key, value, ttlSeconds) => {
            await redis.set(key, value, 'EX', ttlSeconds);
        },
        zadd: async (key, score, member) => {
            await redis.zadd(key, score, member);
        },
        zrevrange: (key, start, stop) => redis.zrevrange(key, start, stop),
        zremrangebyscore: async (key, min, max) => {
            await redis.zremrangebyscore(key, min, max);
        },
        quit: async () => {
            await redis.quit();
        },
    };

    return new RedisJobRegistry(client);
}
