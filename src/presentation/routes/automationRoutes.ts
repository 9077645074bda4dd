import { Router, Request, Response } from 'express';
import { JobRunner } from '../../application/JobRunner';
import { IJobRegistry } from '../../domain/ports/IJobRegistry';
import { AutomationConfig } from '../../domain/entities/AutomationConfig';
import {
    assertAutomationConfig,
    loadAutomationConfigFile,
    parseAutomationConfig,
    parseAutomationConfigYaml,
} from '../../config/automationConfig';
import { asyncHandler, BadRequestError, NotFoundError } from '../middleware/errorHandler';

export interface AutomationRouteDeps {
    jobRunner: JobRunner;
    registry: IJobRegistry;
    /** Options used when a request carries no config of its own */
    defaults: () => AutomationConfig;
}

function readField(body: unknown, ...keys: string[]): unknown {
    if (typeof body !== 'object' || body === null) {
        return undefined;
    }
    for (const key of keys) {
        const value: unknown = Reflect.get(body, key);
        if (value !== undefined && value !== null) {
            return value;
        }
    }
    return undefined;
}

/**
 * Resolves the request's options: inline YAML or object first, then a YAML file path,
 * then the environment defaults.
 */
async function resolveConfig(body: unknown, defaults: AutomationConfig): Promise<AutomationConfig> {
    const inline = readField(body, 'config');
    if (typeof inline === 'string') {
        return parseAutomationConfigYaml(inline, defaults);
    }
    if (inline !== undefined) {
        return parseAutomationConfig(inline, defaults);
    }

    const configPath = readField(body, 'configPath', 'config_path');
    if (configPath !== undefined) {
        if (typeof configPath !== 'string' || !configPath.trim()) {
            throw new BadRequestError('configPath must be a non-empty string');
        }
        return loadAutomationConfigFile(configPath.trim(), defaults);
    }

    assertAutomationConfig(defaults);
    return defaults;
}

/**
 * Creates automation run and job status routes with dependency injection.
 */
export function createAutomationRoutes(deps: AutomationRouteDeps): Router {
    const router = Router();

    /**
     * POST /run
     *
     * Starts an automation job in the background and returns its id.
     */
    router.post(
        '/run',
        asyncHandler(async (req: Request, res: Response) => {
            const body: unknown = req.body;
            const profileId = readField(body, 'profileId', 'profile_id');
            if (typeof profileId !== 'string' || !profileId.trim()) {
                throw new BadRequestError('profileId is required');
            }

            const config = await resolveConfig(body, deps.defaults());
            const job = await deps.jobRunner.submit(profileId.trim(), config);

            res.status(202).json({
                jobId: job.jobId,
                status: job.status,
                statusUrl: `/status/${job.jobId}`,
            });
        })
    );

    /**
     * GET /status/:jobId
     *
     * Returns the full job record.
     */
    router.get(
        '/status/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            const job = await deps.registry.get(jobId);

            if (!job) {
                throw new NotFoundError(`Job not found: ${jobId}`);
            }
            res.json(job);
        })
    );

    /**
     * GET /jobs
     *
     * Lists all jobs, newest first (for monitoring).
     */
    router.get(
        '/jobs',
        asyncHandler(async (_req: Request, res: Response) => {
            const jobs = await deps.registry.list();

            const summaries = jobs.map((job) => ({
                jobId: job.jobId,
                profileId: job.profileId,
                status: job.status,
                createdAt: job.createdAt,
                completedAt: job.completedAt,
                error: job.error,
            }));

            res.json({ total: summaries.length, jobs: summaries });
        })
    );

    return router;
}
