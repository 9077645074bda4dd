import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config, defaultAutomationConfig } from '../config';
import { JobRunner } from '../application/JobRunner';
import { IJobRegistry } from '../domain/ports/IJobRegistry';
import { AutomationConfig } from '../domain/entities/AutomationConfig';
import { FileCursorStore } from '../infrastructure/state/FileCursorStore';
import { InMemoryJobRegistry } from '../infrastructure/jobs/InMemoryJobRegistry';
import { createRedisJobRegistry } from '../infrastructure/jobs/RedisJobRegistry';
import { AutomationFactory } from '../infrastructure/AutomationFactory';
import { createAutomationRoutes } from './routes/automationRoutes';
import { errorHandler } from './middleware/errorHandler';

export const SERVICE_NAME = 'product-video-automation';
export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
    jobRunner: JobRunner;
    registry: IJobRegistry;
    defaults: () => AutomationConfig;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(deps: AppDependencies): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    // Service info
    app.get('/', (_req: Request, res: Response) => {
        res.json({
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
            description: 'Turns spreadsheet products into avatar videos and posts them to social platforms',
            endpoints: {
                'GET /health': 'Health check',
                'POST /run': 'Start an automation job',
                'GET /status/:jobId': 'Job status',
                'GET /jobs': 'List jobs',
            },
        });
    });

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
        });
    });

    // Routes
    app.use(createAutomationRoutes(deps));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

export interface ServiceDependencies extends AppDependencies {
    cursorStore: FileCursorStore;
    factory: AutomationFactory;
}

/**
 * Wires the production collaborators from configuration.
 */
export function createDependencies(config: Config): ServiceDependencies {
    const cursorStore = new FileCursorStore(config.stateFilePath);
    console.log(`📍 Cursor state: ${cursorStore.filePath}`);

    let registry: IJobRegistry;
    if (config.redisUrl) {
        registry = createRedisJobRegistry(config.redisUrl);
        console.log('✅ Job records: Redis');
    } else {
        registry = new InMemoryJobRegistry();
        console.log('⚠️  REDIS_URL not set. Job records are kept in memory.');
    }

    const factory = new AutomationFactory({
        settings: {
            videoOutputDir: config.videoOutputDir,
            interProductDelayMs: config.interProductDelayMs,
            openaiModel: config.openaiModel,
            heygenAvatarId: config.heygenAvatarId,
            heygenVoiceId: config.heygenVoiceId,
            heygenMaxWaitMs: config.heygenMaxWaitMs,
            secretSource: config.secretSource,
        },
        cursorStore,
    });
    console.log(`🔐 Secrets: ${config.secretSource === 'env' ? 'environment variables' : 'Google Secret Manager'}`);

    const jobRunner = new JobRunner(registry, (automationConfig) => factory.createRun(automationConfig));

    return {
        jobRunner,
        registry,
        cursorStore,
        factory,
        defaults: () => defaultAutomationConfig(config),
    };
}
