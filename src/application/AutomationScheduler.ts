import cron from 'node-cron';
import { AutomationConfig } from '../domain/entities/AutomationConfig';
import { ConfigurationError, getErrorMessage } from '../domain/errors';

export interface CronHandle {
    stop(): void;
}

export type CronScheduleFn = (
    expression: string,
    onTick: () => void,
    options: { timezone?: string }
) => CronHandle;

export interface AutomationSchedulerOptions {
    timezone?: string;
    schedule?: CronScheduleFn;
}

const defaultSchedule: CronScheduleFn = (expression, onTick, options) =>
    cron.schedule(expression, onTick, options);

function parseTime(time: string): { hour: number; minute: number } {
    const match = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
    const hour = match ? Number(match[1]) : NaN;
    const minute = match ? Number(match[2]) : NaN;
    if (!(hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59)) {
        throw new ConfigurationError(`Invalid schedule time: ${time}`);
    }
    return { hour, minute };
}

function dailyAt(time: string): string {
    const { hour, minute } = parseTime(time);
    return `${minute} ${hour} * * *`;
}

/**
 * Cron expressions for the configured cadence.
 */
export function buildCronExpressions(config: AutomationConfig): string[] {
    switch (config.scheduleType) {
        case 'daily':
            return [dailyAt(config.scheduleTime)];
        case 'hourly':
            return ['0 * * * *'];
        case 'every_n_hours': {
            const hours = config.scheduleIntervalHours;
            if (!Number.isInteger(hours) || hours < 1 || hours > 23) {
                throw new ConfigurationError(`scheduleIntervalHours must be between 1 and 23, got: ${hours}`);
            }
            return [`0 */${hours} * * *`];
        }
        case 'custom':
            if (config.scheduleTimes.length === 0) {
                throw new ConfigurationError('A custom schedule needs at least one time');
            }
            return config.scheduleTimes.map(dailyAt);
    }
}

/**
 * Fires a run on each cron tick. A tick that arrives while a run is still going is skipped,
 * and a failed run is logged without stopping the schedule.
 */
export class AutomationScheduler {
    private readonly handles: CronHandle[] = [];
    private readonly schedule: CronScheduleFn;
    private current: Promise<void> | null = null;

    constructor(
        private readonly config: AutomationConfig,
        private readonly runOnce: () => Promise<void>,
        private readonly options: AutomationSchedulerOptions = {}
    ) {
        this.schedule = options.schedule ?? defaultSchedule;
    }

    /**
     * Registers the cron tasks and returns their expressions.
     */
    start(): string[] {
        const expressions = buildCronExpressions(this.config);
        for (const expression of expressions) {
            this.handles.push(
                this.schedule(expression, () => {
                    this.tick().catch((error: unknown) => {
                        console.error('[Scheduler] Tick failed:', getErrorMessage(error));
                    });
                }, { timezone: this.options.timezone })
            );
            console.log(`[Scheduler] Registered ${this.config.scheduleType} schedule: ${expression}`);
        }

        if (this.config.runOnStart) {
            console.log('[Scheduler] Running immediately on startup');
            this.tick().catch((error: unknown) => {
                console.error('[Scheduler] Startup run failed:', getErrorMessage(error));
            });
        }
        return expressions;
    }

    stop(): void {
        for (const handle of this.handles.splice(0)) {
            handle.stop();
        }
        console.log('[Scheduler] Stopped');
    }

    get isRunning(): boolean {
        return this.current !== null;
    }

    /**
     * Runs once unless a run is already in flight. Never rejects because of the run itself.
     */
    async tick(): Promise<void> {
        if (this.current) {
            console.warn('[Scheduler] Previous run still in progress, skipping this tick');
            return;
        }

        this.current = this.runSafely();
        try {
            await this.current;
        } finally {
            this.current = null;
        }
    }

    /**
     * Resolves when the in-flight run, if any, has finished.
     */
    async waitForIdle(): Promise<void> {
        if (this.current) {
            await this.current;
        }
    }

    private async runSafely(): Promise<void> {
        console.log(`[Scheduler] Scheduled run started at ${new Date().toISOString()}`);
        try {
            await this.runOnce();
            console.log('[Scheduler] ✅ Scheduled run finished');
        } catch (error) {
            console.error('[Scheduler] ❌ Scheduled run failed:', getErrorMessage(error));
        }
    }
}
