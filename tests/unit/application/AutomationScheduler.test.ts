import {
    AutomationScheduler,
    CronHandle,
    CronScheduleFn,
    buildCronExpressions,
} from '../../../src/application/AutomationScheduler';
import { AutomationConfig } from '../../../src/domain/entities/AutomationConfig';
import { ConfigurationError } from '../../../src/domain/errors';
import { silenceConsole } from './fakes';

const base: AutomationConfig = {
    gcpProjectId: 'test-project',
    spreadsheetId: 'test-sheet',
    productsPerRun: 1,
    scheduleType: 'daily',
    scheduleTime: '09:00',
    scheduleIntervalHours: 4,
    scheduleTimes: ['09:00', '15:00', '21:00'],
    runOnStart: false,
};

interface Registered {
    expression: string;
    onTick: () => void;
    timezone?: string;
    handle: CronHandle & { stop: jest.Mock };
}

function fakeSchedule(): { schedule: CronScheduleFn; registered: Registered[] } {
    const registered: Registered[] = [];
    const schedule: CronScheduleFn = (expression, onTick, options) => {
        const handle = { stop: jest.fn() };
        registered.push({ expression, onTick, timezone: options.timezone, handle });
        return handle;
    };
    return { schedule, registered };
}

describe('buildCronExpressions', () => {
    it('should run daily at the configured time', () => {
        expect(buildCronExpressions({ ...base, scheduleTime: '7:05' })).toEqual(['5 7 * * *']);
    });

    it('should run at the top of every hour', () => {
        expect(buildCronExpressions({ ...base, scheduleType: 'hourly' })).toEqual(['0 * * * *']);
    });

    it('should run every N hours', () => {
        expect(buildCronExpressions({ ...base, scheduleType: 'every_n_hours', scheduleIntervalHours: 6 }))
            .toEqual(['0 */6 * * *']);
    });

    it('should register one expression per custom time', () => {
        expect(buildCronExpressions({ ...base, scheduleType: 'custom' }))
            .toEqual(['0 9 * * *', '0 15 * * *', '0 21 * * *']);
    });

    it('should reject invalid schedules', () => {
        expect(() => buildCronExpressions({ ...base, scheduleTime: '24:00' })).toThrow('Invalid schedule time: 24:00');
        expect(() => buildCronExpressions({ ...base, scheduleType: 'every_n_hours', scheduleIntervalHours: 0 }))
            .toThrow(ConfigurationError);
        expect(() => buildCronExpressions({ ...base, scheduleType: 'custom', scheduleTimes: [] }))
            .toThrow('A custom schedule needs at least one time');
    });
});

describe('AutomationScheduler', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should register its cron tasks with the timezone', () => {
        const { schedule, registered } = fakeSchedule();
        const scheduler = new AutomationScheduler(
            { ...base, scheduleType: 'custom', scheduleTimes: ['08:30', '18:00'] },
            jest.fn().mockResolvedValue(undefined),
            { schedule, timezone: 'Europe/Berlin' }
        );

        expect(scheduler.start()).toEqual(['30 8 * * *', '0 18 * * *']);
        expect(registered.map(r => r.expression)).toEqual(['30 8 * * *', '0 18 * * *']);
        expect(registered.every(r => r.timezone === 'Europe/Berlin')).toBe(true);
    });

    it('should run when a tick fires', async () => {
        const { schedule, registered } = fakeSchedule();
        const runOnce = jest.fn().mockResolvedValue(undefined);
        const scheduler = new AutomationScheduler(base, runOnce, { schedule });

        scheduler.start();
        registered[0].onTick();
        await scheduler.waitForIdle();

        expect(runOnce).toHaveBeenCalledTimes(1);
        expect(scheduler.isRunning).toBe(false);
    });

    it('should skip a tick while the previous run is in flight', async () => {
        let finish: () => void = () => { };
        const runOnce = jest.fn(() => new Promise<void>(resolve => {
            finish = resolve;
        }));
        const scheduler = new AutomationScheduler(base, runOnce, { schedule: fakeSchedule().schedule });

        const first = scheduler.tick();
        await scheduler.tick();

        expect(runOnce).toHaveBeenCalledTimes(1);
        expect(console.warn).toHaveBeenCalledWith('[Scheduler] Previous run still in progress, skipping this tick');

        finish();
        await first;
        await scheduler.tick();
        expect(runOnce).toHaveBeenCalledTimes(2);
    });

    it('should keep going after a failed run', async () => {
        const runOnce = jest.fn()
            .mockRejectedValueOnce(new Error('Secret not found: heygen_api_key'))
            .mockResolvedValueOnce(undefined);
        const scheduler = new AutomationScheduler(base, runOnce, { schedule: fakeSchedule().schedule });

        await expect(scheduler.tick()).resolves.toBeUndefined();
        await expect(scheduler.tick()).resolves.toBeUndefined();

        expect(runOnce).toHaveBeenCalledTimes(2);
        expect(console.error).toHaveBeenCalledWith('[Scheduler] ❌ Scheduled run failed:', 'Secret not found: heygen_api_key');
    });

    it('should run immediately when runOnStart is set', async () => {
        const runOnce = jest.fn().mockResolvedValue(undefined);
        const scheduler = new AutomationScheduler({ ...base, runOnStart: true }, runOnce, {
            schedule: fakeSchedule().schedule,
        });

        scheduler.start();
        await scheduler.waitForIdle();

        expect(runOnce).toHaveBeenCalledTimes(1);
    });

    it('should stop every registered task', () => {
        const { schedule, registered } = fakeSchedule();
        const scheduler = new AutomationScheduler({ ...base, scheduleType: 'custom' }, jest.fn(), { schedule });

        scheduler.start();
        scheduler.stop();

        expect(registered).toHaveLength(3);
        registered.forEach(r => expect(r.handle.stop).toHaveBeenCalledTimes(1));
    });
});
