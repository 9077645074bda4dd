export type ScheduleType = 'daily' | 'hourly' | 'every_n_hours' | 'custom';

export const SCHEDULE_TYPES: readonly ScheduleType[] = ['daily', 'hourly', 'every_n_hours', 'custom'];

/**
 * Options for one automation profile. Submitted with a job or read by the scheduler.
 */
export interface AutomationConfig {
    gcpProjectId: string;
    spreadsheetId: string;
    /** Products handled per run (>= 1) */
    productsPerRun: number;
    scheduleType: ScheduleType;
    /** HH:MM, used by the daily schedule */
    scheduleTime: string;
    /** Used by the every_n_hours schedule */
    scheduleIntervalHours: number;
    /** HH:MM list, used by the custom schedule */
    scheduleTimes: string[];
    runOnStart: boolean;
}

export const DEFAULT_SCHEDULE_TIMES: readonly string[] = ['09:00', '15:00', '21:00'];
