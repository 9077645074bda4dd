import dotenv from 'dotenv';
import { AutomationConfig, DEFAULT_SCHEDULE_TIMES, SCHEDULE_TYPES, ScheduleType } from '../domain/entities/AutomationConfig';

// Load environment variables
dotenv.config();

export type SecretSource = 'env' | 'gcp';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Automation defaults (used when a request or the scheduler carries no config)
    gcpProjectId: string;
    spreadsheetId: string;
    productsPerRun: number;

    // Secrets
    secretSource: SecretSource;

    // Run state
    stateFilePath: string;
    videoOutputDir: string;
    interProductDelayMs: number;

    // Vendors
    openaiModel: string;
    heygenAvatarId: string;
    heygenVoiceId: string;
    heygenMaxWaitMs: number;

    // Redis (job records)
    redisUrl?: string;

    // Scheduler
    scheduleType: ScheduleType;
    scheduleTime: string;
    scheduleIntervalHours: number;
    scheduleTimes: string[];
    scheduleTimezone?: string;
    runOnStart: boolean;
}

export function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

export function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

export function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value || undefined;
}

function parseSecretSource(value: string): SecretSource {
    return value.toLowerCase() === 'env' ? 'env' : 'gcp';
}

function parseScheduleType(value: string): ScheduleType {
    const match = SCHEDULE_TYPES.find(type => type === value.toLowerCase());
    return match ?? 'daily';
}

function parseTimeList(value: string): string[] {
    return value
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 8080),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Automation defaults
        gcpProjectId: getEnvVar('GCP_PROJECT_ID', ''),
        spreadsheetId: getEnvVar('SPREADSHEET_ID', ''),
        productsPerRun: getEnvVarNumber('PRODUCTS_PER_RUN', 1),

        // Secrets
        secretSource: parseSecretSource(getEnvVar('SECRET_SOURCE', 'gcp')),

        // Run state
        stateFilePath: getEnvVar('STATE_FILE_PATH', './data/automation_state.json'),
        videoOutputDir: getEnvVar('VIDEO_OUTPUT_DIR', './data/videos'),
        interProductDelayMs: getEnvVarNumber('INTER_PRODUCT_DELAY_MS', 60000),

        // Vendors
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4-turbo-preview'),
        heygenAvatarId: getEnvVar('HEYGEN_AVATAR_ID', 'default_avatar'),
        heygenVoiceId: getEnvVar('HEYGEN_VOICE_ID', 'en-US-JennyNeural'),
        heygenMaxWaitMs: getEnvVarNumber('HEYGEN_MAX_WAIT_MS', 600000),

        // Redis
        redisUrl: getOptionalEnvVar('REDIS_URL'),

        // Scheduler
        scheduleType: parseScheduleType(getEnvVar('SCHEDULE_TYPE', 'daily')),
        scheduleTime: getEnvVar('SCHEDULE_TIME', '09:00'),
        scheduleIntervalHours: getEnvVarNumber('SCHEDULE_INTERVAL_HOURS', 4),
        scheduleTimes: parseTimeList(getEnvVar('SCHEDULE_TIMES', DEFAULT_SCHEDULE_TIMES.join(','))),
        scheduleTimezone: getOptionalEnvVar('SCHEDULE_TIMEZONE'),
        runOnStart: getEnvVarBoolean('RUN_ON_START', false),
    };
}

/**
 * Checks values that would otherwise only fail at run time.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.port) || config.port <= 0) {
        errors.push('PORT must be a positive integer');
    }
    if (!Number.isInteger(config.productsPerRun) || config.productsPerRun < 1) {
        errors.push('PRODUCTS_PER_RUN must be an integer >= 1');
    }
    if (config.interProductDelayMs < 0) {
        errors.push('INTER_PRODUCT_DELAY_MS cannot be negative');
    }
    if (config.heygenMaxWaitMs <= 0) {
        errors.push('HEYGEN_MAX_WAIT_MS must be positive');
    }
    if (!config.stateFilePath) {
        errors.push('STATE_FILE_PATH cannot be empty');
    }

    return errors;
}

/**
 * Automation options derived from the environment.
 * Request and scheduler configs are layered on top of these.
 */
export function defaultAutomationConfig(config: Config = getConfig()): AutomationConfig {
    return {
        gcpProjectId: config.gcpProjectId,
        spreadsheetId: config.spreadsheetId,
        productsPerRun: config.productsPerRun,
        scheduleType: config.scheduleType,
        scheduleTime: config.scheduleTime,
        scheduleIntervalHours: config.scheduleIntervalHours,
        scheduleTimes: [...config.scheduleTimes],
        runOnStart: config.runOnStart,
    };
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
