import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { AutomationConfig, SCHEDULE_TYPES, ScheduleType } from '../domain/entities/AutomationConfig';
import { ConfigFileNotFoundError, ConfigurationError, getErrorMessage } from '../domain/errors';

const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

type RawOptions = Record<string, unknown>;

function isRawOptions(value: unknown): value is RawOptions {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSnakeCase(key: string): string {
    return key.replace(/[A-Z]/g, letter => `_${letter.toLowerCase()}`);
}

/** Reads `key` in camelCase first, then snake_case. */
function pick(raw: RawOptions, key: keyof AutomationConfig): unknown {
    if (raw[key] !== undefined && raw[key] !== null) {
        return raw[key];
    }
    const snake = raw[toSnakeCase(key)];
    return snake === null ? undefined : snake;
}

function readString(raw: RawOptions, key: keyof AutomationConfig, fallback: string): string {
    const value = pick(raw, key);
    if (value === undefined) return fallback;
    if (typeof value === 'number') return String(value);
    if (typeof value !== 'string') {
        throw new ConfigurationError(`${key} must be a string`);
    }
    return value.trim();
}

function readInteger(raw: RawOptions, key: keyof AutomationConfig, fallback: number): number {
    const value = pick(raw, key);
    if (value === undefined) return fallback;
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
        throw new ConfigurationError(`${key} must be an integer`);
    }
    return parsed;
}

function readBoolean(raw: RawOptions, key: keyof AutomationConfig, fallback: boolean): boolean {
    const value = pick(raw, key);
    if (value === undefined) return fallback;
    if (typeof value === 'boolean') return value;
    if (value === 'true' || value === 'false') return value === 'true';
    throw new ConfigurationError(`${key} must be a boolean`);
}

function readTime(raw: RawOptions, key: keyof AutomationConfig, fallback: string): string {
    const value = readString(raw, key, fallback);
    assertTime(key, value);
    return value;
}

function readTimeList(raw: RawOptions, key: keyof AutomationConfig, fallback: string[]): string[] {
    const value = pick(raw, key);
    if (value === undefined) return [...fallback];

    let items: unknown[];
    if (typeof value === 'string') {
        items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
    } else if (Array.isArray(value)) {
        items = value;
    } else {
        throw new ConfigurationError(`${key} must be a list of HH:MM times`);
    }

    return items.map(item => {
        if (typeof item !== 'string') {
            throw new ConfigurationError(`${key} must be a list of HH:MM times`);
        }
        const time = item.trim();
        assertTime(key, time);
        return time;
    });
}

function readScheduleType(raw: RawOptions, fallback: ScheduleType): ScheduleType {
    const value = readString(raw, 'scheduleType', fallback).toLowerCase();
    const match = SCHEDULE_TYPES.find(type => type === value);
    if (!match) {
        throw new ConfigurationError(
            `scheduleType must be one of ${SCHEDULE_TYPES.join(', ')}, got: ${value}`
        );
    }
    return match;
}

function assertTime(key: string, value: string): void {
    if (!TIME_PATTERN.test(value)) {
        throw new ConfigurationError(`${key} must be HH:MM, got: ${value}`);
    }
}

/**
 * Builds an AutomationConfig from loosely typed input (request body, parsed YAML),
 * layering it over `defaults`. Keys may be camelCase or snake_case.
 *
 * @throws ConfigurationError when a value has the wrong type or range
 */
export function parseAutomationConfig(raw: unknown, defaults: AutomationConfig): AutomationConfig {
    if (raw === undefined || raw === null) {
        raw = {};
    }
    if (!isRawOptions(raw)) {
        throw new ConfigurationError('Automation config must be a mapping of options');
    }

    const config: AutomationConfig = {
        gcpProjectId: readString(raw, 'gcpProjectId', defaults.gcpProjectId) || defaults.gcpProjectId,
        spreadsheetId: readString(raw, 'spreadsheetId', defaults.spreadsheetId) || defaults.spreadsheetId,
        productsPerRun: readInteger(raw, 'productsPerRun', defaults.productsPerRun),
        scheduleType: readScheduleType(raw, defaults.scheduleType),
        scheduleTime: readTime(raw, 'scheduleTime', defaults.scheduleTime),
        scheduleIntervalHours: readInteger(raw, 'scheduleIntervalHours', defaults.scheduleIntervalHours),
        scheduleTimes: readTimeList(raw, 'scheduleTimes', defaults.scheduleTimes),
        runOnStart: readBoolean(raw, 'runOnStart', defaults.runOnStart),
    };

    assertAutomationConfig(config);
    return config;
}

/**
 * @throws ConfigurationError when a required option is missing or out of range
 */
export function assertAutomationConfig(config: AutomationConfig): void {
    if (!config.gcpProjectId) {
        throw new ConfigurationError('gcpProjectId is required (set GCP_PROJECT_ID or gcp_project_id)');
    }
    if (!config.spreadsheetId) {
        throw new ConfigurationError('spreadsheetId is required (set SPREADSHEET_ID or spreadsheet_id)');
    }
    if (config.productsPerRun < 1) {
        throw new ConfigurationError(`productsPerRun must be >= 1, got: ${config.productsPerRun}`);
    }
    if (config.scheduleIntervalHours < 1 || config.scheduleIntervalHours > 23) {
        throw new ConfigurationError(
            `scheduleIntervalHours must be between 1 and 23, got: ${config.scheduleIntervalHours}`
        );
    }
    if (config.scheduleType === 'custom' && config.scheduleTimes.length === 0) {
        throw new ConfigurationError('scheduleTimes must list at least one time for a custom schedule');
    }
}

/**
 * Parses YAML text into an AutomationConfig.
 */
export function parseAutomationConfigYaml(text: string, defaults: AutomationConfig): AutomationConfig {
    let raw: unknown;
    try {
        raw = parseYaml(text);
    } catch (error) {
        throw new ConfigurationError(`Invalid YAML config: ${getErrorMessage(error)}`);
    }
    return parseAutomationConfig(raw, defaults);
}

/**
 * Reads and parses a YAML config file.
 *
 * @throws ConfigFileNotFoundError when the file does not exist
 */
export async function loadAutomationConfigFile(filePath: string, defaults: AutomationConfig): Promise<AutomationConfig> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new ConfigFileNotFoundError(filePath);
        }
        throw new ConfigurationError(`Could not read config file ${filePath}: ${getErrorMessage(error)}`);
    }
    return parseAutomationConfigYaml(text, defaults);
}
