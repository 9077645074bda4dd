import { defaultAutomationConfig, getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config/index';

describe('ConfigLoader Resilience', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = {};
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
        resetConfig();
    });

    it('should fall back to defaults for an empty environment', () => {
        const config = loadConfig();

        expect(config).toMatchObject({
            port: 8080,
            environment: 'development',
            productsPerRun: 1,
            secretSource: 'gcp',
            stateFilePath: './data/automation_state.json',
            interProductDelayMs: 60000,
            openaiModel: 'gpt-4-turbo-preview',
            heygenMaxWaitMs: 600000,
            scheduleType: 'daily',
            scheduleTime: '09:00',
            scheduleIntervalHours: 4,
            scheduleTimes: ['09:00', '15:00', '21:00'],
            runOnStart: false,
        });
        expect(config.redisUrl).toBeUndefined();
        expect(config.scheduleTimezone).toBeUndefined();
        expect(validateConfig(config)).toEqual([]);
    });

    it('should strip double quotes from environment variables', () => {
        process.env.SPREADSHEET_ID = '"sheet-with-quotes"';
        expect(loadConfig().spreadsheetId).toBe('sheet-with-quotes');
    });

    it('should strip single quotes from environment variables', () => {
        process.env.GCP_PROJECT_ID = "'test-project'";
        expect(loadConfig().gcpProjectId).toBe('test-project');
    });

    it('should trim whitespace from environment variables', () => {
        process.env.REDIS_URL = '  redis://localhost:6379  ';
        expect(loadConfig().redisUrl).toBe('redis://localhost:6379');
    });

    it('should handle numeric variables with quotes', () => {
        process.env.PORT = '"4000"';
        expect(loadConfig().port).toBe(4000);
    });

    it('should reject non-numeric numbers', () => {
        process.env.PRODUCTS_PER_RUN = 'many';
        expect(() => loadConfig()).toThrow('Environment variable PRODUCTS_PER_RUN must be a number, got: many');
    });

    it('should parse schedule settings', () => {
        process.env.SCHEDULE_TYPE = 'CUSTOM';
        process.env.SCHEDULE_TIMES = '08:00, 20:30,';
        process.env.RUN_ON_START = 'TRUE';
        process.env.SCHEDULE_TIMEZONE = 'Europe/Berlin';
        process.env.SECRET_SOURCE = 'env';

        const config = loadConfig();

        expect(config.scheduleType).toBe('custom');
        expect(config.scheduleTimes).toEqual(['08:00', '20:30']);
        expect(config.runOnStart).toBe(true);
        expect(config.scheduleTimezone).toBe('Europe/Berlin');
        expect(config.secretSource).toBe('env');
    });

    it('should fall back to daily for an unknown schedule type', () => {
        process.env.SCHEDULE_TYPE = 'weekly';
        expect(loadConfig().scheduleType).toBe('daily');
    });

    it('should report invalid values', () => {
        process.env.PORT = '-1';
        process.env.PRODUCTS_PER_RUN = '0';
        process.env.INTER_PRODUCT_DELAY_MS = '-5';

        expect(validateConfig(loadConfig())).toEqual([
            'PORT must be a positive integer',
            'PRODUCTS_PER_RUN must be an integer >= 1',
            'INTER_PRODUCT_DELAY_MS cannot be negative',
        ]);
    });

    it('should cache the config until reset', () => {
        process.env.SPREADSHEET_ID = 'first';
        expect(getConfig().spreadsheetId).toBe('first');

        process.env.SPREADSHEET_ID = 'second';
        expect(getConfig().spreadsheetId).toBe('first');

        resetConfig();
        expect(getConfig().spreadsheetId).toBe('second');
    });

    it('should derive the default automation config', () => {
        process.env.GCP_PROJECT_ID = 'test-project';
        process.env.SPREADSHEET_ID = 'test-sheet';
        process.env.PRODUCTS_PER_RUN = '3';

        expect(defaultAutomationConfig(loadConfig())).toEqual({
            gcpProjectId: 'test-project',
            spreadsheetId: 'test-sheet',
            productsPerRun: 3,
            scheduleType: 'daily',
            scheduleTime: '09:00',
            scheduleIntervalHours: 4,
            scheduleTimes: ['09:00', '15:00', '21:00'],
            runOnStart: false,
        });
    });
});
