import { AUTOMATION_SECRET_NAMES, AutomationFactory, readSecrets } from '../../../src/infrastructure/AutomationFactory';
import { EnvSecretStore } from '../../../src/infrastructure/secrets';
import { RunExecutor } from '../../../src/application/RunExecutor';
import { ISecretStore } from '../../../src/domain/ports/ISecretStore';
import { AutomationConfig } from '../../../src/domain/entities/AutomationConfig';
import { SecretNotFoundError } from '../../../src/domain/errors';
import { MemoryCursorStore } from '../application/fakes';

const config: AutomationConfig = {
    gcpProjectId: 'test-project',
    spreadsheetId: 'test-sheet',
    productsPerRun: 1,
    scheduleType: 'daily',
    scheduleTime: '09:00',
    scheduleIntervalHours: 4,
    scheduleTimes: ['09:00'],
    runOnStart: false,
};

const env = {
    GOOGLE_SHEETS_CREDENTIALS: JSON.stringify({ client_email: 'bot@test-project.iam.gserviceaccount.com', private_key: 'test-key' }),
    OPENAI_API_KEY: 'test-secret',
    HEYGEN_API_KEY: 'test-secret',
    YOUTUBE_CREDENTIALS: JSON.stringify({ client_id: 'id', client_secret: 'test-secret', refresh_token: 'test-refresh' }),
    INSTAGRAM_ACCESS_TOKEN: 'test-token',
    INSTAGRAM_ACCOUNT_ID: 'acct-1',
    PINTEREST_ACCESS_TOKEN: 'test-token',
    PINTEREST_BOARD_ID: 'board-1',
    TWITTER_ACCESS_TOKEN: 'test-token',
};

const settings = {
    videoOutputDir: './data/videos',
    interProductDelayMs: 0,
    openaiModel: 'gpt-4-turbo-preview',
    heygenAvatarId: 'avatar-1',
    heygenVoiceId: 'voice-1',
    heygenMaxWaitMs: 600000,
    secretSource: 'env' as const,
};

describe('AutomationFactory', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should read every secret in order', async () => {
        const store = new EnvSecretStore(env);
        const getSecret = jest.spyOn(store, 'getSecret');

        const secrets = await readSecrets(store);

        expect(getSecret.mock.calls.map(call => call[0])).toEqual([...AUTOMATION_SECRET_NAMES]);
        expect(secrets.pinterest_board_id).toBe('board-1');
    });

    it('should stop at the first missing secret', async () => {
        const partial = Object.fromEntries(Object.entries(env).filter(([key]) => key !== 'HEYGEN_API_KEY'));
        const store = new EnvSecretStore(partial);
        const getSecret = jest.spyOn(store, 'getSecret');

        await expect(readSecrets(store)).rejects.toThrow(SecretNotFoundError);
        expect(getSecret).toHaveBeenCalledTimes(3);
    });

    it('should build a run executor from the secrets of the config project', async () => {
        const secretStoreFor = jest.fn((_config: AutomationConfig): ISecretStore => new EnvSecretStore(env));
        const factory = new AutomationFactory({ settings, cursorStore: new MemoryCursorStore(), secretStoreFor });

        await expect(factory.createRun(config)).resolves.toBeInstanceOf(RunExecutor);
        expect(secretStoreFor).toHaveBeenCalledWith(config);
    });

    it('should fail before building anything when a secret is missing', async () => {
        const factory = new AutomationFactory({
            settings,
            cursorStore: new MemoryCursorStore(),
            secretStoreFor: () => new EnvSecretStore({}),
        });

        await expect(factory.createRun(config))
            .rejects.toThrow('Secret not found: google_sheets_credentials (environment variable GOOGLE_SHEETS_CREDENTIALS is not set)');
    });
});
