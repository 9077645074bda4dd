import { ISecretStore } from '../domain/ports/ISecretStore';
import { ICursorStore } from '../domain/ports/ICursorStore';
import { IPlatformPublisher } from '../domain/ports/IPlatformPublisher';
import { AutomationConfig } from '../domain/entities/AutomationConfig';
import { ProductPipeline } from '../application/ProductPipeline';
import { RunExecutor } from '../application/RunExecutor';
import { Config, SecretSource } from '../config';
import { parseAuthorizedUserCredentials, parseServiceAccountCredentials } from './google/credentials';
import { GoogleSheetsProductSource, createSpreadsheetApi } from './google/GoogleSheetsProductSource';
import { OpenAIScriptGenerator } from './llm/OpenAIScriptGenerator';
import { HeyGenVideoGenerator } from './video/HeyGenVideoGenerator';
import { HttpMediaDownloader } from './storage/HttpMediaDownloader';
import { YouTubePublisher, createYouTubeUploader } from './publishers/YouTubePublisher';
import { InstagramPublisher } from './publishers/InstagramPublisher';
import { PinterestPublisher } from './publishers/PinterestPublisher';
import { TwitterPublisher } from './publishers/TwitterPublisher';
import { createSecretStore } from './secrets';

/**
 * Secret names looked up before anything else is built.
 */
export const AUTOMATION_SECRET_NAMES = [
    'google_sheets_credentials',
    'openai_api_key',
    'heygen_api_key',
    'youtube_credentials',
    'instagram_access_token',
    'instagram_account_id',
    'pinterest_access_token',
    'pinterest_board_id',
    'twitter_access_token',
] as const;

export type AutomationSecretName = (typeof AUTOMATION_SECRET_NAMES)[number];
export type AutomationSecrets = Record<AutomationSecretName, string>;

export type FactorySettings = Pick<
    Config,
    | 'videoOutputDir'
    | 'interProductDelayMs'
    | 'openaiModel'
    | 'heygenAvatarId'
    | 'heygenVoiceId'
    | 'heygenMaxWaitMs'
> & { secretSource: SecretSource };

export interface AutomationFactoryDeps {
    settings: FactorySettings;
    /** Shared by every run so concurrent jobs read and write one cursor file */
    cursorStore: ICursorStore;
    /** Defaults to the store selected by settings.secretSource for the config's project */
    secretStoreFor?: (config: AutomationConfig) => ISecretStore;
}

/**
 * Builds a ready-to-run executor for one AutomationConfig.
 */
export class AutomationFactory {
    constructor(private readonly deps: AutomationFactoryDeps) { }

    async createRun(config: AutomationConfig): Promise<RunExecutor> {
        const secretStore = this.deps.secretStoreFor?.(config)
            ?? createSecretStore(this.deps.settings.secretSource, config.gcpProjectId);
        const secrets = await readSecrets(secretStore);
        const { settings } = this.deps;

        const productSource = new GoogleSheetsProductSource(
            createSpreadsheetApi(parseServiceAccountCredentials(secrets.google_sheets_credentials)),
            config.spreadsheetId
        );

        const publishers: IPlatformPublisher[] = [
            new YouTubePublisher(createYouTubeUploader(parseAuthorizedUserCredentials(secrets.youtube_credentials))),
            new InstagramPublisher(secrets.instagram_access_token, secrets.instagram_account_id),
            new PinterestPublisher(secrets.pinterest_access_token, secrets.pinterest_board_id),
            new TwitterPublisher(secrets.twitter_access_token),
        ];

        const pipeline = new ProductPipeline({
            scriptGenerator: new OpenAIScriptGenerator(secrets.openai_api_key, { model: settings.openaiModel }),
            videoGenerator: new HeyGenVideoGenerator(secrets.heygen_api_key, {
                avatarId: settings.heygenAvatarId,
                voiceId: settings.heygenVoiceId,
                maxWaitMs: settings.heygenMaxWaitMs,
            }),
            downloader: new HttpMediaDownloader(),
            publishers,
            productSource,
            videoOutputDir: settings.videoOutputDir,
        });

        return new RunExecutor({
            productSource,
            cursorStore: this.deps.cursorStore,
            pipeline,
            interProductDelayMs: settings.interProductDelayMs,
        });
    }
}

/**
 * Reads every secret in order; the first missing one aborts.
 */
export async function readSecrets(store: ISecretStore): Promise<AutomationSecrets> {
    const values = new Map<AutomationSecretName, string>();
    for (const name of AUTOMATION_SECRET_NAMES) {
        values.set(name, await store.getSecret(name));
    }
    console.log(`[AutomationFactory] Loaded ${values.size} secrets`);

    const secret = (name: AutomationSecretName): string => values.get(name) ?? '';
    return {
        google_sheets_credentials: secret('google_sheets_credentials'),
        openai_api_key: secret('openai_api_key'),
        heygen_api_key: secret('heygen_api_key'),
        youtube_credentials: secret('youtube_credentials'),
        instagram_access_token: secret('instagram_access_token'),
        instagram_account_id: secret('instagram_account_id'),
        pinterest_access_token: secret('pinterest_access_token'),
        pinterest_board_id: secret('pinterest_board_id'),
        twitter_access_token: secret('twitter_access_token'),
    };
}
