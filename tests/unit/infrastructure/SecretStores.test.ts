import { EnvSecretStore, GcpSecretStore, createSecretStore } from '../../../src/infrastructure/secrets';
import { SecretNotFoundError, UpstreamRequestError } from '../../../src/domain/errors';

const base64 = (value: string) => Buffer.from(value, 'utf-8').toString('base64');

describe('EnvSecretStore', () => {
    it('should read the upper-cased variable', async () => {
        const store = new EnvSecretStore({ OPENAI_API_KEY: '  test-secret  ' });
        await expect(store.getSecret('openai_api_key')).resolves.toBe('test-secret');
    });

    it('should report missing or blank variables', async () => {
        const store = new EnvSecretStore({ HEYGEN_API_KEY: '   ' });

        await expect(store.getSecret('heygen_api_key')).rejects.toThrow(SecretNotFoundError);
        await expect(store.getSecret('pinterest_board_id'))
            .rejects.toThrow('Secret not found: pinterest_board_id (environment variable PINTEREST_BOARD_ID is not set)');
    });
});

describe('GcpSecretStore', () => {
    it('should read the latest version of the secret', async () => {
        const access = jest.fn().mockResolvedValue(base64('test-secret\n'));
        const store = new GcpSecretStore('test-project', access);

        await expect(store.getSecret('openai_api_key')).resolves.toBe('test-secret');
        expect(access).toHaveBeenCalledWith('projects/test-project/secrets/openai_api_key/versions/latest');
    });

    it('should cache values per secret', async () => {
        const access = jest.fn((name: string) => Promise.resolve(base64(name.includes('heygen') ? 'h' : 'o')));
        const store = new GcpSecretStore('test-project', access);

        await store.getSecret('openai_api_key');
        await store.getSecret('openai_api_key');
        await expect(store.getSecret('heygen_api_key')).resolves.toBe('h');

        expect(access).toHaveBeenCalledTimes(2);
    });

    it('should map a 404 to SecretNotFoundError', async () => {
        const store = new GcpSecretStore('test-project', () => Promise.reject(Object.assign(new Error('NOT_FOUND'), { code: 404 })));

        await expect(store.getSecret('twitter_access_token'))
            .rejects.toThrow('Secret not found: twitter_access_token (no such secret in project test-project)');
    });

    it('should map a response status of 404 to SecretNotFoundError', async () => {
        const error = Object.assign(new Error('Not Found'), { response: { status: 404 } });
        const store = new GcpSecretStore('test-project', () => Promise.reject(error));

        await expect(store.getSecret('x')).rejects.toThrow(SecretNotFoundError);
    });

    it('should wrap other failures as upstream errors', async () => {
        const error = Object.assign(new Error('Permission denied'), { code: 403 });
        const store = new GcpSecretStore('test-project', () => Promise.reject(error));

        const failure = store.getSecret('openai_api_key');
        await expect(failure).rejects.toThrow(UpstreamRequestError);
        await expect(failure).rejects.toThrow('SecretManager: Reading secret openai_api_key failed: Permission denied');
    });

    it('should treat an empty payload as missing', async () => {
        const store = new GcpSecretStore('test-project', () => Promise.resolve(null));

        await expect(store.getSecret('openai_api_key'))
            .rejects.toThrow('Secret not found: openai_api_key (secret payload is empty)');
    });

    it('should require a project id', () => {
        expect(() => new GcpSecretStore('', jest.fn())).toThrow('GcpSecretStore requires a project id');
    });
});

describe('createSecretStore', () => {
    it('should build an environment store for the env source', () => {
        expect(createSecretStore('env', 'test-project')).toBeInstanceOf(EnvSecretStore);
    });
});
