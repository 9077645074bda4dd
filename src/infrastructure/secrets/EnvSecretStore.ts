import { ISecretStore } from '../../domain/ports/ISecretStore';
import { SecretNotFoundError } from '../../domain/errors';

/**
 * Reads secrets from environment variables named after the secret in upper case
 * (`openai_api_key` -> `OPENAI_API_KEY`). Meant for local runs.
 */
export class EnvSecretStore implements ISecretStore {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) { }

    async getSecret(name: string): Promise<string> {
        const key = name.toUpperCase();
        const value = this.env[key]?.trim();
        if (!value) {
            throw new SecretNotFoundError(name, `environment variable ${key} is not set`);
        }
        return value;
    }
}
