import { google } from 'googleapis';
import { ISecretStore } from '../../domain/ports/ISecretStore';
import { SecretNotFoundError } from '../../domain/errors';
import { toUpstreamError } from '../http/upstreamError';

/**
 * Fetches the base64 payload of a secret version by its full resource name.
 */
export type SecretVersionAccessor = (resourceName: string) => Promise<string | null | undefined>;

/**
 * Google Secret Manager backed store. Reads the latest version of each secret once
 * and caches it for the life of the instance.
 */
export class GcpSecretStore implements ISecretStore {
    private readonly cache = new Map<string, string>();
    private readonly accessVersion: SecretVersionAccessor;

    constructor(
        private readonly projectId: string,
        accessVersion?: SecretVersionAccessor
    ) {
        if (!projectId) {
            throw new Error('GcpSecretStore requires a project id');
        }
        this.accessVersion = accessVersion ?? createSecretManagerAccessor();
    }

    async getSecret(name: string): Promise<string> {
        const cached = this.cache.get(name);
        if (cached !== undefined) {
            return cached;
        }

        const resourceName = `projects/${this.projectId}/secrets/${name}/versions/latest`;
        let payload: string | null | undefined;
        try {
            payload = await this.accessVersion(resourceName);
        } catch (error) {
            if (getStatusCode(error) === 404) {
                throw new SecretNotFoundError(name, `no such secret in project ${this.projectId}`);
            }
            throw toUpstreamError('SecretManager', error, `Reading secret ${name}`);
        }

        const value = payload ? Buffer.from(payload, 'base64').toString('utf-8').trim() : '';
        if (!value) {
            throw new SecretNotFoundError(name, 'secret payload is empty');
        }

        this.cache.set(name, value);
        return value;
    }
}

function createSecretManagerAccessor(): SecretVersionAccessor {
    const auth = new google.auth.GoogleAuth({
        scopes: ['https://www.googleapis.com/auth/cloud-platform'],
    });
    const secretManager = google.secretmanager({ version: 'v1', auth });

    return async (resourceName) => {
        const response = await secretManager.projects.secrets.versions.access({ name: resourceName });
        return response.data.payload?.data;
    };
}

/**
 * Google API errors carry the HTTP status as `code` (number or string) or on the response.
 */
function getStatusCode(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }
    if ('code' in error) {
        const code = Number(error.code);
        if (Number.isInteger(code)) return code;
    }
    if ('response' in error && typeof error.response === 'object' && error.response !== null && 'status' in error.response) {
        const status = Number(error.response.status);
        if (Number.isInteger(status)) return status;
    }
    return undefined;
}
