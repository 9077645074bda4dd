import { ConfigurationError, getErrorMessage } from '../../domain/errors';

export interface ServiceAccountCredentials {
    client_email: string;
    private_key: string;
}

export interface AuthorizedUserCredentials {
    client_id: string;
    client_secret: string;
    refresh_token: string;
}

function parseJsonObject(secretName: string, json: string): object {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        throw new ConfigurationError(`${secretName} is not valid JSON: ${getErrorMessage(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ConfigurationError(`${secretName} must be a JSON object`);
    }
    return parsed;
}

function requireString(secretName: string, source: object, field: string): string {
    const value: unknown = field in source ? Reflect.get(source, field) : undefined;
    if (typeof value !== 'string' || !value) {
        throw new ConfigurationError(`${secretName} is missing "${field}"`);
    }
    return value;
}

/**
 * Parses a service account key file (used for Sheets).
 */
export function parseServiceAccountCredentials(json: string, secretName = 'google_sheets_credentials'): ServiceAccountCredentials {
    const source = parseJsonObject(secretName, json);
    return {
        client_email: requireString(secretName, source, 'client_email'),
        private_key: requireString(secretName, source, 'private_key'),
    };
}

/**
 * Parses OAuth authorized-user credentials (used for YouTube uploads).
 * Accepts the flat format as well as a client secrets file with an `installed` or `web` block
 * next to the refresh token.
 */
export function parseAuthorizedUserCredentials(json: string, secretName = 'youtube_credentials'): AuthorizedUserCredentials {
    const source = parseJsonObject(secretName, json);
    const nested: unknown = Reflect.get(source, 'installed') ?? Reflect.get(source, 'web');
    const client = typeof nested === 'object' && nested !== null ? nested : source;

    return {
        client_id: requireString(secretName, client, 'client_id'),
        client_secret: requireString(secretName, client, 'client_secret'),
        refresh_token: requireString(secretName, source, 'refresh_token'),
    };
}
