/**
 * Error taxonomy shared by the orchestration core and its adapters.
 */

/**
 * Missing or malformed configuration (fatal at startup or submission).
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class ConfigFileNotFoundError extends ConfigurationError {
    constructor(public readonly filePath: string) {
        super(`Config file not found: ${filePath}`);
        this.name = 'ConfigFileNotFoundError';
    }
}

/**
 * A credential secret could not be found in the secret store.
 */
export class SecretNotFoundError extends Error {
    constructor(public readonly secretName: string, detail?: string) {
        super(`Secret not found: ${secretName}${detail ? ` (${detail})` : ''}`);
        this.name = 'SecretNotFoundError';
    }
}

/**
 * A vendor API call failed. Carries the vendor response when one was returned.
 */
export class UpstreamRequestError extends Error {
    constructor(
        public readonly vendor: string,
        message: string,
        public readonly statusCode?: number,
        public readonly detail?: unknown
    ) {
        super(`${vendor}: ${message}`);
        this.name = 'UpstreamRequestError';
    }
}

/**
 * A bounded wait was exceeded.
 */
export class TimeoutError extends Error {
    constructor(
        public readonly label: string,
        public readonly timeoutMs: number
    ) {
        super(`${label} timed out after ${Math.round(timeoutMs / 1000)} seconds`);
        this.name = 'TimeoutError';
    }
}

/**
 * Persisted cursor state could not be read. Recovered by falling back to the default.
 */
export class StateCorruptionError extends Error {
    constructor(public readonly statePath: string, reason: string) {
        super(`State file ${statePath} is unreadable: ${reason}`);
        this.name = 'StateCorruptionError';
    }
}

export class JobNotFoundError extends Error {
    constructor(public readonly jobId: string) {
        super(`Job not found: ${jobId}`);
        this.name = 'JobNotFoundError';
    }
}

export class JobTransitionError extends Error {
    constructor(jobId: string, from: string, to: string) {
        super(`Job ${jobId} cannot move from ${from} to ${to}`);
        this.name = 'JobTransitionError';
    }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}
