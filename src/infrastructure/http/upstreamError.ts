import axios from 'axios';
import { SecretNotFoundError, TimeoutError, UpstreamRequestError, getErrorMessage } from '../../domain/errors';

/**
 * Wraps anything an adapter caught into an UpstreamRequestError for `vendor`.
 * Axios failures keep the HTTP status and the vendor's response body.
 * Errors that are already typed (timeouts, missing secrets, upstream errors) pass through.
 */
export function toUpstreamError(vendor: string, error: unknown, action?: string): Error {
    if (
        error instanceof UpstreamRequestError ||
        error instanceof TimeoutError ||
        error instanceof SecretNotFoundError
    ) {
        return error;
    }

    const prefix = action ? `${action} failed` : 'request failed';

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const detail: unknown = error.response?.data;
        const vendorMessage = extractVendorMessage(detail) ?? error.message;
        return new UpstreamRequestError(
            vendor,
            `${prefix}${status ? ` (HTTP ${status})` : ''}: ${vendorMessage}`,
            status,
            detail
        );
    }

    return new UpstreamRequestError(vendor, `${prefix}: ${getErrorMessage(error)}`);
}

/**
 * Pulls a human readable message out of the common vendor error shapes:
 * `{error: {message}}`, `{error: "..."}`, `{message: "..."}`, `{errors: [{message}]}`.
 */
export function extractVendorMessage(data: unknown): string | undefined {
    if (typeof data === 'string') {
        return data.trim() || undefined;
    }
    if (typeof data !== 'object' || data === null) {
        return undefined;
    }

    if ('error' in data) {
        const { error } = data;
        if (typeof error === 'string') return error;
        if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
            return error.message;
        }
    }
    if ('message' in data && typeof data.message === 'string') {
        return data.message;
    }
    if ('errors' in data && Array.isArray(data.errors)) {
        const first: unknown = data.errors[0];
        if (typeof first === 'object' && first !== null && 'message' in first && typeof first.message === 'string') {
            return first.message;
        }
    }
    return undefined;
}
