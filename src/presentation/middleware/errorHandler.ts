import { Request, Response, NextFunction } from 'express';
import { ConfigFileNotFoundError, ConfigurationError, JobNotFoundError } from '../../domain/errors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

/**
 * Maps domain errors that describe a client mistake onto HTTP errors.
 */
function toAppError(err: Error): AppError | null {
    if (err instanceof AppError) {
        return err;
    }
    if (err instanceof ConfigFileNotFoundError || err instanceof JobNotFoundError) {
        const mapped = new NotFoundError(err.message);
        mapped.name = err.name;
        return mapped;
    }
    if (err instanceof ConfigurationError) {
        const mapped = new BadRequestError(err.message);
        mapped.name = err.name;
        return mapped;
    }
    // Malformed JSON bodies rejected by express.json()
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
        return new BadRequestError(`Invalid JSON body: ${err.message}`);
    }
    return null;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const appError = toAppError(err);

    if (appError && appError.statusCode < 500) {
        console.warn(`[WARN] ${appError.name}: ${appError.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (appError) {
        const response: ErrorResponse = {
            error: {
                message: appError.message,
                code: appError.name,
            },
        };
        res.status(appError.statusCode).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
