import { Request, Response, NextFunction } from 'express';
import { RenderError, RenderErrorCode, ValidationError } from '../../domain/errors/RenderErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly code: string = 'APP_ERROR'
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
        super(404, message, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

/**
 * HTTP status for each render failure.
 * 499 is the de facto "client closed request" status.
 */
export const RENDER_ERROR_STATUS: Record<RenderErrorCode, number> = {
    VALIDATION_ERROR: 400,
    FETCH_ERROR: 502,
    EFFECT_ASSET_MISSING: 500,
    ENCODE_ERROR: 500,
    OUTPUT_INTEGRITY_ERROR: 500,
    UPLOAD_ERROR: 502,
    TIMEOUT: 504,
    CANCELLED: 499,
};

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: string[];
    };
}

/**
 * Body-parser failures carry an HTTP status of their own (malformed JSON, oversize body).
 */
function clientStatusOf(err: Error): number | undefined {
    if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
        return err.status;
    }
    return undefined;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    if (res.headersSent) {
        next(err);
        return;
    }

    if (err instanceof RenderError) {
        const status = RENDER_ERROR_STATUS[err.code];
        if (status < 500) {
            console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        } else {
            console.error(`[ERROR] ${err.name}: ${err.message}`);
        }

        const response: ErrorResponse = { error: { message: err.message, code: err.code } };
        if (err instanceof ValidationError && err.details.length > 0) {
            response.error.details = err.details;
        }
        res.status(status).json(response);
        return;
    }

    if (err instanceof AppError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        const response: ErrorResponse = { error: { message: err.message, code: err.code } };
        res.status(err.statusCode).json(response);
        return;
    }

    const clientStatus = clientStatusOf(err);
    if (clientStatus !== undefined) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        const response: ErrorResponse = { error: { message: err.message, code: 'VALIDATION_ERROR' } };
        res.status(clientStatus).json(response);
        return;
    }

    console.error(`[ERROR] ${err.name}: ${err.message}`);
    if (err.stack) {
        console.error(err.stack);
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
