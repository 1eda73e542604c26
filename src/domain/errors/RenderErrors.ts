/**
 * Failure taxonomy for a render request.
 *
 * Every terminal failure of the pipeline is one of these. The HTTP edge maps
 * `code` to a status; the orchestrator and pipeline never throw anything else
 * once a request has been accepted.
 */
export type RenderErrorCode =
    | 'VALIDATION_ERROR'
    | 'FETCH_ERROR'
    | 'EFFECT_ASSET_MISSING'
    | 'ENCODE_ERROR'
    | 'OUTPUT_INTEGRITY_ERROR'
    | 'UPLOAD_ERROR'
    | 'TIMEOUT'
    | 'CANCELLED';

export class RenderError extends Error {
    constructor(
        public readonly code: RenderErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'RenderError';
    }
}

/**
 * Bad input shape or timing. Never retried.
 */
export class ValidationError extends RenderError {
    constructor(message: string, public readonly details: string[] = []) {
        super('VALIDATION_ERROR', message);
        this.name = 'ValidationError';
    }
}

/**
 * Asset retrieval failed after the resolver's own retries.
 */
export class FetchError extends RenderError {
    public readonly statusCode?: number;
    /** Transport failures, timeouts, 429 and 5xx may succeed on another attempt */
    public readonly retryable: boolean;

    constructor(
        message: string,
        public readonly url: string,
        options: { statusCode?: number; retryable?: boolean; cause?: unknown } = {}
    ) {
        super('FETCH_ERROR', message, { cause: options.cause });
        this.name = 'FetchError';
        this.statusCode = options.statusCode;
        this.retryable = options.retryable ?? false;
    }
}

/**
 * A bundled overlay source is absent. Deployment defect, never downgraded.
 */
export class EffectAssetMissingError extends RenderError {
    constructor(public readonly assetPath: string) {
        super('EFFECT_ASSET_MISSING', `Overlay asset missing: ${assetPath}`);
        this.name = 'EffectAssetMissingError';
    }
}

export class EncodeError extends RenderError {
    constructor(
        message: string,
        public readonly encoder: 'hardware' | 'software',
        options?: { cause?: unknown }
    ) {
        super('ENCODE_ERROR', message, options);
        this.name = 'EncodeError';
    }
}

/**
 * The encoder exited cleanly but the artifact is missing, empty or the wrong length.
 */
export class OutputIntegrityError extends RenderError {
    constructor(message: string) {
        super('OUTPUT_INTEGRITY_ERROR', message);
        this.name = 'OutputIntegrityError';
    }
}

export class UploadError extends RenderError {
    constructor(message: string, public readonly statusCode?: number, options?: { cause?: unknown }) {
        super('UPLOAD_ERROR', message, options);
        this.name = 'UploadError';
    }
}

export class TimeoutError extends RenderError {
    constructor(message: string) {
        super('TIMEOUT', message);
        this.name = 'TimeoutError';
    }
}

export class CancelledError extends RenderError {
    constructor(message: string = 'Render request was cancelled') {
        super('CANCELLED', message);
        this.name = 'CancelledError';
    }
}

/**
 * Reads a human message out of anything that was thrown.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
