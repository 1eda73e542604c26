import { CancelledError } from '../../domain/errors/RenderErrors';

/**
 * Backoff schedule for transfers to and from remote storage.
 * Delays grow by `multiplier` per failed attempt up to `maxDelayMs`, spread by
 * ±`jitter` so the parallel downloads of one request do not retry in lockstep.
 */
export interface RetryPolicy {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
    /** 0-1 */
    jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    multiplier: 2,
    jitter: 0.1,
};

export interface RetryOptions extends Partial<RetryPolicy> {
    /** The render's signal; aborting it ends the backoff wait at once */
    signal?: AbortSignal;
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Delay before the attempt after `failedAttempt` (1-based).
 */
export function backoffDelayMs(policy: RetryPolicy, failedAttempt: number, random: () => number = Math.random): number {
    const base = Math.min(policy.initialDelayMs * policy.multiplier ** (failedAttempt - 1), policy.maxDelayMs);
    const spread = base * policy.jitter * (random() * 2 - 1);
    return Math.max(0, Math.min(base + spread, policy.maxDelayMs));
}

/**
 * Runs `fn` until it succeeds, the policy runs out of attempts, or the error is
 * not retryable; the last error is rethrown as is. A cancelled render never
 * starts another attempt.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const { signal, isRetryable = () => true, onRetry, ...overrides } = options;
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };

    for (let attempt = 1; ; attempt++) {
        if (signal?.aborted) {
            throw new CancelledError(`Cancelled before attempt ${attempt}`);
        }
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= policy.maxAttempts || signal?.aborted || !isRetryable(error)) {
                throw error;
            }
            const delayMs = backoffDelayMs(policy, attempt);
            onRetry?.(attempt, error, delayMs);
            await abortableDelay(delayMs, signal);
        }
    }
}

/**
 * Resolves after `ms`, or rejects with CancelledError as soon as the signal fires.
 */
export function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError('Cancelled during retry backoff'));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError('Cancelled during retry backoff'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * 429, 5xx and "no response at all" may succeed on another attempt.
 */
export function isRetryableStatus(status: number | undefined): boolean {
    return status === undefined || status === 429 || (status >= 500 && status < 600);
}
