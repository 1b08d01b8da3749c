export interface RetryOptions {
    /** Retries after the first attempt; `0` means a single attempt. */
    maxRetries: number;
    /** Delay before retry n is `baseDelayMs * 2^(n - 1)`. */
    baseDelayMs: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
    constructor(public readonly attempts: number, cause: unknown) {
        super(
            `Operation failed after ${attempts} attempt(s): ${cause instanceof Error ? cause.message : String(cause)}`,
            { cause }
        );
        this.name = 'RetryExhaustedError';
    }
}

function statusOf(error: object): number | undefined {
    if ('status_code' in error && typeof error.status_code === 'number') return error.status_code;
    if ('status' in error && typeof error.status === 'number') return error.status;
    return undefined;
}

/**
 * Server errors, throttling and timeouts are worth another attempt; other
 * client errors (an unknown model, a bad request) fail the same way again.
 * Errors without a status, such as network failures, count as transient.
 */
export function isTransientError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) return true;
    const status = statusOf(error);
    if (status === undefined) return true;
    return status >= 500 || status === 429 || status === 408;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(baseDelayMs: number, retry: number): number {
    return baseDelayMs * 2 ** (retry - 1);
}

export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const sleep = options.sleep ?? defaultSleep;
    const totalAttempts = options.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            lastError = error;

            if (options.shouldRetry && !options.shouldRetry(error)) {
                throw error;
            }
            if (attempt === totalAttempts) break;

            const delayMs = backoffDelay(options.baseDelayMs, attempt);
            options.onRetry?.(attempt, error, delayMs);
            await sleep(delayMs);
        }
    }

    throw new RetryExhaustedError(totalAttempts, lastError);
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(message)), timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}
