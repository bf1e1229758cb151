import { RetryExhaustedError } from '../../domain/errors';

export type RetryPolicy = {
    maxRetries: number | null;   // retries after the first try; null retries until success
    delayMs: number;             // fixed wait between attempts
    shouldRetry: (err: unknown) => boolean;
    onRetry?: (ctx: { attempt: number; delayMs: number; error: unknown }) => void;
    sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export const retry = async <T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> => {
    const { maxRetries, delayMs, shouldRetry, onRetry } = policy;
    const wait = policy.sleep ?? sleep;

    let attempt = 0;
    while (true) {
        try {
            return await fn();
        } catch (err) {
            if (!shouldRetry(err)) throw err;
            if (maxRetries !== null && attempt >= maxRetries) {
                throw new RetryExhaustedError(attempt + 1, err);
            }

            attempt += 1;
            onRetry?.({ attempt, delayMs, error: err });
            await wait(delayMs);
        }
    }
};
