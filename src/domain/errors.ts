export type CrawlErrorCode =
    | 'configuration_invalid'
    | 'request_transient'
    | 'retry_exhausted'
    | 'chunk_aborted'
    | 'repository_write_failed';

export type CrawlErrorContext = Partial<{
    chunk: string;
    page: number;
    stage: string;
    status: number;
    attempts: number;
    batch: number;
}>;

const toErrorMessage = (reason: unknown): string => {
    if (reason instanceof Error) return reason.message;
    return String(reason);
};

export class CrawlerError extends Error {
    readonly code: CrawlErrorCode;
    readonly context: CrawlErrorContext;

    constructor(args: { code: CrawlErrorCode; message: string; context?: CrawlErrorContext; cause?: unknown }) {
        super(args.message, args.cause !== undefined ? { cause: args.cause } : undefined);
        this.name = 'CrawlerError';
        this.code = args.code;
        this.context = args.context ?? {};
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Missing or malformed process configuration. Raised before any network or DB activity.
 */
export class ConfigurationError extends CrawlerError {
    constructor(message: string) {
        super({ code: 'configuration_invalid', message });
        this.name = 'ConfigurationError';
    }
}

/**
 * Timeout, connection failure or non-2xx status. Callers retry these.
 */
export class TransientRequestError extends CrawlerError {
    readonly status?: number;

    constructor(message: string, context: CrawlErrorContext = {}, cause?: unknown) {
        super({ code: 'request_transient', message, context, cause });
        this.name = 'TransientRequestError';
        this.status = context.status;
    }
}

export class RetryExhaustedError extends CrawlerError {
    constructor(attempts: number, cause: unknown) {
        super({
            code: 'retry_exhausted',
            message: `Gave up after ${attempts} attempts: ${toErrorMessage(cause)}`,
            context: { attempts },
            cause
        });
        this.name = 'RetryExhaustedError';
    }
}

/**
 * The source answered without a usable result container. Ends the current chunk only.
 */
export class ChunkAbortedError extends CrawlerError {
    constructor(message: string, context: CrawlErrorContext = {}) {
        super({ code: 'chunk_aborted', message, context });
        this.name = 'ChunkAbortedError';
    }
}

export class RepositoryWriteError extends CrawlerError {
    constructor(reason: unknown, context: CrawlErrorContext = {}) {
        super({
            code: 'repository_write_failed',
            message: `Repository write failed: ${toErrorMessage(reason)}`,
            context: { stage: 'persist', ...context },
            cause: reason
        });
        this.name = 'RepositoryWriteError';
    }
}
