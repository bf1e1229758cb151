export type RepositoryId = string;

export type RepositoryMetadata = Record<string, unknown>;

/**
 * Snapshot of the GraphQL rate limit at the time of a response.
 * Advisory only; nothing throttles on it.
 */
export interface RateBudget {
    remaining: number;
    resetAt: string | null;
}
