import { ChunkAbortedError, TransientRequestError } from '../domain/errors';
import { GithubClient, SearchPage } from '../domain/GithubClient';
import { retry, RetryPolicy } from '../shared/retry/retry';
import { decodeSearchResponse } from './searchResponse';

export const SEARCH_REPOSITORIES_QUERY = `
    query SearchRepos($queryStr: String!, $first: Int!, $after: String) {
        rateLimit {
            remaining
            resetAt
        }
        search(query: $queryStr, type: REPOSITORY, first: $first, after: $after) {
            nodes {
                ... on Repository {
                    id
                    nameWithOwner
                    stargazerCount
                    createdAt
                }
            }
            pageInfo {
                endCursor
                hasNextPage
            }
        }
    }
`;

export type RetrySettings = Pick<RetryPolicy, 'maxRetries' | 'delayMs' | 'sleep'>;

export interface GraphqlGithubClientOptions {
    endpoint?: string;
    pageSize?: number;
    timeoutMs?: number;
    retry?: Partial<RetrySettings>;
}

export const defaultRetrySettings: RetrySettings = {
    maxRetries: null,
    delayMs: 15000
};

export class GraphqlGithubClient implements GithubClient {
    private token: string;
    private endpoint: string;
    private pageSize: number;
    private timeoutMs: number;
    private retrySettings: RetrySettings;

    constructor(token: string, options: GraphqlGithubClientOptions = {}) {
        this.token = token;
        this.endpoint = options.endpoint ?? 'https://api.github.com/graphql';
        this.pageSize = options.pageSize ?? 100;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.retrySettings = { ...defaultRetrySettings, ...options.retry };
    }

    private async post(query: string, variables: Record<string, unknown>): Promise<unknown> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        // The timer stays armed until the body is read, so a stalled body aborts as well.
        let text: string;
        try {
            const response = await fetch(this.endpoint, {
                method: 'POST',
                headers: {
                    'Authorization': `bearer ${this.token}`,
                    'Content-Type': 'application/json',
                    'User-Agent': 'repo-star-crawler'
                },
                body: JSON.stringify({ query, variables }),
                signal: controller.signal
            });

            if (!response.ok) {
                await response.text().catch(() => '');
                throw new TransientRequestError(`GitHub API Error: ${response.status} ${response.statusText}`, {
                    stage: 'fetch',
                    status: response.status
                });
            }

            text = await response.text();
        } catch (error) {
            if (error instanceof TransientRequestError) throw error;
            if (controller.signal.aborted) {
                throw new TransientRequestError(`GitHub request timeout after ${this.timeoutMs}ms`, { stage: 'fetch' }, error);
            }
            throw new TransientRequestError(`GitHub request failed: ${String(error)}`, { stage: 'fetch' }, error);
        } finally {
            clearTimeout(timeout);
        }

        try {
            const body: unknown = JSON.parse(text);
            return body;
        } catch {
            // A complete but unparseable body is decoded as "no usable data".
            return undefined;
        }
    }

    async searchRepositories(query: string, cursor: string | null): Promise<SearchPage> {
        const variables = { queryStr: query, first: this.pageSize, after: cursor };

        const body = await retry(() => this.post(SEARCH_REPOSITORIES_QUERY, variables), {
            ...this.retrySettings,
            shouldRetry: err => err instanceof TransientRequestError,
            onRetry: ({ attempt, delayMs, error }) => {
                console.warn(JSON.stringify({
                    event: 'github.retry',
                    chunk: query,
                    status: error instanceof TransientRequestError ? error.status ?? null : null,
                    reason: error instanceof Error ? error.message : String(error),
                    attempt,
                    delayMs
                }));
            }
        });

        const decoded = decodeSearchResponse(body);
        if (!decoded.usable) {
            const detail = decoded.errors.length > 0 ? ` (${decoded.errors.join('; ')})` : '';
            throw new ChunkAbortedError(`GitHub search unusable: ${decoded.reason}${detail}`, {
                chunk: query,
                stage: 'decode'
            });
        }

        return {
            repositories: decoded.repositories,
            nextCursor: decoded.nextCursor,
            hasNextPage: decoded.hasNextPage,
            rateBudget: decoded.rateBudget,
            errors: decoded.errors
        };
    }
}
