import { Repository } from './Repository';
import { RateBudget } from './types';

export interface SearchPage {
    repositories: Repository[];
    nextCursor: string | null;
    hasNextPage: boolean;
    rateBudget: RateBudget | null;
    /**
     * Messages of a partial-error envelope. Empty when the response was clean.
     */
    errors: string[];
}

export interface GithubClient {
    /**
     * Fetches one page of repository search results.
     * Transient failures are retried internally according to the client's retry policy.
     * @throws ChunkAbortedError when the response carries no usable search data
     */
    searchRepositories(query: string, cursor: string | null): Promise<SearchPage>;
}
