import { Repository } from '../domain/Repository';
import { RateBudget } from '../domain/types';

export type DecodedSearchResponse =
    | {
        usable: true;
        repositories: Repository[];
        nextCursor: string | null;
        hasNextPage: boolean;
        rateBudget: RateBudget | null;
        errors: string[];
    }
    | {
        usable: false;
        reason: string;
        errors: string[];
    };

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const optionalInteger = (value: unknown): number | null =>
    (typeof value === 'number' && Number.isInteger(value) ? value : null);

const decodeErrors = (value: unknown): string[] => {
    if (!Array.isArray(value)) return [];
    return value.map(entry => {
        if (isRecord(entry) && typeof entry.message === 'string') {
            return typeof entry.type === 'string' ? `${entry.type}: ${entry.message}` : entry.message;
        }
        return JSON.stringify(entry);
    });
};

const decodeRateBudget = (value: unknown): RateBudget | null => {
    if (!isRecord(value)) return null;
    const remaining = optionalInteger(value.remaining);
    if (remaining === null) return null;
    return { remaining, resetAt: optionalString(value.resetAt) };
};

/**
 * Nodes without a string id cannot be keyed and are dropped.
 */
export const decodeRepositoryNode = (value: unknown): Repository | null => {
    if (!isRecord(value) || typeof value.id !== 'string' || value.id === '') return null;

    const createdAt = optionalString(value.createdAt);
    return new Repository(
        value.id,
        optionalString(value.nameWithOwner),
        optionalInteger(value.stargazerCount),
        createdAt !== null ? { createdAt } : {}
    );
};

export const decodeSearchResponse = (body: unknown): DecodedSearchResponse => {
    if (!isRecord(body)) {
        return { usable: false, reason: 'response body is not a JSON object', errors: [] };
    }

    const errors = decodeErrors(body.errors);
    const data = body.data;
    if (!isRecord(data)) {
        return { usable: false, reason: 'response has no data', errors };
    }

    const search = data.search;
    if (!isRecord(search)) {
        return { usable: false, reason: 'response data has no search container', errors };
    }

    const nodes = Array.isArray(search.nodes) ? search.nodes : [];
    const repositories: Repository[] = [];
    for (const node of nodes) {
        const repository = decodeRepositoryNode(node);
        if (repository) repositories.push(repository);
    }

    const pageInfo = isRecord(search.pageInfo) ? search.pageInfo : {};

    return {
        usable: true,
        repositories,
        nextCursor: optionalString(pageInfo.endCursor),
        hasNextPage: pageInfo.hasNextPage === true,
        rateBudget: decodeRateBudget(data.rateLimit),
        errors
    };
};
