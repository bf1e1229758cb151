import { ChunkAbortedError } from '../domain/errors';
import { GithubClient } from '../domain/GithubClient';
import { Repository } from '../domain/Repository';
import { RateBudget, RepositoryId } from '../domain/types';
import { DateWindow } from './planDateWindows';

export interface ChunkResult {
    repositories: Map<RepositoryId, Repository>;
    rateBudget: RateBudget | null;
    pagesFetched: number;
    aborted: boolean;
}

export interface CollectChunkOptions {
    chunkCap: number;
    progressEvery?: number;
}

/**
 * Pages through one search window until the source runs out, the chunk cap is
 * reached or the source answers without usable data.
 */
export async function collectChunk(
    client: GithubClient,
    window: DateWindow,
    options: CollectChunkOptions
): Promise<ChunkResult> {
    const { chunkCap } = options;
    const progressEvery = options.progressEvery ?? 200;
    const repositories = new Map<RepositoryId, Repository>();
    let rateBudget: RateBudget | null = null;
    let cursor: string | null = null;
    let hasNextPage = true;
    let pagesFetched = 0;
    let aborted = false;

    console.log(`\n--- Starting chunk ${window.index + 1}: '${window.query}' ---`);

    while (hasNextPage && repositories.size < chunkCap) {
        const page = pagesFetched + 1;
        try {
            const result = await client.searchRepositories(window.query, cursor);
            pagesFetched = page;

            if (result.errors.length > 0) {
                console.warn(`[GitHub] Partial errors on page ${page} of '${window.query}': ${result.errors.join('; ')}`);
            }

            const sizeBefore = repositories.size;
            for (const repository of result.repositories) {
                // Duplicates across pages overwrite in place; new ids stop at the cap.
                if (repositories.has(repository.id) || repositories.size < chunkCap) {
                    repositories.set(repository.id, repository);
                }
            }

            if (result.rateBudget) rateBudget = result.rateBudget;
            hasNextPage = result.hasNextPage;
            cursor = result.nextCursor;

            if (hasNextPage && cursor === null) {
                console.warn(`[GitHub] Page ${page} of '${window.query}' reports more pages without a cursor. Ending chunk.`);
                hasNextPage = false;
            }

            if (Math.floor(repositories.size / progressEvery) > Math.floor(sizeBefore / progressEvery)) {
                console.log(`   ... collected ${repositories.size} for this chunk.`);
            }
        } catch (error) {
            if (!(error instanceof ChunkAbortedError)) throw error;
            console.warn(`[GitHub] Aborting chunk '${window.query}' at page ${page}: ${error.message}. Keeping ${repositories.size} collected.`);
            aborted = true;
            break;
        }
    }

    const remaining = rateBudget ? String(rateBudget.remaining) : 'unknown';
    console.log(`--- Finished chunk. Collected ${repositories.size} unique repos. Rate limit at ${remaining}. ---`);

    return { repositories, rateBudget, pagesFetched, aborted };
}
