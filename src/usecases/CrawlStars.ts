import { GithubClient } from '../domain/GithubClient';
import { Repository } from '../domain/Repository';
import { RepositoryStore } from '../domain/RepositoryStore';
import { RateBudget, RepositoryId } from '../domain/types';
import { collectChunk } from './collectChunk';
import { DateWindow, planDateWindows } from './planDateWindows';

export type CrawlState = 'PLANNING' | 'HARVESTING' | 'DONE';

type CrawlStep =
    | { state: Extract<CrawlState, 'PLANNING'> }
    | { state: Extract<CrawlState, 'HARVESTING'>; window: DateWindow }
    | { state: Extract<CrawlState, 'DONE'> };

export interface CrawlOptions {
    chunkCap: number;
    windowDays: number;
    windowCount: number;
    qualifiers?: string;
    now?: () => Date;
}

export interface CrawlSummary {
    collected: number;
    stored: number;
    chunksProcessed: number;
    chunksAborted: number;
    rateBudget: RateBudget | null;
}

export const defaultCrawlOptions: CrawlOptions = {
    chunkCap: 1000,
    windowDays: 30,
    windowCount: 120
};

/**
 * Folds one chunk into the accumulator. A re-observed id takes the chunk's
 * values but keeps its original position, so iteration order stays discovery order.
 */
export const mergeChunk = (
    accumulator: Map<RepositoryId, Repository>,
    chunk: Map<RepositoryId, Repository>
): Map<RepositoryId, Repository> => {
    for (const [id, repository] of chunk) {
        accumulator.set(id, repository);
    }
    return accumulator;
};

export const truncateToTarget = (accumulator: Map<RepositoryId, Repository>, targetCount: number): Repository[] =>
    Array.from(accumulator.values()).slice(0, targetCount);

export class CrawlStars {
    private client: GithubClient;
    private store: RepositoryStore;
    private options: CrawlOptions;

    constructor(client: GithubClient, store: RepositoryStore, options: Partial<CrawlOptions> = {}) {
        this.client = client;
        this.store = store;
        this.options = { ...defaultCrawlOptions, ...options };
    }

    /**
     * Crawls up to `targetCount` unique repositories, one creation-date window
     * at a time, then upserts them in one transaction.
     */
    async execute(targetCount: number = 100000): Promise<CrawlSummary> {
        if (!Number.isInteger(targetCount) || targetCount < 1) {
            throw new Error(`targetCount=${String(targetCount)} must be an integer >= 1`);
        }

        await this.store.initializeSchema();

        const { chunkCap, windowDays, windowCount, qualifiers } = this.options;
        const now = this.options.now ?? (() => new Date());
        const windows = planDateWindows({ today: now(), windowDays, windowCount, qualifiers });

        let accumulator = new Map<RepositoryId, Repository>();
        let rateBudget: RateBudget | null = null;
        let chunksProcessed = 0;
        let chunksAborted = 0;

        console.log(`Starting crawl to collect ${targetCount} repositories...`);

        let step: CrawlStep = { state: 'PLANNING' };
        while (step.state !== 'DONE') {
            if (step.state === 'PLANNING') {
                const next = windows.next();
                step = next.done ? { state: 'DONE' } : { state: 'HARVESTING', window: next.value };
                continue;
            }

            // The whole chunk is collected even when the target falls inside it.
            const chunk = await collectChunk(this.client, step.window, { chunkCap });
            accumulator = mergeChunk(accumulator, chunk.repositories);
            chunksProcessed += 1;
            if (chunk.aborted) chunksAborted += 1;
            if (chunk.rateBudget) rateBudget = chunk.rateBudget;

            console.log(`\n>>>> TOTAL UNIQUE REPOS COLLECTED SO FAR: ${accumulator.size} / ${targetCount} <<<<`);

            if (accumulator.size >= targetCount) {
                console.log(`\nTarget of ${targetCount} repositories reached. Stopping crawl.`);
                step = { state: 'DONE' };
            } else {
                step = { state: 'PLANNING' };
            }
        }

        const finalRepositories = truncateToTarget(accumulator, targetCount);
        console.log(`\nCrawl complete. Total unique repositories to be stored: ${finalRepositories.length}`);

        await this.store.saveBatch(finalRepositories);

        return {
            collected: accumulator.size,
            stored: finalRepositories.length,
            chunksProcessed,
            chunksAborted,
            rateBudget
        };
    }
}
