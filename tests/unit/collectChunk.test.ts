import { ChunkAbortedError } from '../../src/domain/errors';
import { collectChunk } from '../../src/usecases/collectChunk';
import { DateWindow } from '../../src/usecases/planDateWindows';
import { createScriptedClient, makePage, makeRepositories } from './helpers/fakes';

const window: DateWindow = {
    index: 0,
    start: '2024-01-01',
    end: '2024-01-31',
    query: 'is:public created:2024-01-01..2024-01-31'
};

describe('collectChunk', () => {
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        warnSpy.mockRestore();
    });

    it('collects every page until the source reports no more', async () => {
        const { client, calls } = createScriptedClient((_call, index) => index === 0
            ? makePage(makeRepositories('repo', 0, 100), { hasNextPage: true, nextCursor: 'c1' })
            : makePage(makeRepositories('repo', 100, 100), { rateBudget: { remaining: 4000, resetAt: null } }));

        const result = await collectChunk(client, window, { chunkCap: 1000 });

        expect(result.repositories.size).toBe(200);
        expect(result.pagesFetched).toBe(2);
        expect(result.aborted).toBe(false);
        expect(result.rateBudget).toEqual({ remaining: 4000, resetAt: null });
        expect(calls).toEqual([
            { query: window.query, cursor: null },
            { query: window.query, cursor: 'c1' }
        ]);
        expect(logSpy).toHaveBeenCalledWith('   ... collected 200 for this chunk.');
        expect(logSpy).toHaveBeenCalledWith('--- Finished chunk. Collected 200 unique repos. Rate limit at 4000. ---');
    });

    it('never returns more unique ids than the chunk cap', async () => {
        const { client, calls } = createScriptedClient((_call, index) =>
            makePage(makeRepositories('repo', index * 100, 100), { hasNextPage: true, nextCursor: `c${index + 1}` }));

        const result = await collectChunk(client, window, { chunkCap: 150 });

        expect(result.repositories.size).toBe(150);
        expect(calls).toHaveLength(2);
        expect(result.repositories.has('repo-149')).toBe(true);
        expect(result.repositories.has('repo-150')).toBe(false);
    });

    it('keeps the last-seen value for ids repeated across pages', async () => {
        const { client } = createScriptedClient((_call, index) => index === 0
            ? makePage(makeRepositories('repo', 0, 3, 10), { hasNextPage: true, nextCursor: 'c1' })
            : makePage(makeRepositories('repo', 2, 2, 20)));

        const result = await collectChunk(client, window, { chunkCap: 1000 });

        expect(Array.from(result.repositories.keys())).toEqual(['repo-0', 'repo-1', 'repo-2', 'repo-3']);
        expect(result.repositories.get('repo-1')?.stars).toBe(10);
        expect(result.repositories.get('repo-2')?.stars).toBe(20);
    });

    it('keeps partial-error pages, warns and continues paginating', async () => {
        const { client, calls } = createScriptedClient((_call, index) => index === 0
            ? makePage(makeRepositories('repo', 0, 50), { hasNextPage: true, nextCursor: 'c1', errors: ['TIMEOUT: partial results'] })
            : makePage(makeRepositories('repo', 50, 10)));

        const result = await collectChunk(client, window, { chunkCap: 1000 });

        expect(result.repositories.size).toBe(60);
        expect(calls).toHaveLength(2);
        expect(warnSpy).toHaveBeenCalledWith(
            `[GitHub] Partial errors on page 1 of '${window.query}': TIMEOUT: partial results`
        );
    });

    it('stops the chunk on an unusable response and keeps what was collected', async () => {
        const { client, calls } = createScriptedClient((_call, index) => {
            if (index === 0) return makePage(makeRepositories('repo', 0, 100), { hasNextPage: true, nextCursor: 'c1' });
            throw new ChunkAbortedError('GitHub search unusable: response has no data', { chunk: window.query });
        });

        const result = await collectChunk(client, window, { chunkCap: 1000 });

        expect(result.aborted).toBe(true);
        expect(result.repositories.size).toBe(100);
        expect(result.pagesFetched).toBe(1);
        expect(calls).toHaveLength(2);
        expect(warnSpy).toHaveBeenCalledWith(
            `[GitHub] Aborting chunk '${window.query}' at page 2: GitHub search unusable: response has no data. Keeping 100 collected.`
        );
    });

    it('propagates errors that are not chunk aborts', async () => {
        const { client } = createScriptedClient(() => {
            throw new Error('unexpected');
        });

        await expect(collectChunk(client, window, { chunkCap: 1000 })).rejects.toThrow('unexpected');
    });

    it('ends the chunk when more pages are reported without a cursor', async () => {
        const { client, calls } = createScriptedClient(() =>
            makePage(makeRepositories('repo', 0, 5), { hasNextPage: true, nextCursor: null, rateBudget: null }));

        const result = await collectChunk(client, window, { chunkCap: 1000 });

        expect(calls).toHaveLength(1);
        expect(result.repositories.size).toBe(5);
        expect(result.rateBudget).toBeNull();
        expect(logSpy).toHaveBeenCalledWith('--- Finished chunk. Collected 5 unique repos. Rate limit at unknown. ---');
    });
});
