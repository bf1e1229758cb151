import { GraphqlGithubClient } from './infrastructure/GraphqlGithubClient';
import { PgRepositoryStore } from './infrastructure/PgRepositoryStore';
import { loadEnv } from './shared/config/env';
import { CrawlStars, CrawlSummary } from './usecases/CrawlStars';

export async function runCrawl(env: NodeJS.ProcessEnv = process.env): Promise<CrawlSummary> {
    const config = loadEnv(env);

    console.log('Starting GitHub Crawler Application...');

    const githubClient = new GraphqlGithubClient(config.GITHUB_TOKEN, {
        endpoint: config.GITHUB_API_URL,
        pageSize: config.GITHUB_PAGE_SIZE,
        timeoutMs: config.GITHUB_TIMEOUT_MS,
        retry: { maxRetries: config.GITHUB_MAX_RETRIES, delayMs: config.GITHUB_RETRY_DELAY_MS }
    });
    const repositoryStore = PgRepositoryStore.fromConnectionString(config.PG_CONNECTION_STRING, {
        schema: config.PG_SCHEMA,
        batchSize: config.PG_BATCH_SIZE
    });

    const crawlStarsUseCase = new CrawlStars(githubClient, repositoryStore, {
        chunkCap: config.CRAWL_CHUNK_CAP,
        windowDays: config.CRAWL_WINDOW_DAYS,
        windowCount: config.CRAWL_WINDOW_COUNT
    });

    console.time('CrawlStars duration');
    try {
        return await crawlStarsUseCase.execute(config.CRAWL_TARGET_COUNT);
    } finally {
        console.timeEnd('CrawlStars duration');
        await repositoryStore.close();
    }
}

export { CrawlStars, GraphqlGithubClient, PgRepositoryStore, loadEnv };
