import { Pool } from 'pg';
import format from 'pg-format';
import { RepositoryWriteError } from '../domain/errors';
import { Repository } from '../domain/Repository';
import { RepositoryStore } from '../domain/RepositoryStore';
import { RepositoryId } from '../domain/types';

/**
 * The slice of a pg pool the store relies on. `pg.Pool` satisfies it.
 */
export interface PgSession {
    query(text: string): Promise<unknown>;
    release(err?: Error | boolean): void;
}

export interface PgConnectionSource {
    connect(): Promise<PgSession>;
    end(): Promise<void>;
}

export interface PgRepositoryStoreOptions {
    schema?: string;
    batchSize?: number;
}

export const dedupeRepositoriesById = (repositories: Repository[]): Repository[] => {
    const byId = new Map<RepositoryId, Repository>();
    for (const repository of repositories) {
        byId.set(repository.id, repository);
    }
    return Array.from(byId.values());
};

export class PgRepositoryStore implements RepositoryStore {
    private pool: PgConnectionSource;
    private schema: string;
    private batchSize: number;

    constructor(pool: PgConnectionSource, options: PgRepositoryStoreOptions = {}) {
        this.pool = pool;
        this.schema = options.schema ?? 'github_data';
        this.batchSize = options.batchSize ?? 500;
        if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
            throw new Error(`batchSize=${String(this.batchSize)} must be an integer >= 1`);
        }
    }

    static fromConnectionString(connectionString: string, options: PgRepositoryStoreOptions = {}): PgRepositoryStore {
        return new PgRepositoryStore(new Pool({ connectionString }), options);
    }

    private get table(): string {
        return format('%I.repositories', this.schema);
    }

    async initializeSchema(): Promise<void> {
        console.log('Initializing DB Schema...');
        const session = await this.pool.connect();
        try {
            await session.query(format(`
                CREATE SCHEMA IF NOT EXISTS %I;

                CREATE TABLE IF NOT EXISTS %s (
                    id VARCHAR(255) PRIMARY KEY,
                    name_with_owner VARCHAR(255),
                    stars INTEGER,
                    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
                    first_seen_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
                    crawled_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
                );

                -- Index on stars for fast sorting / analytics
                CREATE INDEX IF NOT EXISTS idx_repo_stars ON %s (stars DESC);
            `, this.schema, this.table, this.table));
        } finally {
            session.release();
        }
    }

    buildUpsertQuery(repositories: Repository[]): string {
        const values = repositories.map(repo => [
            repo.id,
            repo.nameWithOwner,
            repo.stars,
            JSON.stringify(repo.metadata)
        ]);

        return format(`
            INSERT INTO %s (id, name_with_owner, stars, metadata)
            VALUES %L
            ON CONFLICT (id) DO UPDATE SET
                name_with_owner = EXCLUDED.name_with_owner,
                stars = EXCLUDED.stars,
                metadata = %s.metadata || EXCLUDED.metadata,
                crawled_at = NOW()
        `, this.table, values, this.table);
    }

    /**
     * Upserts in sub-batches inside a single transaction; a failure in any
     * sub-batch rolls back the whole call.
     */
    async saveBatch(repositories: Repository[]): Promise<void> {
        if (repositories.length === 0) {
            console.log('No repositories to store.');
            return;
        }

        const unique = dedupeRepositoriesById(repositories);

        console.log('\nConnecting to the database...');
        let session: PgSession;
        try {
            session = await this.pool.connect();
        } catch (error) {
            throw new RepositoryWriteError(error, { stage: 'connect' });
        }

        let batch = 0;
        let releaseError: Error | undefined;
        try {
            await session.query('BEGIN');
            for (let offset = 0; offset < unique.length; offset += this.batchSize) {
                batch += 1;
                await session.query(this.buildUpsertQuery(unique.slice(offset, offset + this.batchSize)));
            }
            await session.query('COMMIT');
            console.log(`Successfully inserted/updated ${unique.length} records in the database.`);
        } catch (error) {
            try {
                await session.query('ROLLBACK');
            } catch (rollbackError) {
                // A connection that cannot roll back is discarded rather than returned to the pool.
                releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
            }
            throw new RepositoryWriteError(error, { batch });
        } finally {
            session.release(releaseError);
            console.log('Database connection released.');
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
