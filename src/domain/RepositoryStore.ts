import { Repository } from './Repository';

export interface RepositoryStore {
    /**
     * Upserts the repositories keyed by id, atomically for the whole call.
     * @throws RepositoryWriteError when the write is rolled back
     */
    saveBatch(repositories: Repository[]): Promise<void>;

    /**
     * Initial schema setup
     */
    initializeSchema(): Promise<void>;

    /**
     * Close connection
     */
    close(): Promise<void>;
}
