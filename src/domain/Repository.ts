import { RepositoryId, RepositoryMetadata } from './types';

/**
 * Immutable entity for a harvested GitHub repository.
 * `nameWithOwner` and `stars` are null when the search node omits them.
 */
export class Repository {
    public readonly id: RepositoryId;
    public readonly nameWithOwner: string | null;
    public readonly stars: number | null;
    public readonly metadata: RepositoryMetadata;

    constructor(
        id: RepositoryId,
        nameWithOwner: string | null,
        stars: number | null,
        metadata: RepositoryMetadata = {}
    ) {
        this.id = id;
        this.nameWithOwner = nameWithOwner;
        this.stars = stars;
        this.metadata = metadata;
    }

    /**
     * Creates a new instance with updated properties (Immutability).
     */
    public copyWith(overrides: Partial<{ nameWithOwner: string | null, stars: number | null, metadata: RepositoryMetadata }>): Repository {
        return new Repository(
            this.id,
            overrides.nameWithOwner !== undefined ? overrides.nameWithOwner : this.nameWithOwner,
            overrides.stars !== undefined ? overrides.stars : this.stars,
            overrides.metadata ?? this.metadata
        );
    }
}
