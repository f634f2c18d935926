import type { SearchRequest } from './SearchQuery';
import type { PageRequest, RepositoryIdentifier, ResourceKind, Result, SubResourceResult } from './types';

export interface GithubClient {
    /**
     * Fetches one sub-resource of a repository.
     * Never rejects: transport and decoding failures come back as an unavailable result.
     * @param page - Only used by paginated kinds (contributors)
     */
    fetchResource<K extends ResourceKind>(
        kind: K,
        identifier: RepositoryIdentifier,
        page?: PageRequest
    ): Promise<SubResourceResult<K>>;

    /**
     * Runs a repository search, following pages until `maxResults` identifiers
     * are collected or results run out.
     */
    searchRepositories(request: SearchRequest): Promise<Result<RepositoryIdentifier[]>>;
}
