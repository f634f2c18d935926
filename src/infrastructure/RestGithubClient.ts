import type { z } from 'zod';
import { describeError } from '../domain/errors';
import type { GithubClient } from '../domain/GithubClient';
import type { Logger } from '../domain/Logger';
import type { SearchRequest } from '../domain/SearchQuery';
import {
    describeIdentifier,
    type PageRequest,
    type RepositoryIdentifier,
    type ResourceKind,
    type ResourceValues,
    type Result,
    type SubResourceResult,
    type Unavailable,
} from '../domain/types';
import { createConsoleLogger } from './ConsoleLogger';
import type { GithubSession } from './GithubSession';
import { languagesSchema, listSchema, repositorySchema, searchResponseSchema, topicsSchema } from './githubSchemas';

const JSON_ACCEPT = 'application/vnd.github+json';
const RAW_ACCEPT = 'application/vnd.github.raw+json';
const DEFAULT_PER_PAGE = 100;
const MAX_PER_PAGE = 100;
// Search never returns results past the first 1000 matches.
const SEARCH_RESULT_WINDOW = 1000;

interface ResourceEndpoint<K extends ResourceKind> {
    readonly accept: string;
    path(identifier: RepositoryIdentifier, page: PageRequest): string;
    decode(response: Response): Promise<ResourceValues[K]>;
}

export function parseLinkHeader(header: string | null): Record<string, string> {
    const links: Record<string, string> = {};
    if (!header) return links;

    for (const part of header.split(',')) {
        const match = part.trim().match(/<([^>]+)>\s*;\s*rel="([^"]+)"/);
        if (match) {
            links[match[2]] = match[1];
        }
    }
    return links;
}

export function isRateLimitStatus(status: number): boolean {
    return status === 403 || status === 429;
}

function repoPath(identifier: RepositoryIdentifier): string {
    return `/repos/${encodeURIComponent(identifier.owner)}/${encodeURIComponent(identifier.name)}`;
}

async function readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return schema.parse(await response.json());
}

/**
 * Total item count of a list endpoint requested with `per_page=1`:
 * the page number of the `last` link, or the body length when everything fits.
 */
async function countPaginated(response: Response): Promise<number> {
    const last = parseLinkHeader(response.headers.get('link')).last;
    if (last !== undefined) {
        const page = Number(new URL(last).searchParams.get('page'));
        if (Number.isInteger(page) && page > 0) {
            await response.body?.cancel();
            return page;
        }
    }
    return (await readJson(response, listSchema)).length;
}

type ResourceEndpoints = { [K in ResourceKind]: ResourceEndpoint<K> };

const RESOURCE_ENDPOINTS: ResourceEndpoints = {
    metadata: {
        accept: JSON_ACCEPT,
        path: identifier => repoPath(identifier),
        decode: async response => {
            const repo = await readJson(response, repositorySchema);
            return {
                name: repo.name,
                owner: repo.owner.login,
                fullName: repo.full_name,
                description: repo.description,
                url: repo.html_url,
                stars: repo.stargazers_count,
                watchers: repo.watchers_count,
                forks: repo.forks_count,
                openIssues: repo.open_issues_count,
                defaultBranch: repo.default_branch,
            };
        },
    },
    languages: {
        accept: JSON_ACCEPT,
        path: identifier => `${repoPath(identifier)}/languages`,
        decode: response => readJson(response, languagesSchema),
    },
    contributors: {
        accept: JSON_ACCEPT,
        path: (identifier, page) =>
            `${repoPath(identifier)}/contributors?per_page=${page.perPage ?? DEFAULT_PER_PAGE}&page=${page.page ?? 1}`,
        decode: async response => {
            // Empty repositories answer 204 without a body.
            if (response.status === 204) return { count: 0, hasNextPage: false };
            const contributors = await readJson(response, listSchema);
            return {
                count: contributors.length,
                hasNextPage: parseLinkHeader(response.headers.get('link')).next !== undefined,
            };
        },
    },
    readme: {
        accept: RAW_ACCEPT,
        path: identifier => `${repoPath(identifier)}/readme`,
        decode: response => response.text(),
    },
    topics: {
        accept: JSON_ACCEPT,
        path: identifier => `${repoPath(identifier)}/topics`,
        decode: async response => (await readJson(response, topicsSchema)).names,
    },
    labels: {
        accept: JSON_ACCEPT,
        path: identifier => `${repoPath(identifier)}/labels?per_page=1`,
        decode: countPaginated,
    },
    commits: {
        accept: JSON_ACCEPT,
        path: identifier => `${repoPath(identifier)}/commits?per_page=1`,
        decode: countPaginated,
    },
    pulls: {
        accept: JSON_ACCEPT,
        path: identifier => `${repoPath(identifier)}/pulls?state=all&per_page=1`,
        decode: countPaginated,
    },
};

export interface RestGithubClientOptions {
    fetchImpl?: typeof fetch;
    logger?: Logger;
}

/**
 * REST implementation of the resource fetcher. Holds no state besides the
 * shared session, so one instance can serve every worker.
 */
export class RestGithubClient implements GithubClient {
    private session: GithubSession;
    private fetchImpl: typeof fetch;
    private logger: Logger;

    constructor(session: GithubSession, options: RestGithubClientOptions = {}) {
        this.session = session;
        this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
        this.logger = options.logger ?? createConsoleLogger('GitHub');
    }

    private async request(url: string, accept: string): Promise<Result<Response>> {
        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method: 'GET',
                headers: { ...this.session.headers, Accept: accept },
            });
        } catch (error) {
            return { available: false, reason: `network error: ${describeError(error)}` };
        }

        if (!response.ok) {
            await response.body?.cancel();
            return {
                available: false,
                reason: `HTTP ${response.status}`,
                rateLimited: isRateLimitStatus(response.status),
            };
        }
        return { available: true, value: response };
    }

    async fetchResource<K extends ResourceKind>(
        kind: K,
        identifier: RepositoryIdentifier,
        page: PageRequest = {}
    ): Promise<SubResourceResult<K>> {
        const endpoint: ResourceEndpoint<K> = RESOURCE_ENDPOINTS[kind];
        const url = `${this.session.baseUrl}${endpoint.path(identifier, page)}`;

        const response = await this.request(url, endpoint.accept);
        if (!response.available) {
            return this.unavailable(kind, identifier, response);
        }

        try {
            const value = await endpoint.decode(response.value);
            return { kind, available: true, value };
        } catch (error) {
            return this.unavailable(kind, identifier, {
                available: false,
                reason: `undecodable body: ${describeError(error)}`,
            });
        }
    }

    private unavailable<K extends ResourceKind>(
        kind: K,
        identifier: RepositoryIdentifier,
        failure: Unavailable
    ): SubResourceResult<K> {
        this.logger.warn(`${kind} not available for ${describeIdentifier(identifier)}: ${failure.reason}`);
        return { kind, ...failure };
    }

    async searchRepositories(request: SearchRequest): Promise<Result<RepositoryIdentifier[]>> {
        const perPage = Math.min(request.perPage, MAX_PER_PAGE);
        const identifiers: RepositoryIdentifier[] = [];
        let page = 1;

        while (identifiers.length < request.maxResults) {
            const params = new URLSearchParams({
                q: request.query,
                order: request.order,
                per_page: String(perPage),
                page: String(page),
            });
            if (request.sort !== 'best-match') {
                params.set('sort', request.sort);
            }

            const response = await this.request(
                `${this.session.baseUrl}/search/repositories?${params.toString()}`,
                JSON_ACCEPT
            );
            if (!response.available) {
                this.logger.error(`Search failed on page ${page}: ${response.reason}`);
                return response;
            }

            let items: { name: string; owner: { login: string } }[];
            try {
                items = (await readJson(response.value, searchResponseSchema)).items;
            } catch (error) {
                const reason = `undecodable body: ${describeError(error)}`;
                this.logger.error(`Search failed on page ${page}: ${reason}`);
                return { available: false, reason };
            }

            for (const item of items.slice(0, request.maxResults - identifiers.length)) {
                identifiers.push({ owner: item.owner.login, name: item.name });
            }

            if (items.length < perPage || page * perPage >= SEARCH_RESULT_WINDOW) break;
            page += 1;
        }

        this.logger.info(`Search returned ${identifiers.length} repositories for "${request.query}"`);
        return { available: true, value: identifiers };
    }
}
