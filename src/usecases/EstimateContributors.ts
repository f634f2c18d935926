import type { GithubClient } from '../domain/GithubClient';
import type { Logger } from '../domain/Logger';
import { describeIdentifier, type ContributorCount, type RepositoryIdentifier, type Result } from '../domain/types';

export interface EstimationOptions {
    /** Contributors requested per page. */
    perPage: number;
    /** Pages fetched before switching to an estimate. */
    maxPages: number;
    /** Running total above which the count is estimated. */
    threshold: number;
}

export const DEFAULT_ESTIMATION_OPTIONS: EstimationOptions = {
    perPage: 100,
    maxPages: 10,
    threshold: 500,
};

/**
 * Counts contributors page by page. Large repositories stop early and get an
 * extrapolated count: the average page density times the page reached.
 */
export class EstimateContributors {
    private client: GithubClient;
    private options: EstimationOptions;
    private logger: Logger;

    constructor(client: GithubClient, options: Partial<EstimationOptions>, logger: Logger) {
        this.client = client;
        this.options = { ...DEFAULT_ESTIMATION_OPTIONS, ...options };
        this.logger = logger;

        const { perPage, maxPages, threshold } = this.options;
        if (!Number.isInteger(perPage) || perPage < 1 || perPage > 100) {
            throw new RangeError(`perPage must be an integer between 1 and 100, got ${perPage}`);
        }
        if (!Number.isInteger(maxPages) || maxPages < 1) {
            throw new RangeError(`maxPages must be a positive integer, got ${maxPages}`);
        }
        if (!Number.isInteger(threshold) || threshold < 0) {
            throw new RangeError(`threshold must be a non-negative integer, got ${threshold}`);
        }
    }

    async execute(identifier: RepositoryIdentifier): Promise<Result<ContributorCount>> {
        const { perPage, maxPages, threshold } = this.options;
        let total = 0;
        let page = 1;

        for (;;) {
            // Both limits need at least one fetched page to trip, so page - 1 >= 1 here.
            if (page > maxPages || total > threshold) {
                const count = Math.round((total / (page - 1)) * page);
                return { available: true, value: { count, estimated: true } };
            }

            const result = await this.client.fetchResource('contributors', identifier, { page, perPage });
            if (!result.available) {
                if (result.rateLimited) {
                    this.logger.warn(`Rate limited while counting contributors of ${describeIdentifier(identifier)} on page ${page}; giving up`);
                }
                return { available: false, reason: result.reason, rateLimited: result.rateLimited };
            }

            total += result.value.count;
            if (!result.value.hasNextPage) {
                return { available: true, value: { count: total, estimated: false } };
            }
            page += 1;
        }
    }
}
