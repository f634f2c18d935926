import type { CollectionPlan } from '../domain/CollectionPlan';
import { describeError } from '../domain/errors';
import type { GithubClient } from '../domain/GithubClient';
import type { Logger } from '../domain/Logger';
import type { RepositoryRecord } from '../domain/RepositoryRecord';
import type { RepositoryStore } from '../domain/RepositoryStore';
import { buildSearchQuery } from '../domain/SearchQuery';
import type { CollectRepositories } from './CollectRepositories';

/**
 * One full run: search, collect every hit, write the result to each store.
 */
export class CollectRepositoryMetadata {
    private client: GithubClient;
    private collector: CollectRepositories;
    private stores: readonly RepositoryStore[];
    private logger: Logger;

    constructor(
        client: GithubClient,
        collector: CollectRepositories,
        stores: readonly RepositoryStore[],
        logger: Logger
    ) {
        this.client = client;
        this.collector = collector;
        this.stores = stores;
        this.logger = logger;
    }

    /**
     * @returns the collected records, or null when the search produced nothing to collect
     */
    async execute(plan: CollectionPlan): Promise<RepositoryRecord[] | null> {
        try {
            const records = await this.collect(plan);
            if (records !== null) {
                for (const store of this.stores) {
                    await this.persist(store, records);
                }
            }
            return records;
        } finally {
            for (const store of this.stores) {
                await this.close(store);
            }
        }
    }

    private async collect(plan: CollectionPlan): Promise<RepositoryRecord[] | null> {
        const query = buildSearchQuery(plan.filters, plan.keywords);
        this.logger.info(`Searching repositories: ${query}`);

        const search = await this.client.searchRepositories({
            query,
            sort: plan.sort,
            order: plan.order,
            perPage: plan.perPage,
            maxResults: plan.maxResults,
        });
        if (!search.available) {
            this.logger.error(`Search failed: ${search.reason ?? 'unknown reason'}`);
            return null;
        }
        if (search.value.length === 0) {
            this.logger.warn('No repositories found.');
            return null;
        }

        return this.collector.execute(search.value, {
            minContributors: plan.minContributors,
            concurrency: plan.concurrency,
        });
    }

    private async persist(store: RepositoryStore, records: readonly RepositoryRecord[]): Promise<void> {
        try {
            await store.initializeSchema();
            await store.saveBatch(records);
        } catch (error) {
            this.logger.error(`Saving to ${store.description} failed: ${describeError(error)}`);
        }
    }

    private async close(store: RepositoryStore): Promise<void> {
        try {
            await store.close();
        } catch (error) {
            this.logger.error(`Closing ${store.description} failed: ${describeError(error)}`);
        }
    }
}
