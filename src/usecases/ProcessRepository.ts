import type { GithubClient } from '../domain/GithubClient';
import type { Logger } from '../domain/Logger';
import { shapeRepositoryRecord, type ProcessOutcome } from '../domain/RepositoryRecord';
import { describeIdentifier, type ContributorCount, type RepositoryIdentifier, type Result } from '../domain/types';

export interface ContributorCounter {
    execute(identifier: RepositoryIdentifier): Promise<Result<ContributorCount>>;
}

export interface RepositoryProcessor {
    execute(identifier: RepositoryIdentifier, minContributors?: number): Promise<ProcessOutcome>;
}

/**
 * Builds the record of one repository: metadata first, then every other
 * sub-resource in parallel, then the contributor filter.
 */
export class ProcessRepository implements RepositoryProcessor {
    private client: GithubClient;
    private contributors: ContributorCounter;
    private logger: Logger;

    constructor(client: GithubClient, contributors: ContributorCounter, logger: Logger) {
        this.client = client;
        this.contributors = contributors;
        this.logger = logger;
    }

    async execute(identifier: RepositoryIdentifier, minContributors?: number): Promise<ProcessOutcome> {
        const label = describeIdentifier(identifier);

        const metadata = await this.client.fetchResource('metadata', identifier);
        if (!metadata.available) {
            const reason = `metadata not available (${metadata.reason ?? 'unknown reason'})`;
            this.logger.warn(`Skipping ${label}: ${reason}`);
            return { status: 'unavailable', identifier, reason };
        }

        const [languages, contributors, readme, topics, labels, commits, pulls] = await Promise.all([
            this.client.fetchResource('languages', identifier),
            this.contributors.execute(identifier),
            this.client.fetchResource('readme', identifier),
            this.client.fetchResource('topics', identifier),
            this.client.fetchResource('labels', identifier),
            this.client.fetchResource('commits', identifier),
            this.client.fetchResource('pulls', identifier),
        ]);

        const threshold = minContributors ?? null;
        if (!contributors.available) {
            this.logger.info(`Excluding ${label}: contributor count not available`);
            return { status: 'excluded', identifier, reason: 'contributor count not available', observed: null, threshold };
        }

        const { count, estimated } = contributors.value;
        if (minContributors !== undefined && count < minContributors) {
            const observed = `${estimated ? '~' : ''}${count}`;
            this.logger.info(`Excluding ${label}: ${observed} contributors, minimum is ${minContributors}`);
            return { status: 'excluded', identifier, reason: 'too few contributors', observed: count, threshold };
        }

        return {
            status: 'included',
            record: shapeRepositoryRecord({
                metadata: metadata.value,
                contributors: contributors.value,
                languages,
                readme,
                topics,
                labels,
                commits,
                pulls,
            }),
        };
    }
}
