import { availableParallelism } from 'os';
import { describeError } from '../domain/errors';
import type { Logger } from '../domain/Logger';
import type { RepositoryRecord } from '../domain/RepositoryRecord';
import { describeIdentifier, type RepositoryIdentifier } from '../domain/types';
import type { RepositoryProcessor } from './ProcessRepository';

export interface CollectOptions {
    minContributors?: number;
    /** Workers running at once. Defaults to half the host's parallelism. */
    concurrency?: number;
}

export function defaultConcurrency(): number {
    return Math.max(1, Math.floor(availableParallelism() / 2));
}

/**
 * Runs the processor over every identifier with a bounded worker pool.
 * Records are kept in the order their processing settles; with a single
 * worker that is input order.
 */
export class CollectRepositories {
    private processor: RepositoryProcessor;
    private logger: Logger;

    constructor(processor: RepositoryProcessor, logger: Logger) {
        this.processor = processor;
        this.logger = logger;
    }

    async execute(identifiers: readonly RepositoryIdentifier[], options: CollectOptions = {}): Promise<RepositoryRecord[]> {
        const concurrency = options.concurrency ?? defaultConcurrency();
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
        }

        const records: RepositoryRecord[] = [];
        let excluded = 0;
        let unavailable = 0;
        let failed = 0;
        let cursor = 0;

        const next = async (): Promise<void> => {
            while (cursor < identifiers.length) {
                const index = cursor;
                cursor += 1;
                const identifier = identifiers[index];

                try {
                    const outcome = await this.processor.execute(identifier, options.minContributors);
                    if (outcome.status === 'included') {
                        records.push(outcome.record);
                    } else if (outcome.status === 'excluded') {
                        excluded += 1;
                    } else {
                        unavailable += 1;
                    }
                } catch (error) {
                    failed += 1;
                    this.logger.error(`Processing ${describeIdentifier(identifier)} failed: ${describeError(error)}`);
                }
            }
        };

        const workerCount = Math.min(concurrency, identifiers.length);
        this.logger.info(`Collecting ${identifiers.length} repositories with ${workerCount} workers...`);
        await Promise.all(Array.from({ length: workerCount }, () => next()));

        this.logger.info(
            `Collected ${records.length}/${identifiers.length} repositories ` +
            `(excluded: ${excluded}, unavailable: ${unavailable}, failed: ${failed})`
        );
        return records;
    }
}
