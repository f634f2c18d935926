import * as dotenv from 'dotenv';
import type { RepositoryStore } from './domain/RepositoryStore';
import { createConsoleLogger } from './infrastructure/ConsoleLogger';
import { collectionPlanOf, loadConfig, loadEnvironment } from './infrastructure/config';
import { createGithubSession } from './infrastructure/GithubSession';
import { JsonFileRepositoryStore } from './infrastructure/JsonFileRepositoryStore';
import { PgRepositoryStore } from './infrastructure/PgRepositoryStore';
import { RestGithubClient } from './infrastructure/RestGithubClient';
import { CollectRepositories } from './usecases/CollectRepositories';
import { CollectRepositoryMetadata } from './usecases/CollectRepositoryMetadata';
import { EstimateContributors } from './usecases/EstimateContributors';
import { ProcessRepository } from './usecases/ProcessRepository';

dotenv.config();

async function main() {
    const logger = createConsoleLogger('Collector');

    const environment = loadEnvironment(process.env, logger);
    if (!environment) {
        process.exitCode = 1;
        return;
    }
    if (!environment.GITHUB_TOKEN) {
        logger.error('Missing GITHUB_TOKEN environment variable. We need this to query the REST API.');
        process.exitCode = 1;
        return;
    }

    const config = await loadConfig(environment.CONFIG_PATH, logger);
    if (!config) {
        process.exitCode = 1;
        return;
    }

    logger.info('Starting repository metadata collection...');

    const session = createGithubSession({ token: environment.GITHUB_TOKEN, baseUrl: environment.GITHUB_API_URL });
    const githubClient = new RestGithubClient(session, { logger: createConsoleLogger('GitHub') });
    const estimator = new EstimateContributors(
        githubClient,
        {
            perPage: config.contributors.per_page,
            maxPages: config.contributors.max_pages,
            threshold: config.contributors.estimation_threshold,
        },
        createConsoleLogger('Contributors')
    );
    const collector = new CollectRepositories(new ProcessRepository(githubClient, estimator, logger), logger);

    const storeLogger = createConsoleLogger('Store');
    const stores: RepositoryStore[] = [new JsonFileRepositoryStore(config.output, storeLogger)];
    if (environment.PG_CONNECTION_STRING) {
        stores.push(new PgRepositoryStore(environment.PG_CONNECTION_STRING, storeLogger));
    }

    const collectMetadata = new CollectRepositoryMetadata(githubClient, collector, stores, logger);

    console.time('Collection duration');
    try {
        await collectMetadata.execute(collectionPlanOf(config));
    } finally {
        console.timeEnd('Collection duration');
    }
}

main().catch(err => {
    console.error(err);
    process.exit(1);
});
