import { Client } from 'pg';
import format from 'pg-format';
import type { Logger } from '../domain/Logger';
import type { RepositoryRecord } from '../domain/RepositoryRecord';
import type { RepositoryStore } from '../domain/RepositoryStore';
import { createConsoleLogger } from './ConsoleLogger';

export class PgRepositoryStore implements RepositoryStore {
    private client: Client;
    private logger: Logger;
    private connected = false;
    readonly description = 'PostgreSQL table repositories';

    constructor(connectionString: string, logger: Logger = createConsoleLogger('Store')) {
        this.client = new Client({ connectionString });
        this.logger = logger;
    }

    /** Connects on the first call. */
    async initializeSchema(): Promise<void> {
        if (!this.connected) {
            await this.client.connect();
            this.connected = true;
        }
        this.logger.info('Initializing DB Schema...');
        // Counters used for filtering are columns; the full record lives in JSONB.
        await this.client.query(`
            CREATE TABLE IF NOT EXISTS repositories (
                full_name VARCHAR(255) PRIMARY KEY,
                owner VARCHAR(255) NOT NULL,
                name VARCHAR(255) NOT NULL,
                stars INTEGER NOT NULL,
                contributors INTEGER NOT NULL,
                contributors_estimated BOOLEAN NOT NULL DEFAULT FALSE,
                record JSONB NOT NULL DEFAULT '{}'::jsonb,
                updated_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
            );

            CREATE INDEX IF NOT EXISTS idx_repo_stars ON repositories (stars DESC);
        `);
    }

    async saveBatch(records: readonly RepositoryRecord[]): Promise<void> {
        if (records.length === 0) return;

        // A single upsert cannot touch the same key twice; the last record wins.
        const latest = new Map(records.map(record => [record.full_name, record]));
        const values = [...latest.values()].map(record => [
            record.full_name,
            record.owner,
            record.name,
            record.stars,
            record.contributors.count,
            record.contributors.estimated,
            JSON.stringify(record),
        ]);

        const query = format(`
            INSERT INTO repositories (full_name, owner, name, stars, contributors, contributors_estimated, record)
            VALUES %L
            ON CONFLICT (full_name) DO UPDATE SET
                owner = EXCLUDED.owner,
                name = EXCLUDED.name,
                stars = EXCLUDED.stars,
                contributors = EXCLUDED.contributors,
                contributors_estimated = EXCLUDED.contributors_estimated,
                record = EXCLUDED.record,
                updated_at = CURRENT_TIMESTAMP
        `, values);

        await this.client.query(query);
        this.logger.info(`Upserted ${latest.size} repositories into PostgreSQL`);
    }

    async close(): Promise<void> {
        if (!this.connected) return;
        this.connected = false;
        await this.client.end();
    }
}
