import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { Logger } from '../domain/Logger';
import type { RepositoryRecord } from '../domain/RepositoryRecord';
import type { RepositoryStore } from '../domain/RepositoryStore';
import { createConsoleLogger } from './ConsoleLogger';

/**
 * Writes the whole output collection as one JSON array, replacing the file.
 */
export class JsonFileRepositoryStore implements RepositoryStore {
    private filePath: string;
    private logger: Logger;

    constructor(filePath: string, logger: Logger = createConsoleLogger('Store')) {
        this.filePath = resolve(filePath);
        this.logger = logger;
    }

    get description(): string {
        return `JSON file ${this.filePath}`;
    }

    async initializeSchema(): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
    }

    async saveBatch(records: readonly RepositoryRecord[]): Promise<void> {
        await writeFile(this.filePath, `${JSON.stringify(records, null, 4)}\n`, 'utf8');
        this.logger.info(`Saved ${records.length} repositories to ${this.filePath}`);
    }

    async close(): Promise<void> {
        // Nothing held open between writes.
    }
}
