import type { RepositoryRecord } from './RepositoryRecord';

export interface RepositoryStore {
    /**
     * Human readable target, used in log lines.
     */
    readonly description: string;

    /**
     * Saves or updates a batch of repository records.
     * @param records Records in output order
     */
    saveBatch(records: readonly RepositoryRecord[]): Promise<void>;

    /**
     * Prepare the target before the first write
     */
    initializeSchema(): Promise<void>;

    /**
     * Close connection
     */
    close(): Promise<void>;
}
