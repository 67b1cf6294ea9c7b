import { Pool, PoolClient } from 'pg';

/**
 * Runs multi-statement writes atomically with automatic rollback on errors.
 */
export class TransactionManager {
    constructor(private pool: Pool) { }

    /**
     * Executes a callback within a database transaction.
     * Commits on success, rolls back and re-throws on error.
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('INSERT INTO orchestration_history ...');
     *   await client.query('UPDATE orchestration_instances ...');
     * });
     */
    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
