import { Pool, PoolClient } from 'pg';

const TAG = '[tx]';

export type TransactionWork<T> = (client: PoolClient) => Promise<T>;

/**
 * BEGIN/COMMIT around `work` on one pooled connection.
 * The original error is rethrown even when ROLLBACK fails too; a connection
 * whose rollback failed is discarded instead of going back to the pool.
 */
export class TransactionManager {
    constructor(private readonly pool: Pool) { }

    async run<T>(work: TransactionWork<T>): Promise<T> {
        const client = await this.pool.connect();
        let broken: Error | undefined;

        try {
            await client.query('BEGIN');
            const result = await work(client);
            await client.query('COMMIT');
            return result;
        } catch (err) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
                console.error(`${TAG} rollback failed, dropping connection:`, broken.message);
            }
            throw err;
        } finally {
            client.release(broken);
        }
    }
}
