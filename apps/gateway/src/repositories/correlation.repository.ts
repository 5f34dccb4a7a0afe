import { Pool } from 'pg';
import { PendingCorrelationEntity } from '../db/pending-correlation.entity';

export interface NewPendingCorrelation {
    source: string;
    correlationKey: string;
    processInstanceId?: string;
    businessKey?: string;
    messageName?: string;
}

export interface PendingCorrelationStore {
    /** Upsert: re-registering a key points it at the latest waiting instance. */
    register(input: NewPendingCorrelation): Promise<PendingCorrelationEntity>;
    find(source: string, correlationKey: string): Promise<PendingCorrelationEntity | null>;
    /** Atomically removes and returns the entry; only one caller can win it. */
    consume(source: string, correlationKey: string): Promise<PendingCorrelationEntity | null>;
    /** Puts a consumed entry back after a failed resume signal. */
    restore(entry: PendingCorrelationEntity): Promise<void>;
    remove(source: string, correlationKey: string): Promise<boolean>;
}

export class CorrelationRepository implements PendingCorrelationStore {
    constructor(private readonly pool: Pool) { }

    async register(input: NewPendingCorrelation): Promise<PendingCorrelationEntity> {
        const res = await this.pool.query<PendingCorrelationEntity>(
            `INSERT INTO gateway_pending_correlations
                 (source, correlation_key, process_instance_id, business_key, message_name)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (source, correlation_key) DO UPDATE
             SET process_instance_id = EXCLUDED.process_instance_id,
                 business_key = EXCLUDED.business_key,
                 message_name = EXCLUDED.message_name,
                 created_at = NOW()
             RETURNING *`,
            [
                input.source,
                input.correlationKey,
                input.processInstanceId ?? null,
                input.businessKey ?? null,
                input.messageName ?? null,
            ],
        );
        const row = res.rows[0];
        if (!row) throw new Error(`Pending correlation ${input.correlationKey} was not stored`);
        return row;
    }

    async find(source: string, correlationKey: string): Promise<PendingCorrelationEntity | null> {
        const res = await this.pool.query<PendingCorrelationEntity>(
            'SELECT * FROM gateway_pending_correlations WHERE source = $1 AND correlation_key = $2',
            [source, correlationKey],
        );
        return res.rows[0] || null;
    }

    async consume(source: string, correlationKey: string): Promise<PendingCorrelationEntity | null> {
        const res = await this.pool.query<PendingCorrelationEntity>(
            `DELETE FROM gateway_pending_correlations
             WHERE source = $1 AND correlation_key = $2
             RETURNING *`,
            [source, correlationKey],
        );
        return res.rows[0] || null;
    }

    async restore(entry: PendingCorrelationEntity): Promise<void> {
        await this.pool.query(
            `INSERT INTO gateway_pending_correlations
                 (source, correlation_key, process_instance_id, business_key, message_name, created_at)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (source, correlation_key) DO NOTHING`,
            [
                entry.source,
                entry.correlation_key,
                entry.process_instance_id,
                entry.business_key,
                entry.message_name,
                entry.created_at,
            ],
        );
    }

    async remove(source: string, correlationKey: string): Promise<boolean> {
        const res = await this.pool.query(
            'DELETE FROM gateway_pending_correlations WHERE source = $1 AND correlation_key = $2',
            [source, correlationKey],
        );
        return (res.rowCount ?? 0) > 0;
    }
}
