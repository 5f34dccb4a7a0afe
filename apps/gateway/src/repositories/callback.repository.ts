import { Pool } from 'pg';
import { v7 as uuid } from 'uuid';
import { Document } from '@taskgate/sdk';
import { CallbackEntity } from '../db/callback.entity';

export interface NewCallback {
    source: string;
    correlationKey: string;
    payloadHash: string;
    rawPayload: Document;
}

export interface StoredCallback {
    record: CallbackEntity;
    /** true when an identical payload for the same key was already stored */
    duplicate: boolean;
}

export interface CallbackStore {
    insert(input: NewCallback): Promise<StoredCallback>;
    findById(id: string): Promise<CallbackEntity | null>;
    findByCorrelationKey(source: string, correlationKey: string): Promise<CallbackEntity[]>;
    /** Not yet signalled, not expired, received after `since`. Least recently tried first. */
    findUnmatched(since: Date, limit: number): Promise<CallbackEntity[]>;
    markUnmatched(id: string, lastError: string | null): Promise<void>;
    /** Conditional on signal_sent = false; returns whether this call set it. */
    markSignalled(id: string): Promise<boolean>;
    expireUnmatched(receivedBefore: Date): Promise<number>;
}

export class CallbackRepository implements CallbackStore {
    constructor(private readonly pool: Pool) { }

    async insert(input: NewCallback): Promise<StoredCallback> {
        const res = await this.pool.query<CallbackEntity>(
            `INSERT INTO gateway_callbacks (id, source, correlation_key, payload_hash, raw_payload)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (source, correlation_key, payload_hash) DO NOTHING
             RETURNING *`,
            [uuid(), input.source, input.correlationKey, input.payloadHash, JSON.stringify(input.rawPayload)],
        );
        if (res.rows[0]) return { record: res.rows[0], duplicate: false };

        const existing = await this.pool.query<CallbackEntity>(
            `SELECT * FROM gateway_callbacks
             WHERE source = $1 AND correlation_key = $2 AND payload_hash = $3`,
            [input.source, input.correlationKey, input.payloadHash],
        );
        const record = existing.rows[0];
        if (!record) throw new Error(`Callback (${input.source}, ${input.correlationKey}) vanished after conflict`);
        return { record, duplicate: true };
    }

    async findById(id: string): Promise<CallbackEntity | null> {
        const res = await this.pool.query<CallbackEntity>('SELECT * FROM gateway_callbacks WHERE id = $1', [id]);
        return res.rows[0] || null;
    }

    async findByCorrelationKey(source: string, correlationKey: string): Promise<CallbackEntity[]> {
        const res = await this.pool.query<CallbackEntity>(
            `SELECT * FROM gateway_callbacks
             WHERE source = $1 AND correlation_key = $2
             ORDER BY received_at ASC`,
            [source, correlationKey],
        );
        return res.rows;
    }

    async findUnmatched(since: Date, limit: number): Promise<CallbackEntity[]> {
        const res = await this.pool.query<CallbackEntity>(
            `SELECT * FROM gateway_callbacks
             WHERE signal_sent = FALSE AND expired_at IS NULL AND received_at >= $1
             ORDER BY processed_at ASC NULLS FIRST, received_at ASC
             LIMIT $2`,
            [since, limit],
        );
        return res.rows;
    }

    async markUnmatched(id: string, lastError: string | null): Promise<void> {
        await this.pool.query(
            `UPDATE gateway_callbacks
             SET processed = TRUE, attempts = attempts + 1, last_error = $2, processed_at = NOW()
             WHERE id = $1 AND signal_sent = FALSE`,
            [id, lastError],
        );
    }

    async markSignalled(id: string): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE gateway_callbacks
             SET processed = TRUE, signal_sent = TRUE, attempts = attempts + 1, last_error = NULL,
                 processed_at = NOW(), signalled_at = NOW()
             WHERE id = $1 AND signal_sent = FALSE`,
            [id],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async expireUnmatched(receivedBefore: Date): Promise<number> {
        const res = await this.pool.query(
            `UPDATE gateway_callbacks
             SET processed = TRUE, expired_at = NOW()
             WHERE signal_sent = FALSE AND expired_at IS NULL AND received_at < $1`,
            [receivedBefore],
        );
        return res.rowCount ?? 0;
    }
}
