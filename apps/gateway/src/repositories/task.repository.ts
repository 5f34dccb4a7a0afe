import { Pool } from 'pg';
import { v7 as uuid } from 'uuid';
import { Document, ErrorCodes, TaskError, TaskStatistics, emptyStatusCounts } from '@taskgate/sdk';
import { TaskEntity, TaskStatus } from '../db/task.entity';

export interface NewTask {
    topic: string;
    payload: Document;
    maxAttempts: number;
    idempotencyKey?: string;
    /** Set to record the task as already failed (rejected input). */
    failure?: TaskError;
}

export interface CreatedTask {
    task: TaskEntity;
    /** false when a live task with the same idempotency key was returned instead */
    created: boolean;
}

export interface ReclaimedTask {
    id: string;
    topic: string;
    attempt_count: number;
    action: 'requeued' | 'failed';
}

export interface TaskFilter {
    status?: TaskStatus;
    topic?: string;
    limit: number;
    offset: number;
}

export interface StatusTopicCount {
    status: TaskStatus;
    topic: string;
    count: number;
}

/**
 * Durable task state. Every transition out of in_progress is conditional on
 * the caller still owning the lease, so a reclaimed worker cannot overwrite
 * the outcome of the worker that replaced it.
 */
export interface TaskStore {
    create(input: NewTask): Promise<CreatedTask>;
    findById(id: string): Promise<TaskEntity | null>;
    /** Newest first. */
    list(filter: TaskFilter): Promise<TaskEntity[]>;
    statistics(): Promise<TaskStatistics>;
    /** pending/retrying → in_progress if due; null when another dispatcher won. */
    claim(id: string, workerId: string): Promise<TaskEntity | null>;
    claimBatch(limit: number, workerId: string): Promise<TaskEntity[]>;
    renewLease(id: string, workerId: string): Promise<boolean>;
    markSucceeded(id: string, workerId: string, result: Document): Promise<boolean>;
    markRetrying(id: string, workerId: string, error: TaskError, delayMs: number): Promise<boolean>;
    markFailed(id: string, workerId: string, error: TaskError): Promise<boolean>;
    reclaimExpired(leaseTimeoutSeconds: number): Promise<ReclaimedTask[]>;
}

const LIVE = `('pending', 'in_progress', 'retrying')`;

export class TaskRepository implements TaskStore {
    constructor(private readonly pool: Pool) { }

    async create(input: NewTask): Promise<CreatedTask> {
        // The partial unique index admits one live row per key; on conflict the
        // live row is returned. A second pass covers it finishing in between.
        for (let pass = 0; pass < 2; pass++) {
            const res = await this.pool.query<TaskEntity>(
                `INSERT INTO gateway_tasks (id, topic, payload, status, max_attempts, idempotency_key, error, completed_at)
                 VALUES ($1, $2, $3, $4, $5, $6, $7, CASE WHEN $4::text = 'failed' THEN NOW() END)
                 ON CONFLICT (idempotency_key) WHERE idempotency_key IS NOT NULL AND status IN ${LIVE} DO NOTHING
                 RETURNING *`,
                [
                    uuid(),
                    input.topic,
                    JSON.stringify(input.payload),
                    input.failure ? 'failed' : 'pending',
                    input.maxAttempts,
                    input.idempotencyKey ?? null,
                    input.failure ? JSON.stringify(input.failure) : null,
                ],
            );
            const inserted = res.rows[0];
            if (inserted) return { task: inserted, created: true };

            const existing = await this.pool.query<TaskEntity>(
                `SELECT * FROM gateway_tasks WHERE idempotency_key = $1 AND status IN ${LIVE} LIMIT 1`,
                [input.idempotencyKey],
            );
            if (existing.rows[0]) return { task: existing.rows[0], created: false };
        }
        throw new Error(`Could not create task for idempotency key ${input.idempotencyKey}`);
    }

    async findById(id: string): Promise<TaskEntity | null> {
        const res = await this.pool.query<TaskEntity>('SELECT * FROM gateway_tasks WHERE id = $1', [id]);
        return res.rows[0] || null;
    }

    async list(filter: TaskFilter): Promise<TaskEntity[]> {
        const conditions: string[] = [];
        const params: unknown[] = [];
        if (filter.status) {
            params.push(filter.status);
            conditions.push(`status = $${params.length}`);
        }
        if (filter.topic) {
            params.push(filter.topic);
            conditions.push(`topic = $${params.length}`);
        }
        params.push(filter.limit, filter.offset);
        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

        const res = await this.pool.query<TaskEntity>(
            `SELECT * FROM gateway_tasks ${where}
             ORDER BY created_at DESC, id DESC
             LIMIT $${params.length - 1} OFFSET $${params.length}`,
            params,
        );
        return res.rows;
    }

    async statistics(): Promise<TaskStatistics> {
        const res = await this.pool.query<StatusTopicCount>(
            'SELECT status, topic, COUNT(*)::int AS count FROM gateway_tasks GROUP BY status, topic',
        );
        return summarize(res.rows);
    }

    async claim(id: string, workerId: string): Promise<TaskEntity | null> {
        const res = await this.pool.query<TaskEntity>(
            `UPDATE gateway_tasks
             SET status = 'in_progress',
                 attempt_count = attempt_count + 1,
                 worker_id = $2,
                 heartbeat_at = NOW(),
                 updated_at = NOW()
             WHERE id = $1
               AND status IN ('pending', 'retrying')
               AND next_attempt_at <= NOW()
             RETURNING *`,
            [id, workerId],
        );
        return res.rows[0] || null;
    }

    async claimBatch(limit: number, workerId: string): Promise<TaskEntity[]> {
        const query = `
            WITH next_tasks AS (
                SELECT id FROM gateway_tasks
                WHERE status IN ('pending', 'retrying') AND next_attempt_at <= NOW()
                ORDER BY next_attempt_at ASC, created_at ASC
                LIMIT $1
                FOR UPDATE SKIP LOCKED
            )
            UPDATE gateway_tasks
            SET
                status = 'in_progress',
                attempt_count = gateway_tasks.attempt_count + 1,
                worker_id = $2,
                heartbeat_at = NOW(),
                updated_at = NOW()
            FROM next_tasks
            WHERE gateway_tasks.id = next_tasks.id
            RETURNING gateway_tasks.*
        `;
        const res = await this.pool.query<TaskEntity>(query, [limit, workerId]);
        return res.rows;
    }

    async renewLease(id: string, workerId: string): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE gateway_tasks SET heartbeat_at = NOW()
             WHERE id = $1 AND worker_id = $2 AND status = 'in_progress'`,
            [id, workerId],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async markSucceeded(id: string, workerId: string, result: Document): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE gateway_tasks
             SET status = 'succeeded', result = $3, error = NULL, worker_id = NULL,
                 completed_at = NOW(), updated_at = NOW()
             WHERE id = $1 AND worker_id = $2 AND status = 'in_progress'`,
            [id, workerId, JSON.stringify(result)],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async markRetrying(id: string, workerId: string, error: TaskError, delayMs: number): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE gateway_tasks
             SET status = 'retrying',
                 error = $3,
                 next_attempt_at = NOW() + ($4 || ' milliseconds')::INTERVAL,
                 worker_id = NULL,
                 heartbeat_at = NULL,
                 updated_at = NOW()
             WHERE id = $1 AND worker_id = $2 AND status = 'in_progress'`,
            [id, workerId, JSON.stringify(error), delayMs],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async markFailed(id: string, workerId: string, error: TaskError): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE gateway_tasks
             SET status = 'failed', error = $3, worker_id = NULL,
                 completed_at = NOW(), updated_at = NOW()
             WHERE id = $1 AND worker_id = $2 AND status = 'in_progress'`,
            [id, workerId, JSON.stringify(error)],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async reclaimExpired(leaseTimeoutSeconds: number): Promise<ReclaimedTask[]> {
        const requeued = await this.pool.query<Omit<ReclaimedTask, 'action'>>(
            `UPDATE gateway_tasks
             SET status = 'pending', worker_id = NULL, heartbeat_at = NULL,
                 next_attempt_at = NOW(), updated_at = NOW()
             WHERE status = 'in_progress'
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $1)
               AND attempt_count < max_attempts
             RETURNING id, topic, attempt_count`,
            [leaseTimeoutSeconds],
        );

        const leaseExpired: TaskError = {
            code: ErrorCodes.LEASE_EXPIRED,
            class: 'infrastructure',
            message: 'Task lease expired after its last permitted attempt',
        };
        const failed = await this.pool.query<Omit<ReclaimedTask, 'action'>>(
            `UPDATE gateway_tasks
             SET status = 'failed', error = $2, worker_id = NULL,
                 completed_at = NOW(), updated_at = NOW()
             WHERE status = 'in_progress'
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $1)
               AND attempt_count >= max_attempts
             RETURNING id, topic, attempt_count`,
            [leaseTimeoutSeconds, JSON.stringify(leaseExpired)],
        );

        return [
            ...requeued.rows.map(row => ({ ...row, action: 'requeued' as const })),
            ...failed.rows.map(row => ({ ...row, action: 'failed' as const })),
        ];
    }
}

export function summarize(counts: StatusTopicCount[]): TaskStatistics {
    const byStatus = emptyStatusCounts();
    const byTopic: Record<string, number> = {};
    let total = 0;
    for (const { status, topic, count } of counts) {
        byStatus[status] += count;
        byTopic[topic] = (byTopic[topic] ?? 0) + count;
        total += count;
    }
    // percentage with two decimals
    const successRate = total > 0 ? Math.round((byStatus.succeeded / total) * 10000) / 100 : 0;
    return { total, byStatus, byTopic, successRate };
}
