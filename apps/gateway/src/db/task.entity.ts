import { Document, TaskError, TaskStatus } from '@taskgate/sdk';

export type { TaskStatus };

/**
 * A unit of work accepted by the gateway (row of gateway_tasks).
 * attempt_count is bumped on every claim; succeeded/failed rows never change again.
 */
export type TaskEntity = {
    id: string;
    topic: string;
    status: TaskStatus;
    payload: Document;
    result: Document | null;
    error: TaskError | null;
    attempt_count: number;
    max_attempts: number;
    idempotency_key: string | null;
    worker_id: string | null;   // current lease owner
    heartbeat_at: Date | null;  // lease renewal, for dead worker detection
    next_attempt_at: Date;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
};
