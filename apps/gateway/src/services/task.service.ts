import { validate as isUuid } from 'uuid';
import {
    ErrorCodes,
    HandlerRegistry,
    InfrastructureError,
    SubmitTaskInput,
    SubmitTaskResult,
    TaskGateway,
    TaskInspector,
    TaskQuery,
    TaskStatistics,
    TaskStatusView,
    ValidationError,
} from '@taskgate/sdk';
import { TaskEntity } from '../db/task.entity';
import { CreatedTask, TaskStore } from '../repositories/task.repository';

const TAG = '[tasks]';

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 1000;

export interface TaskServiceOptions {
    maxAttempts: number;
}

/**
 * Accepts work and answers status queries and listings. Submission only
 * writes the record; dispatch happens later through the poller.
 */
export class TaskService implements TaskGateway, TaskInspector {
    constructor(
        private readonly store: TaskStore,
        private readonly registry: HandlerRegistry,
        private readonly options: TaskServiceOptions,
    ) { }

    async submit(input: SubmitTaskInput): Promise<SubmitTaskResult> {
        if (!this.registry.has(input.topic)) {
            throw new ValidationError(`Unknown topic "${input.topic}"`, ErrorCodes.UNKNOWN_TOPIC, { topic: input.topic });
        }

        // Rejected input is recorded as a failed task so the caller can inspect it.
        const missing = this.registry.missingFields(input.topic, input.payload);
        const failure = missing.length > 0
            ? new ValidationError(
                `Missing required fields: ${missing.join(', ')}`,
                ErrorCodes.MISSING_REQUIRED_FIELD,
                { fields: missing },
            ).toTaskError()
            : undefined;

        let created: CreatedTask;
        try {
            created = await this.store.create({
                topic: input.topic,
                payload: input.payload,
                maxAttempts: this.options.maxAttempts,
                idempotencyKey: input.idempotencyKey,
                failure,
            });
        } catch (err) {
            console.error(`${TAG} task store unavailable, refusing submission:`, err);
            throw new InfrastructureError(`Task store unavailable: ${errorMessage(err)}`);
        }

        const { task } = created;
        if (!created.created) {
            console.log(`${TAG} idempotency key ${input.idempotencyKey} matched live task ${task.id}`);
        } else if (failure) {
            console.warn(`${TAG} task ${task.id} (${task.topic}) rejected: ${failure.message}`);
        } else {
            console.log(`${TAG} task ${task.id} (${task.topic}) accepted`);
        }
        return { taskId: task.id, status: task.status };
    }

    async getStatus(taskId: string): Promise<TaskStatusView | null> {
        if (!isUuid(taskId)) return null;

        let task: TaskEntity | null;
        try {
            task = await this.store.findById(taskId);
        } catch (err) {
            throw new InfrastructureError(`Task store unavailable: ${errorMessage(err)}`);
        }
        return task ? toStatusView(task) : null;
    }

    async list(query: TaskQuery): Promise<TaskStatusView[]> {
        const limit = query.limit ?? DEFAULT_LIST_LIMIT;
        const offset = query.offset ?? 0;
        if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
            throw new ValidationError(`limit must be between 1 and ${MAX_LIST_LIMIT}`, ErrorCodes.INVALID_PAYLOAD, { limit });
        }
        if (!Number.isInteger(offset) || offset < 0) {
            throw new ValidationError('offset must not be negative', ErrorCodes.INVALID_PAYLOAD, { offset });
        }

        try {
            const tasks = await this.store.list({ status: query.status, topic: query.topic, limit, offset });
            return tasks.map(toStatusView);
        } catch (err) {
            throw new InfrastructureError(`Task store unavailable: ${errorMessage(err)}`);
        }
    }

    async statistics(): Promise<TaskStatistics> {
        try {
            return await this.store.statistics();
        } catch (err) {
            throw new InfrastructureError(`Task store unavailable: ${errorMessage(err)}`);
        }
    }
}

export function toStatusView(task: TaskEntity): TaskStatusView {
    const view: TaskStatusView = {
        taskId: task.id,
        topic: task.topic,
        status: task.status,
        attemptCount: task.attempt_count,
    };
    if (task.result) view.result = task.result;
    if (task.error) view.error = task.error;
    return view;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
