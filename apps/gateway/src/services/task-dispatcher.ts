import {
    ApiCaller,
    Document,
    ErrorCodes,
    HandlerRegistry,
    TaskError,
    ValidationError,
    isRetryable,
    toTaskError,
} from '@taskgate/sdk';
import { TaskEntity, TaskStatus } from '../db/task.entity';
import { TaskStore } from '../repositories/task.repository';
import { calculateBackOff } from '../utils/backoff';
import { HeartbeatService } from './heartbeat.service';

const TAG = '[dispatcher]';

export interface DispatcherOptions {
    workerId: string;
    maxConcurrency: number;
    retryInitialMs: number;
    retryMaxMs: number;
    retryMultiplier?: number;
}

export type HandlerOutcome = { result: Document } | { error: unknown };

/**
 * Runs claimed tasks through their topic handler and records the outcome.
 * Claims and outcome writes are compare-and-swap updates in the store, so a
 * dispatcher that lost its lease cannot change the task any more.
 */
export class TaskDispatcher {
    private readonly active = new Set<string>();
    /** Slots held by dispatch() calls still waiting on their claim. */
    private reserved = 0;
    private readonly running = new Set<Promise<TaskStatus | null>>();

    constructor(
        private readonly store: TaskStore,
        private readonly registry: HandlerRegistry,
        private readonly api: ApiCaller,
        private readonly heartbeat: HeartbeatService,
        private readonly options: DispatcherOptions,
    ) { }

    get maxConcurrency(): number {
        return this.options.maxConcurrency;
    }

    get activeCount(): number {
        return this.active.size;
    }

    freeSlots(): number {
        return Math.max(this.options.maxConcurrency - this.active.size - this.reserved, 0);
    }

    /**
     * Claims and runs one task. Resolves null when the claim was lost
     * (another dispatcher, not yet due, terminal) or the pool is full.
     */
    async dispatch(taskId: string): Promise<TaskStatus | null> {
        if (this.freeSlots() === 0) return null;

        this.reserved++;
        let task: TaskEntity | null;
        try {
            task = await this.store.claim(taskId, this.options.workerId);
        } finally {
            this.reserved--;
        }
        if (!task) {
            console.log(`${TAG} task ${taskId} not claimable, skipping`);
            return null;
        }
        return this.run(task);
    }

    /** Runs a task this dispatcher already claimed. */
    run(task: TaskEntity): Promise<TaskStatus | null> {
        const execution = this.execute(task);
        this.running.add(execution);
        return execution.finally(() => this.running.delete(execution));
    }

    async markResult(task: TaskEntity, outcome: HandlerOutcome): Promise<TaskStatus | null> {
        const { workerId } = this.options;

        if ('result' in outcome) {
            const ok = await this.store.markSucceeded(task.id, workerId, outcome.result);
            return this.recorded(task, ok, 'succeeded');
        }

        const error = toTaskError(outcome.error);
        if (isRetryable(outcome.error) && task.attempt_count < task.max_attempts) {
            const delayMs = calculateBackOff(
                task.attempt_count,
                this.options.retryInitialMs,
                this.options.retryMultiplier ?? 4,
                this.options.retryMaxMs,
            );
            const ok = await this.store.markRetrying(task.id, workerId, error, delayMs);
            if (ok) {
                console.warn(`${TAG} task ${task.id} attempt ${task.attempt_count}/${task.max_attempts} failed (${error.code}), retrying in ${delayMs}ms`);
            }
            return this.recorded(task, ok, 'retrying');
        }

        const final = isRetryable(outcome.error) ? exhausted(task, error) : error;
        const ok = await this.store.markFailed(task.id, workerId, final);
        if (ok) {
            console.error(`${TAG} task ${task.id} failed after ${task.attempt_count} attempts: ${final.code} ${final.message}`);
        }
        return this.recorded(task, ok, 'failed');
    }

    /** Waits for in-flight tasks; used on shutdown. */
    async drain(): Promise<void> {
        await Promise.allSettled(Array.from(this.running));
    }

    private async execute(task: TaskEntity): Promise<TaskStatus | null> {
        this.active.add(task.id);
        this.heartbeat.start(task.id);
        try {
            const outcome = await this.invoke(task);
            this.heartbeat.stop(task.id);
            return await this.markResult(task, outcome);
        } catch (err) {
            console.error(`${TAG} could not record outcome of task ${task.id}; the reaper will reclaim it:`, err);
            return null;
        } finally {
            this.heartbeat.stop(task.id);
            this.active.delete(task.id);
        }
    }

    private async invoke(task: TaskEntity): Promise<HandlerOutcome> {
        const handler = this.registry.get(task.topic);
        if (!handler) {
            return { error: new ValidationError(`No handler for topic "${task.topic}"`, ErrorCodes.UNKNOWN_TOPIC) };
        }
        try {
            const result = await handler.handle(task.payload, {
                taskId: task.id,
                topic: task.topic,
                attempt: task.attempt_count,
                api: this.api,
            });
            return { result };
        } catch (error) {
            return { error };
        }
    }

    private recorded(task: TaskEntity, ok: boolean, status: TaskStatus): TaskStatus | null {
        if (!ok) {
            console.warn(`${TAG} lease on task ${task.id} lost before recording ${status}, outcome dropped`);
            return null;
        }
        return status;
    }
}

function exhausted(task: TaskEntity, last: TaskError): TaskError {
    return {
        code: ErrorCodes.RETRY_BUDGET_EXHAUSTED,
        class: 'infrastructure',
        message: `Retry budget of ${task.max_attempts} attempts exhausted: ${last.message}`,
        details: { attempts: task.attempt_count, lastError: { ...last } },
    };
}
