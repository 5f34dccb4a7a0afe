import {
    Document,
    ErrorCodes,
    GatewayError,
    HandlerRegistry,
    TaskError,
    TaskGateway,
    TaskStatusView,
    ValidationError,
    isTerminal,
} from '@taskgate/sdk';
import { AwaitCallbackConfig } from '../config';
import { EngineClient, ExternalTask } from '../clients/engine-client';
import { PendingCorrelationEntity } from '../db/pending-correlation.entity';
import { PendingCorrelationStore } from '../repositories/correlation.repository';
import { CallbackCorrelator } from '../services/callback-correlator';
import { HeartbeatService } from '../services/heartbeat.service';
import { sleep } from '../utils/backoff';
import { VariableMap, fromVariables, toVariables } from '../utils/variables';

const TAG = '[adapter]';

/** BPMN error code reported for input rejected before submission. */
export const VALIDATION_ERROR = 'VALIDATION_ERROR';

export interface AdapterOptions {
    workerId: string;
    lockDurationMs: number;
    /** Engine retries assumed when a task has not failed before. */
    defaultRetries: number;
    retryTimeoutMs: number;
    /** How often the gateway task status is checked and the engine lock extended. */
    heartbeatIntervalMs: number;
    /** Topics that park the workflow on a callback after success. */
    awaits?: Record<string, AwaitCallbackConfig>;
    defaultCallbackSource?: string;
    /** Delivers callbacks that arrived before the workflow started waiting. */
    callbacks?: Pick<CallbackCorrelator, 'correlateWaiting'>;
    sleep?: (ms: number) => Promise<void>;
}

export interface WorkflowInstanceRef {
    processInstanceId?: string;
    businessKey?: string;
    source?: string;
    messageName?: string;
}

/** `released`: the adapter stopped first; the engine lock is left to expire and the task is fetched again. */
export type AdapterOutcome = 'completed' | 'bpmn_error' | 'failed' | 'released';

/**
 * Bridges the engine's fetch/lock/complete protocol to gateway tasks.
 * The engine's retry counter is only touched once the gateway's own budget
 * is spent; validation and business rejections become BPMN errors.
 */
export class ExternalTaskAdapter {
    private readonly locks: HeartbeatService;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly wakers = new Set<() => void>();
    private stopping = false;

    constructor(
        private readonly engine: EngineClient,
        private readonly gateway: TaskGateway,
        private readonly registry: HandlerRegistry,
        private readonly correlations: PendingCorrelationStore,
        private readonly options: AdapterOptions,
    ) {
        this.sleep = options.sleep ?? sleep;
        this.locks = new HeartbeatService(
            async id => {
                await this.engine.extendLock(id, this.options.workerId, this.options.lockDurationMs);
                return true;
            },
            options.heartbeatIntervalMs,
            TAG,
        );
    }

    fetch(topic: string, maxBatch: number, lockDurationMs: number = this.options.lockDurationMs): Promise<ExternalTask[]> {
        return this.engine.fetchAndLock(this.options.workerId, [{ topicName: topic, lockDuration: lockDurationMs }], maxBatch);
    }

    complete(taskId: string, variables: VariableMap): Promise<void> {
        return this.engine.complete(taskId, this.options.workerId, variables);
    }

    fail(
        taskId: string,
        error: TaskError,
        retriesRemaining: number,
        retryTimeoutMs: number = this.options.retryTimeoutMs,
    ): Promise<void> {
        return this.engine.handleFailure(taskId, this.options.workerId, {
            errorMessage: `${error.code}: ${error.message}`,
            errorDetails: JSON.stringify(error),
            retries: Math.max(retriesRemaining, 0),
            retryTimeout: retryTimeoutMs,
        });
    }

    async registerPendingCorrelation(correlationKey: string, ref: WorkflowInstanceRef): Promise<PendingCorrelationEntity> {
        const entry = await this.expect(correlationKey, ref);
        await this.deliverEarlyCallbacks(entry.source, correlationKey);
        return entry;
    }

    async cancelPendingCorrelation(correlationKey: string, source?: string): Promise<boolean> {
        return this.correlations.remove(this.sourceOf(source), correlationKey);
    }

    async process(task: ExternalTask): Promise<AdapterOutcome> {
        const payload = fromVariables(task.variables);

        const rejection = this.validate(task.topicName, payload);
        if (rejection) {
            console.warn(`${TAG} external task ${task.id} rejected before submission: ${rejection.message}`);
            await this.engine.handleBpmnError(task.id, this.options.workerId, VALIDATION_ERROR, rejection.message);
            return 'bpmn_error';
        }

        this.locks.start(task.id);
        let view: TaskStatusView | null;
        try {
            view = await this.watch(task, payload);
        } catch (err) {
            const error = asTaskError(err);
            console.error(`${TAG} external task ${task.id} could not be run: ${error.code} ${error.message}`);
            await this.fail(task.id, error, this.retriesLeft(task));
            return 'failed';
        } finally {
            this.locks.stop(task.id);
        }

        if (!view) {
            console.warn(`${TAG} stopping, external task ${task.id} left to the engine lock expiry`);
            return 'released';
        }
        return this.report(task, view);
    }

    /** Ends every watch loop at its next status check; in-flight gateway tasks keep running. */
    stop(): void {
        this.stopping = true;
        for (const wake of Array.from(this.wakers)) wake();
        this.locks.stopAll();
    }

    resume(): void {
        this.stopping = false;
    }

    private validate(topic: string, payload: Document): ValidationError | null {
        if (!this.registry.has(topic)) {
            return new ValidationError(`No gateway handler for topic "${topic}"`, ErrorCodes.UNKNOWN_TOPIC);
        }
        const missing = this.registry.missingFields(topic, payload);
        if (missing.length > 0) {
            return new ValidationError(`Missing required variables: ${missing.join(', ')}`, ErrorCodes.MISSING_REQUIRED_FIELD, { fields: missing });
        }
        return null;
    }

    // Submits once (keyed by the external task id) and waits for a terminal status;
    // null when the adapter stops first.
    private async watch(task: ExternalTask, payload: Document): Promise<TaskStatusView | null> {
        const submitted = await this.gateway.submit({ topic: task.topicName, payload, idempotencyKey: task.id });
        console.log(`${TAG} external task ${task.id} → gateway task ${submitted.taskId}`);

        while (true) {
            const view = await this.gateway.getStatus(submitted.taskId);
            if (!view) throw new Error(`Gateway task ${submitted.taskId} disappeared`);
            if (isTerminal(view.status)) return view;
            if (this.stopping) return null;
            await this.pause(this.options.heartbeatIntervalMs);
        }
    }

    private pause(ms: number): Promise<void> {
        if (this.stopping) return Promise.resolve();
        return new Promise(resolve => {
            const wake = () => {
                this.wakers.delete(wake);
                resolve();
            };
            this.wakers.add(wake);
            void this.sleep(ms).then(wake, wake);
        });
    }

    private async report(task: ExternalTask, view: TaskStatusView): Promise<AdapterOutcome> {
        if (view.status === 'succeeded') {
            const result = view.result ?? {};
            const parked = await this.parkOnCallback(task, result);
            await this.complete(task.id, toVariables(result));
            console.log(`${TAG} external task ${task.id} completed after ${view.attemptCount} attempts`);
            // the workflow only waits for the message once the task is complete
            if (parked) await this.deliverEarlyCallbacks(parked.source, parked.correlation_key);
            return 'completed';
        }

        const error: TaskError = view.error ?? {
            code: ErrorCodes.HANDLER_ERROR,
            class: 'transient',
            message: 'Gateway task failed without an error document',
        };
        if (error.class === 'validation' || error.class === 'business_rejected') {
            await this.engine.handleBpmnError(task.id, this.options.workerId, error.code, error.message);
            console.warn(`${TAG} external task ${task.id} ended in BPMN error ${error.code}`);
            return 'bpmn_error';
        }

        const retries = this.retriesLeft(task);
        await this.fail(task.id, error, retries);
        console.warn(`${TAG} external task ${task.id} failed (${error.code}), engine retries left: ${retries}`);
        return 'failed';
    }

    private async parkOnCallback(task: ExternalTask, result: Document): Promise<PendingCorrelationEntity | null> {
        const awaited = this.options.awaits?.[task.topicName];
        if (!awaited) return null;

        const key = result[awaited.keyField] ?? fromVariables(task.variables)[awaited.keyField];
        if (typeof key !== 'string' && typeof key !== 'number') {
            console.warn(`${TAG} external task ${task.id} result has no "${awaited.keyField}", nothing to wait for`);
            return null;
        }
        return this.expect(String(key), {
            processInstanceId: task.processInstanceId ?? undefined,
            businessKey: task.businessKey ?? undefined,
            source: awaited.source,
        });
    }

    private expect(correlationKey: string, ref: WorkflowInstanceRef): Promise<PendingCorrelationEntity> {
        return this.correlations.register({
            source: this.sourceOf(ref.source),
            correlationKey,
            processInstanceId: ref.processInstanceId,
            businessKey: ref.businessKey,
            messageName: ref.messageName,
        });
    }

    // The registration is already stored; anything missed here is picked up by the reconciliation sweep.
    private async deliverEarlyCallbacks(source: string, correlationKey: string): Promise<void> {
        if (!this.options.callbacks) return;
        try {
            const outcome = await this.options.callbacks.correlateWaiting(source, correlationKey);
            if (outcome === 'signalled') console.log(`${TAG} ${source}/${correlationKey} resumed by a callback received earlier`);
        } catch (err) {
            console.error(`${TAG} early callbacks for ${source}/${correlationKey} left to the sweep:`, err);
        }
    }

    private retriesLeft(task: ExternalTask): number {
        return Math.max((task.retries ?? this.options.defaultRetries) - 1, 0);
    }

    private sourceOf(source: string | undefined): string {
        const resolved = source ?? this.options.defaultCallbackSource;
        if (!resolved) throw new ValidationError('No callback source given for pending correlation', ErrorCodes.INVALID_PAYLOAD);
        return resolved;
    }
}

function asTaskError(err: unknown): TaskError {
    if (err instanceof GatewayError) return err.toTaskError();
    return {
        code: ErrorCodes.STORE_UNAVAILABLE,
        class: 'infrastructure',
        message: err instanceof Error ? err.message : String(err),
    };
}
