export type Document = Record<string, unknown>;

/**
 * Lifecycle states of a gateway task.
 * pending → in_progress → succeeded | retrying | failed, retrying → in_progress.
 * succeeded and failed are terminal.
 */
export type TaskStatus = 'pending' | 'in_progress' | 'retrying' | 'succeeded' | 'failed';

export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress', 'retrying', 'succeeded', 'failed'];

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['succeeded', 'failed'];

export function isTerminal(status: TaskStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

export type ErrorClass =
    | 'validation'
    | 'transient'
    | 'auth_expired'
    | 'business_rejected'
    | 'infrastructure';

/** Persisted shape of a task failure. `code` is stable, `message` is for humans. */
export interface TaskError {
    code: string;
    class: ErrorClass;
    message: string;
    details?: Record<string, unknown>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ApiRequest {
    method: HttpMethod;
    path: string;
    body?: unknown;
    query?: Record<string, string | number | boolean>;
    headers?: Record<string, string>;
    /** Per-attempt timeout; overrides the call class and API defaults. */
    timeoutMs?: number;
    /** Named timeout/elapsed profile from the API config, e.g. "slow". */
    callClass?: string;
}

export interface ApiResponse {
    status: number;
    /** Parsed JSON when the upstream sent JSON, the raw text otherwise, null when empty. */
    body: unknown;
    headers: Record<string, string>;
}

export interface ApiCaller {
    call(apiName: string, accountId: string, request: ApiRequest): Promise<ApiResponse>;
}

export interface HandlerContext {
    taskId: string;
    topic: string;
    attempt: number;
    api: ApiCaller;
}

export interface TopicHandler {
    /** Payload fields that must be present and non-empty before the task is accepted. */
    requiredFields?: string[];
    handle(payload: Document, ctx: HandlerContext): Promise<Document>;
}

export interface SubmitTaskInput {
    topic: string;
    payload: Document;
    idempotencyKey?: string;
}

export interface SubmitTaskResult {
    taskId: string;
    status: TaskStatus;
}

export interface TaskStatusView {
    taskId: string;
    topic: string;
    status: TaskStatus;
    attemptCount: number;
    result?: Document;
    error?: TaskError;
}

/** Submit/status surface of the gateway, served in process or over gRPC. */
export interface TaskGateway {
    submit(input: SubmitTaskInput): Promise<SubmitTaskResult>;
    getStatus(taskId: string): Promise<TaskStatusView | null>;
}

export interface TaskQuery {
    status?: TaskStatus;
    topic?: string;
    /** 1..1000, 50 when absent. */
    limit?: number;
    offset?: number;
}

export function emptyStatusCounts(): Record<TaskStatus, number> {
    return { pending: 0, in_progress: 0, retrying: 0, succeeded: 0, failed: 0 };
}

export interface TaskStatistics {
    total: number;
    byStatus: Record<TaskStatus, number>;
    byTopic: Record<string, number>;
    /** Percentage of all tasks that succeeded, 0 when there are none. */
    successRate: number;
}

/** Read-only listing of gateway tasks, newest first. */
export interface TaskInspector {
    list(query: TaskQuery): Promise<TaskStatusView[]>;
    statistics(): Promise<TaskStatistics>;
}
