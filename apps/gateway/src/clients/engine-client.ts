import { BusinessRejectedError, ErrorCodes, TransientError } from '@taskgate/sdk';
import { TypedValue, VariableMap, VariableType } from '../utils/variables';

const TAG = '[engine]';

export interface ExternalTask {
    id: string;
    topicName: string;
    processInstanceId: string | null;
    businessKey: string | null;
    /** Engine-side retry counter; null until the first reported failure. */
    retries: number | null;
    variables: VariableMap;
}

export interface TopicSubscription {
    topicName: string;
    lockDuration: number;
}

export interface TaskFailure {
    errorMessage: string;
    errorDetails?: string;
    retries: number;
    retryTimeout: number;
}

export interface CorrelationMessage {
    messageName: string;
    businessKey?: string;
    processInstanceId?: string;
    processVariables: VariableMap;
}

/** The workflow engine's external-task protocol plus message correlation. */
export interface EngineClient {
    fetchAndLock(workerId: string, topics: TopicSubscription[], maxTasks: number): Promise<ExternalTask[]>;
    complete(taskId: string, workerId: string, variables: VariableMap): Promise<void>;
    handleFailure(taskId: string, workerId: string, failure: TaskFailure): Promise<void>;
    handleBpmnError(taskId: string, workerId: string, errorCode: string, errorMessage: string, variables?: VariableMap): Promise<void>;
    extendLock(taskId: string, workerId: string, newDuration: number): Promise<void>;
    correlateMessage(message: CorrelationMessage): Promise<void>;
}

export interface CamundaRestConfig {
    restUrl: string;
    user?: string;
    password?: string;
    timeoutMs?: number;
}

export class CamundaRestClient implements EngineClient {
    private readonly baseUrl: string;
    private readonly authHeader: string | undefined;
    private readonly timeoutMs: number;
    private readonly fetchFn: typeof fetch;

    constructor(config: CamundaRestConfig, fetchFn: typeof fetch = fetch) {
        this.baseUrl = config.restUrl.replace(/\/+$/, '');
        this.authHeader = config.user
            ? `Basic ${Buffer.from(`${config.user}:${config.password ?? ''}`).toString('base64')}`
            : undefined;
        this.timeoutMs = config.timeoutMs ?? 30_000;
        this.fetchFn = fetchFn;
    }

    async fetchAndLock(workerId: string, topics: TopicSubscription[], maxTasks: number): Promise<ExternalTask[]> {
        const body = await this.post('/external-task/fetchAndLock', { workerId, maxTasks, usePriority: true, topics });
        if (!Array.isArray(body)) return [];
        return body.flatMap(item => {
            const task = parseExternalTask(item);
            return task ? [task] : [];
        });
    }

    async complete(taskId: string, workerId: string, variables: VariableMap): Promise<void> {
        await this.post(`/external-task/${encodeURIComponent(taskId)}/complete`, { workerId, variables });
    }

    async handleFailure(taskId: string, workerId: string, failure: TaskFailure): Promise<void> {
        await this.post(`/external-task/${encodeURIComponent(taskId)}/failure`, { workerId, ...failure });
    }

    async handleBpmnError(
        taskId: string,
        workerId: string,
        errorCode: string,
        errorMessage: string,
        variables: VariableMap = {},
    ): Promise<void> {
        await this.post(`/external-task/${encodeURIComponent(taskId)}/bpmnError`, { workerId, errorCode, errorMessage, variables });
    }

    async extendLock(taskId: string, workerId: string, newDuration: number): Promise<void> {
        await this.post(`/external-task/${encodeURIComponent(taskId)}/extendLock`, { workerId, newDuration });
    }

    async correlateMessage(message: CorrelationMessage): Promise<void> {
        await this.post('/message', message);
        console.log(`${TAG} message ${message.messageName} correlated (business key: ${message.businessKey ?? '-'})`);
    }

    private async post(path: string, payload: unknown): Promise<unknown> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.authHeader) headers.Authorization = this.authHeader;

        let status: number;
        let text: string;
        try {
            const res = await this.fetchFn(`${this.baseUrl}${path}`, {
                method: 'POST',
                headers,
                body: JSON.stringify(payload),
                signal: controller.signal,
            });
            status = res.status;
            text = await res.text();
        } catch (err) {
            throw new TransientError(
                `engine ${path} unreachable: ${err instanceof Error ? err.message : String(err)}`,
                controller.signal.aborted ? ErrorCodes.UPSTREAM_TIMEOUT : ErrorCodes.UPSTREAM_UNAVAILABLE,
            );
        } finally {
            clearTimeout(timeout);
        }

        if (status >= 500 || status === 429) {
            throw new TransientError(`engine ${path} returned ${status}`, ErrorCodes.UPSTREAM_UNAVAILABLE, { status, body: text });
        }
        if (status >= 400) {
            throw new BusinessRejectedError(`engine ${path} rejected with ${status}`, { status, body: text });
        }
        return text.length > 0 ? JSON.parse(text) : null;
    }
}

const VARIABLE_TYPES: readonly VariableType[] = ['Boolean', 'Integer', 'Long', 'Double', 'String', 'Json', 'Null'];

function record(value: unknown): Record<string, unknown> | null {
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : null;
}

function parseExternalTask(raw: unknown): ExternalTask | null {
    const item = record(raw);
    if (!item || typeof item.id !== 'string' || typeof item.topicName !== 'string') return null;
    return {
        id: item.id,
        topicName: item.topicName,
        processInstanceId: typeof item.processInstanceId === 'string' ? item.processInstanceId : null,
        businessKey: typeof item.businessKey === 'string' ? item.businessKey : null,
        retries: typeof item.retries === 'number' ? item.retries : null,
        variables: parseVariables(item.variables),
    };
}

function parseVariables(raw: unknown): VariableMap {
    const variables: VariableMap = {};
    const entries = record(raw);
    if (!entries) return variables;
    for (const [name, value] of Object.entries(entries)) {
        const typed = record(value);
        if (!typed) continue;
        // the engine reports types in whatever case it was given
        const type = VARIABLE_TYPES.find(t => t.toLowerCase() === String(typed.type).toLowerCase()) ?? 'String';
        const entry: TypedValue = { value: typed.value ?? null, type };
        variables[name] = entry;
    }
    return variables;
}
