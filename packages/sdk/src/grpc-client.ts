import * as grpc from '@grpc/grpc-js';
import { loadProto, lookupService, taskStatusFromProto, taskStatusToProto } from './grpc-loader';
import { decodeDocument, encodeDocument } from './utils/serialization';
import {
    ErrorClass,
    SubmitTaskInput,
    SubmitTaskResult,
    TASK_STATUSES,
    TaskError,
    TaskGateway,
    TaskInspector,
    TaskQuery,
    TaskStatistics,
    TaskStatusView,
    emptyStatusCounts,
} from './types';

export interface SubmitTaskRequest {
    topic: string;
    payload: Buffer;
    idempotency_key: string;
}

export interface SubmitTaskResponse {
    task_id: string;
    status: string;
}

export interface GetTaskStatusRequest {
    task_id: string;
}

export interface GetTaskStatusResponse {
    task_id: string;
    topic: string;
    status: string;
    attempt_count: number;
    result: Buffer;
    error: Buffer;
}

export interface ListTasksRequest {
    status: string;
    topic: string;
    limit: number;
    offset: number;
}

export interface ListTasksResponse {
    tasks: GetTaskStatusResponse[];
}

export type GetTaskStatisticsRequest = Record<string, never>;

export interface GetTaskStatisticsResponse {
    total: number;
    by_status: Record<string, number>;
    by_topic: Record<string, number>;
    success_rate: number;
}

const SERVICE_NAME = 'taskgate.GatewayService';

type UnaryMethod<Req, Res> = (request: Req) => Promise<Res>;

/**
 * gRPC client for the gateway's submit/status and listing surface.
 * Used by external-task workers running outside the gateway process.
 */
export class GatewayClient implements TaskGateway, TaskInspector {
    private readonly client: grpc.Client;
    private readonly submitTask: UnaryMethod<SubmitTaskRequest, SubmitTaskResponse>;
    private readonly getTaskStatus: UnaryMethod<GetTaskStatusRequest, GetTaskStatusResponse>;
    private readonly listTasks: UnaryMethod<ListTasksRequest, ListTasksResponse>;
    private readonly getTaskStatistics: UnaryMethod<GetTaskStatisticsRequest, GetTaskStatisticsResponse>;

    constructor(address: string, credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure()) {
        const { root } = loadProto('gateway.service.proto');
        const Service = lookupService(root, SERVICE_NAME);
        this.client = new Service(address, credentials);
        this.submitTask = this.unary(Service.service, 'SubmitTask');
        this.getTaskStatus = this.unary(Service.service, 'GetTaskStatus');
        this.listTasks = this.unary(Service.service, 'ListTasks');
        this.getTaskStatistics = this.unary(Service.service, 'GetTaskStatistics');
    }

    async submit(input: SubmitTaskInput): Promise<SubmitTaskResult> {
        const res = await this.submitTask({
            topic: input.topic,
            payload: encodeDocument(input.payload),
            idempotency_key: input.idempotencyKey ?? '',
        });
        return { taskId: res.task_id, status: taskStatusFromProto(res.status) };
    }

    async getStatus(taskId: string): Promise<TaskStatusView | null> {
        try {
            return toStatusView(await this.getTaskStatus({ task_id: taskId }));
        } catch (err) {
            if (isServiceError(err) && err.code === grpc.status.NOT_FOUND) return null;
            throw err;
        }
    }

    async list(query: TaskQuery): Promise<TaskStatusView[]> {
        const res = await this.listTasks({
            status: query.status ? taskStatusToProto(query.status) : 'TASK_STATUS_UNSPECIFIED',
            topic: query.topic ?? '',
            limit: query.limit ?? 0,
            offset: query.offset ?? 0,
        });
        return res.tasks.map(toStatusView);
    }

    async statistics(): Promise<TaskStatistics> {
        const res = await this.getTaskStatistics({});
        const byStatus = emptyStatusCounts();
        for (const [name, count] of Object.entries(res.by_status)) {
            const status = TASK_STATUSES.find(s => s === name);
            if (status) byStatus[status] = count;
        }
        return { total: res.total, byStatus, byTopic: { ...res.by_topic }, successRate: res.success_rate };
    }

    close(): void {
        this.client.close();
    }

    private unary<Req, Res>(service: grpc.ServiceDefinition, method: string): UnaryMethod<Req, Res> {
        const def = service[method];
        if (!def) throw new Error(`Method ${method} missing from ${SERVICE_NAME}`);
        return (request: Req) =>
            new Promise<Res>((resolve, reject) => {
                this.client.makeUnaryRequest<Req, Res>(
                    def.path,
                    def.requestSerialize,
                    def.responseDeserialize,
                    request,
                    (err, res) => (err || res === undefined ? reject(err ?? new Error(`${method} returned no response`)) : resolve(res)),
                );
            });
    }
}

function toStatusView(res: GetTaskStatusResponse): TaskStatusView {
    const view: TaskStatusView = {
        taskId: res.task_id,
        topic: res.topic,
        status: taskStatusFromProto(res.status),
        attemptCount: res.attempt_count,
    };
    const result = decodeDocument(res.result);
    if (result) view.result = result;
    const error = parseTaskError(decodeDocument(res.error));
    if (error) view.error = error;
    return view;
}

function isServiceError(err: unknown): err is grpc.ServiceError {
    return err instanceof Error && 'code' in err && typeof err.code === 'number';
}

const ERROR_CLASSES: readonly ErrorClass[] = ['validation', 'transient', 'auth_expired', 'business_rejected', 'infrastructure'];

export function parseTaskError(doc: Record<string, unknown> | undefined): TaskError | undefined {
    if (!doc) return undefined;
    const { code, message, details } = doc;
    const errorClass = ERROR_CLASSES.find(c => c === doc.class);
    if (typeof code !== 'string' || typeof message !== 'string' || !errorClass) return undefined;
    const error: TaskError = { code, class: errorClass, message };
    if (typeof details === 'object' && details !== null && !Array.isArray(details)) {
        error.details = Object.fromEntries(Object.entries(details));
    }
    return error;
}
