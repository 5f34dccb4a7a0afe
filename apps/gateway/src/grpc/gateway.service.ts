import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import {
    GatewayError,
    GetTaskStatisticsRequest,
    GetTaskStatisticsResponse,
    GetTaskStatusRequest,
    GetTaskStatusResponse,
    ListTasksRequest,
    ListTasksResponse,
    SerializationError,
    SubmitTaskRequest,
    SubmitTaskResponse,
    TaskGateway,
    TaskInspector,
    TaskStatusView,
    decodeDocument,
    encodeDocument,
    taskStatusFromProto,
    taskStatusToProto,
} from '@taskgate/sdk';

const TAG = '[grpc]';

/**
 * gRPC surface of the task gateway: submission, status lookup and listings.
 * Payload, result and error documents travel as superjson bytes.
 */
export class GatewayServiceImpl {
    constructor(private readonly gateway: TaskGateway & TaskInspector) { }

    async submitTask(
        call: ServerUnaryCall<SubmitTaskRequest, SubmitTaskResponse>,
        callback: sendUnaryData<SubmitTaskResponse>,
    ): Promise<void> {
        try {
            const { topic, payload, idempotency_key } = call.request;
            const result = await this.gateway.submit({
                topic,
                payload: decodeDocument(payload) ?? {},
                idempotencyKey: idempotency_key || undefined,
            });
            callback(null, { task_id: result.taskId, status: taskStatusToProto(result.status) });
        } catch (error) {
            callback(toServiceError(error, 'submitTask'));
        }
    }

    async getTaskStatus(
        call: ServerUnaryCall<GetTaskStatusRequest, GetTaskStatusResponse>,
        callback: sendUnaryData<GetTaskStatusResponse>,
    ): Promise<void> {
        try {
            const { task_id } = call.request;
            const view = await this.gateway.getStatus(task_id);
            if (!view) {
                callback({ code: grpc.status.NOT_FOUND, details: `Task ${task_id} not found` });
                return;
            }
            callback(null, toStatusResponse(view));
        } catch (error) {
            callback(toServiceError(error, 'getTaskStatus'));
        }
    }

    async listTasks(
        call: ServerUnaryCall<ListTasksRequest, ListTasksResponse>,
        callback: sendUnaryData<ListTasksResponse>,
    ): Promise<void> {
        try {
            const { status, topic, limit, offset } = call.request;
            const views = await this.gateway.list({
                status: status && status !== 'TASK_STATUS_UNSPECIFIED' ? taskStatusFromProto(status) : undefined,
                topic: topic || undefined,
                limit: limit || undefined,
                offset,
            });
            callback(null, { tasks: views.map(toStatusResponse) });
        } catch (error) {
            callback(toServiceError(error, 'listTasks'));
        }
    }

    async getTaskStatistics(
        _call: ServerUnaryCall<GetTaskStatisticsRequest, GetTaskStatisticsResponse>,
        callback: sendUnaryData<GetTaskStatisticsResponse>,
    ): Promise<void> {
        try {
            const stats = await this.gateway.statistics();
            callback(null, {
                total: stats.total,
                by_status: stats.byStatus,
                by_topic: stats.byTopic,
                success_rate: stats.successRate,
            });
        } catch (error) {
            callback(toServiceError(error, 'getTaskStatistics'));
        }
    }
}

function toStatusResponse(view: TaskStatusView): GetTaskStatusResponse {
    return {
        task_id: view.taskId,
        topic: view.topic,
        status: taskStatusToProto(view.status),
        attempt_count: view.attemptCount,
        result: view.result ? encodeDocument(view.result) : Buffer.alloc(0),
        error: view.error ? encodeDocument(view.error) : Buffer.alloc(0),
    };
}

export function toServiceError(error: unknown, method: string): Partial<grpc.StatusObject> {
    const details = error instanceof Error ? error.message : 'Unknown error';
    if (error instanceof SerializationError) {
        return { code: grpc.status.INVALID_ARGUMENT, details };
    }
    if (error instanceof GatewayError) {
        if (error.errorClass === 'validation') return { code: grpc.status.INVALID_ARGUMENT, details: `${error.code}: ${details}` };
        if (error.errorClass === 'infrastructure') return { code: grpc.status.UNAVAILABLE, details: `${error.code}: ${details}` };
    }
    console.error(`${TAG} ${method} error:`, error);
    return { code: grpc.status.INTERNAL, details };
}
