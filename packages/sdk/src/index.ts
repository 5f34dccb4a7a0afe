// public api for @taskgate/sdk
// usage:
//   import { HandlerRegistry, TransientError } from '@taskgate/sdk';
//   registry.register('topic', { requiredFields: ['id'], handle: async (payload, ctx) => { ... } });

export * from './types';
export * from './errors';
export { HandlerRegistry, missingRequiredFields } from './handler';
export { GatewayClient, parseTaskError } from './grpc-client';
export type {
    SubmitTaskRequest,
    SubmitTaskResponse,
    GetTaskStatusRequest,
    GetTaskStatusResponse,
    ListTasksRequest,
    ListTasksResponse,
    GetTaskStatisticsRequest,
    GetTaskStatisticsResponse,
} from './grpc-client';
export { loadProto, lookupService, taskStatusToProto, taskStatusFromProto, PROTO_OPTIONS } from './grpc-loader';
export type { ProtoTaskStatus } from './grpc-loader';
export { serialize, deserialize, encodeDocument, decodeDocument, SerializationError } from './utils/serialization';
