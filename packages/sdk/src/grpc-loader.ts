import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { TaskStatus } from './types';

export const PROTO_DIR = path.resolve(__dirname, '../../proto');

export const PROTO_OPTIONS: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

export function loadProto(file: string): { definition: protoLoader.PackageDefinition; root: grpc.GrpcObject } {
    const definition = protoLoader.loadSync(path.join(PROTO_DIR, file), PROTO_OPTIONS);
    return { definition, root: grpc.loadPackageDefinition(definition) };
}

function isServiceConstructor(value: unknown): value is grpc.ServiceClientConstructor {
    return typeof value === 'function' && 'service' in value;
}

/** Resolves a fully qualified service name, e.g. "taskgate.GatewayService". */
export function lookupService(root: grpc.GrpcObject, qualifiedName: string): grpc.ServiceClientConstructor {
    let node: unknown = root;
    for (const segment of qualifiedName.split('.')) {
        if (typeof node !== 'object' || node === null) break;
        node = Object.getOwnPropertyDescriptor(node, segment)?.value;
    }
    if (!isServiceConstructor(node)) {
        throw new Error(`Service ${qualifiedName} not found in proto definition`);
    }
    return node;
}

export type ProtoTaskStatus = 'TASK_STATUS_UNSPECIFIED' | 'PENDING' | 'IN_PROGRESS' | 'RETRYING' | 'SUCCEEDED' | 'FAILED';

const TO_PROTO: Record<TaskStatus, ProtoTaskStatus> = {
    pending: 'PENDING',
    in_progress: 'IN_PROGRESS',
    retrying: 'RETRYING',
    succeeded: 'SUCCEEDED',
    failed: 'FAILED',
};

export function taskStatusToProto(status: TaskStatus): ProtoTaskStatus {
    return TO_PROTO[status];
}

export function taskStatusFromProto(status: string): TaskStatus {
    for (const [local, wire] of Object.entries(TO_PROTO)) {
        if (wire === status && isTaskStatus(local)) return local;
    }
    throw new Error(`Unknown task status on the wire: ${status}`);
}

function isTaskStatus(value: string): value is TaskStatus {
    return value in TO_PROTO;
}
