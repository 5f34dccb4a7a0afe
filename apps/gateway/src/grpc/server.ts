import * as grpc from '@grpc/grpc-js';
import { ReflectionService } from '@grpc/reflection';
import { TaskGateway, TaskInspector, loadProto, lookupService } from '@taskgate/sdk';
import { GatewayServiceImpl } from './gateway.service';
import { HealthService } from './health.service';

const health = loadProto('health.service.proto');
const gateway = loadProto('gateway.service.proto');

export function createGrpcServer(taskGateway: TaskGateway & TaskInspector, healthService: HealthService): grpc.Server {
    const server = new grpc.Server({
        'grpc.max_receive_message_length': 4 * 1024 * 1024,
        'grpc.max_send_message_length': 4 * 1024 * 1024,
        'grpc.keepalive_time_ms': 30000,
        'grpc.keepalive_timeout_ms': 10000,
        'grpc.keepalive_permit_without_calls': 1,
    });

    server.addService(lookupService(health.root, 'grpc.health.v1.Health').service, {
        check: healthService.check.bind(healthService),
        watch: healthService.watch.bind(healthService),
    });

    const gatewayService = new GatewayServiceImpl(taskGateway);
    server.addService(lookupService(gateway.root, 'taskgate.GatewayService').service, {
        submitTask: gatewayService.submitTask.bind(gatewayService),
        getTaskStatus: gatewayService.getTaskStatus.bind(gatewayService),
        listTasks: gatewayService.listTasks.bind(gatewayService),
        getTaskStatistics: gatewayService.getTaskStatistics.bind(gatewayService),
    });

    // reflection for grpcurl debugging
    const reflectionService = new ReflectionService({
        ...health.definition,
        ...gateway.definition,
    });
    reflectionService.addToServer(server);

    return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
    return new Promise((resolve, reject) => {
        server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
            if (err) {
                reject(err);
            } else {
                console.log(`[taskgate] grpc server listening on port ${boundPort}`);
                resolve(boundPort);
            }
        });
    });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
    return new Promise(resolve => server.tryShutdown(() => resolve()));
}
