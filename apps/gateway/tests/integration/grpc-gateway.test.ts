import * as grpc from '@grpc/grpc-js';
import {
    ErrorCodes,
    GatewayClient,
    HandlerRegistry,
    InfrastructureError,
    SerializationError,
    TransientError,
    ValidationError,
} from '@taskgate/sdk';
import { createGrpcServer, startGrpcServer, stopGrpcServer } from '../../src/grpc/server';
import { toServiceError } from '../../src/grpc/gateway.service';
import { HealthService } from '../../src/grpc/health.service';
import { TaskService } from '../../src/services/task.service';
import { InMemoryTaskStore } from '../helpers/memory-stores';

describe('gRPC gateway service', () => {
    let store: InMemoryTaskStore;
    let server: grpc.Server;
    let client: GatewayClient;

    beforeAll(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        store = new InMemoryTaskStore();
        const registry = new HandlerRegistry();
        registry.register('cpj.buscar_processo', { requiredFields: ['numero_processo'], handle: async () => ({}) });
        registry.register('cpj.listar_andamentos', { handle: async () => ({}) });
        const service = new TaskService(store, registry, { maxAttempts: 3 });

        server = createGrpcServer(service, new HealthService({ required: {} }));
        const port = await startGrpcServer(server, 0);
        client = new GatewayClient(`127.0.0.1:${port}`);
    });

    afterAll(async () => {
        client.close();
        await stopGrpcServer(server);
        jest.restoreAllMocks();
    });

    it('submits a task and reads its status back', async () => {
        const submitted = await client.submit({ topic: 'cpj.buscar_processo', payload: { numero_processo: '42' } });

        expect(submitted.status).toBe('pending');
        await expect(client.getStatus(submitted.taskId)).resolves.toEqual({
            taskId: submitted.taskId,
            topic: 'cpj.buscar_processo',
            status: 'pending',
            attemptCount: 0,
        });
        expect((await store.findById(submitted.taskId))?.payload).toEqual({ numero_processo: '42' });
    });

    it('carries results through with their types intact', async () => {
        const { taskId } = await client.submit({ topic: 'cpj.buscar_processo', payload: { numero_processo: '43' } });
        const distribuido = new Date('2024-05-06T07:08:09.000Z');
        await store.claim(taskId, 'worker-1');
        await store.markSucceeded(taskId, 'worker-1', { distribuido, partes: 2 });

        const view = await client.getStatus(taskId);

        expect(view?.status).toBe('succeeded');
        expect(view?.attemptCount).toBe(1);
        expect(view?.result?.distribuido).toEqual(distribuido);
        expect(view?.result?.partes).toBe(2);
    });

    it('reports rejected input as a failed task with its validation error', async () => {
        const { taskId, status } = await client.submit({ topic: 'cpj.buscar_processo', payload: {} });

        expect(status).toBe('failed');
        const view = await client.getStatus(taskId);
        expect(view?.error).toEqual({
            code: ErrorCodes.MISSING_REQUIRED_FIELD,
            class: 'validation',
            message: 'Missing required fields: numero_processo',
            details: { fields: ['numero_processo'] },
        });
    });

    it('keeps one live task per idempotency key', async () => {
        const first = await client.submit({ topic: 'cpj.buscar_processo', payload: { numero_processo: '44' }, idempotencyKey: 'ext-44' });
        const second = await client.submit({ topic: 'cpj.buscar_processo', payload: { numero_processo: '44' }, idempotencyKey: 'ext-44' });

        expect(second.taskId).toBe(first.taskId);
    });

    it('answers INVALID_ARGUMENT for an unknown topic', async () => {
        await expect(client.submit({ topic: 'cpj.nao_existe', payload: {} })).rejects.toMatchObject({
            code: grpc.status.INVALID_ARGUMENT,
            details: 'UNKNOWN_TOPIC: Unknown topic "cpj.nao_existe"',
        });
    });

    it('answers null for a task it does not know', async () => {
        await expect(client.getStatus('0b8f3a52-3c1e-4c55-9a3f-6f4f1f0b2d11')).resolves.toBeNull();
        await expect(client.getStatus('not-a-task')).resolves.toBeNull();
    });

    it('lists tasks newest first, filtered by topic and status', async () => {
        const a = await client.submit({ topic: 'cpj.listar_andamentos', payload: { pagina: 1 } });
        const b = await client.submit({ topic: 'cpj.listar_andamentos', payload: { pagina: 2 } });
        const c = await client.submit({ topic: 'cpj.listar_andamentos', payload: { pagina: 3 } });
        await store.claim(b.taskId, 'worker-1');
        await store.markSucceeded(b.taskId, 'worker-1', { andamentos: 4 });

        const all = await client.list({ topic: 'cpj.listar_andamentos' });
        expect(all.map(view => view.taskId)).toEqual([c.taskId, b.taskId, a.taskId]);

        const pending = await client.list({ topic: 'cpj.listar_andamentos', status: 'pending' });
        expect(pending.map(view => view.taskId)).toEqual([c.taskId, a.taskId]);

        await expect(client.list({ topic: 'cpj.listar_andamentos', limit: 1, offset: 1 })).resolves.toEqual([{
            taskId: b.taskId,
            topic: 'cpj.listar_andamentos',
            status: 'succeeded',
            attemptCount: 1,
            result: { andamentos: 4 },
        }]);
    });

    it('answers INVALID_ARGUMENT for a listing limit out of range', async () => {
        await expect(client.list({ limit: 5000 })).rejects.toMatchObject({
            code: grpc.status.INVALID_ARGUMENT,
            details: 'INVALID_PAYLOAD: limit must be between 1 and 1000',
        });
    });

    it('reports task statistics', async () => {
        const expected = await store.statistics();

        const stats = await client.statistics();

        expect(stats).toEqual(expected);
        expect(stats.total).toBe(store.tasks.size);
    });
});

describe('toServiceError', () => {
    beforeEach(() => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('maps the error classes onto gRPC status codes', () => {
        expect(toServiceError(new ValidationError('bad', ErrorCodes.UNKNOWN_TOPIC), 'submitTask')).toEqual({
            code: grpc.status.INVALID_ARGUMENT,
            details: 'UNKNOWN_TOPIC: bad',
        });
        expect(toServiceError(new SerializationError('Expected an object document'), 'submitTask')).toEqual({
            code: grpc.status.INVALID_ARGUMENT,
            details: 'Expected an object document',
        });
        expect(toServiceError(new InfrastructureError('Task store unavailable: down'), 'submitTask')).toEqual({
            code: grpc.status.UNAVAILABLE,
            details: 'STORE_UNAVAILABLE: Task store unavailable: down',
        });
        expect(toServiceError(new TransientError('odd'), 'getTaskStatus')).toEqual({ code: grpc.status.INTERNAL, details: 'odd' });
    });
});

describe('HealthService', () => {
    const refused = async () => { throw new Error('connect ECONNREFUSED'); };

    it('serves while every dependency answers', async () => {
        const health = new HealthService({ required: { postgres: async () => 1 }, degradable: { redis: async () => 'PONG' } });

        expect(await health.report()).toEqual({ status: 'SERVING', degraded: false, checks: { postgres: 'up', redis: 'up' } });
    });

    it('keeps serving degraded while redis is down', async () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const health = new HealthService({ required: { postgres: async () => 1 }, degradable: { redis: refused } });

        expect(await health.report()).toEqual({ status: 'SERVING', degraded: true, checks: { postgres: 'up', redis: 'degraded' } });
        await expect(health.status()).resolves.toBe('SERVING');
        expect(warn).toHaveBeenCalledWith('[health] redis check failed, running degraded:', expect.any(Error));
        warn.mockRestore();
    });

    it('stops serving when postgres is down', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const health = new HealthService({ required: { postgres: refused }, degradable: { redis: async () => 'PONG' } });

        expect(await health.report()).toEqual({ status: 'NOT_SERVING', degraded: false, checks: { postgres: 'down', redis: 'up' } });
        expect(error).toHaveBeenCalledWith('[health] postgres check failed:', expect.any(Error));
        error.mockRestore();
    });
});
