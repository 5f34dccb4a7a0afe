import { ErrorCodes, HandlerRegistry, InfrastructureError, ValidationError } from '@taskgate/sdk';
import { TaskService } from '../../src/services/task.service';
import { CreatedTask, NewTask } from '../../src/repositories/task.repository';
import { InMemoryTaskStore } from '../helpers/memory-stores';

class UnavailableTaskStore extends InMemoryTaskStore {
    async create(_input: NewTask): Promise<CreatedTask> {
        throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    }
}

describe('TaskService', () => {
    let store: InMemoryTaskStore;
    let registry: HandlerRegistry;
    let service: TaskService;

    beforeEach(() => {
        store = new InMemoryTaskStore();
        registry = new HandlerRegistry();
        registry.register('dw_law.consultar_processo', {
            requiredFields: ['numero_processo', 'cliente.id'],
            handle: async () => ({}),
        });
        service = new TaskService(store, registry, { maxAttempts: 3 });
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('records a valid submission as pending', async () => {
        const { taskId, status } = await service.submit({
            topic: 'dw_law.consultar_processo',
            payload: { numero_processo: '0001234-55.2024.8.26.0100', cliente: { id: 7 } },
        });

        expect(status).toBe('pending');
        const task = await store.findById(taskId);
        expect(task?.max_attempts).toBe(3);
        expect(task?.attempt_count).toBe(0);
        expect(task?.payload).toEqual({ numero_processo: '0001234-55.2024.8.26.0100', cliente: { id: 7 } });
    });

    it('fails a submission with missing fields immediately without an attempt', async () => {
        const { taskId, status } = await service.submit({
            topic: 'dw_law.consultar_processo',
            payload: { numero_processo: '  ', cliente: {} },
        });

        expect(status).toBe('failed');
        const view = await service.getStatus(taskId);
        expect(view).toEqual({
            taskId,
            topic: 'dw_law.consultar_processo',
            status: 'failed',
            attemptCount: 0,
            error: {
                code: ErrorCodes.MISSING_REQUIRED_FIELD,
                class: 'validation',
                message: 'Missing required fields: numero_processo, cliente.id',
                details: { fields: ['numero_processo', 'cliente.id'] },
            },
        });
        await expect(store.claim(taskId, 'worker-1')).resolves.toBeNull();
    });

    it('refuses an unknown topic without storing anything', async () => {
        const submission = service.submit({ topic: 'nope.topic', payload: {} });

        await expect(submission).rejects.toBeInstanceOf(ValidationError);
        await expect(submission).rejects.toMatchObject({ code: ErrorCodes.UNKNOWN_TOPIC, details: { topic: 'nope.topic' } });
        expect(store.tasks.size).toBe(0);
    });

    it('returns the live task for a repeated idempotency key', async () => {
        const payload = { numero_processo: '1', cliente: { id: 1 } };
        const first = await service.submit({ topic: 'dw_law.consultar_processo', payload, idempotencyKey: 'ext-task-1' });
        const second = await service.submit({ topic: 'dw_law.consultar_processo', payload, idempotencyKey: 'ext-task-1' });

        expect(second.taskId).toBe(first.taskId);
        expect(store.tasks.size).toBe(1);
    });

    it('raises an infrastructure error when the store is unreachable', async () => {
        const broken = new TaskService(new UnavailableTaskStore(), registry, { maxAttempts: 3 });

        const submission = broken.submit({ topic: 'dw_law.consultar_processo', payload: { numero_processo: '1', cliente: { id: 1 } } });

        await expect(submission).rejects.toBeInstanceOf(InfrastructureError);
        await expect(submission).rejects.toMatchObject({
            code: ErrorCodes.STORE_UNAVAILABLE,
            errorClass: 'infrastructure',
            message: 'Task store unavailable: connect ECONNREFUSED 127.0.0.1:5432',
        });
    });

    it('answers null for ids it does not know', async () => {
        await expect(service.getStatus('not-a-uuid')).resolves.toBeNull();
        await expect(service.getStatus('0b8f3a52-3c1e-4c55-9a3f-6f4f1f0b2d11')).resolves.toBeNull();
    });

    it('includes the result once the task succeeded', async () => {
        const { taskId } = await service.submit({ topic: 'dw_law.consultar_processo', payload: { numero_processo: '1', cliente: { id: 1 } } });
        await store.claim(taskId, 'worker-1');
        await store.markSucceeded(taskId, 'worker-1', { chave_de_pesquisa: 'K1' });

        await expect(service.getStatus(taskId)).resolves.toEqual({
            taskId,
            topic: 'dw_law.consultar_processo',
            status: 'succeeded',
            attemptCount: 1,
            result: { chave_de_pesquisa: 'K1' },
        });
    });

    it('lists with the default page when no limit is given', async () => {
        const list = jest.spyOn(store, 'list');
        const { taskId } = await service.submit({ topic: 'dw_law.consultar_processo', payload: { numero_processo: '1', cliente: { id: 1 } } });

        const views = await service.list({ status: 'pending' });

        expect(views.map(view => view.taskId)).toEqual([taskId]);
        expect(list).toHaveBeenCalledWith({ status: 'pending', topic: undefined, limit: 50, offset: 0 });
    });

    it('refuses a listing page outside the allowed range', async () => {
        await expect(service.list({ limit: 0 })).rejects.toMatchObject({ code: ErrorCodes.INVALID_PAYLOAD, details: { limit: 0 } });
        await expect(service.list({ limit: 1001 })).rejects.toBeInstanceOf(ValidationError);
        await expect(service.list({ offset: -1 })).rejects.toThrow('offset must not be negative');
    });

    it('counts rejected submissions in the statistics', async () => {
        await service.submit({ topic: 'dw_law.consultar_processo', payload: { numero_processo: '1', cliente: { id: 1 } } });
        await service.submit({ topic: 'dw_law.consultar_processo', payload: {} });

        await expect(service.statistics()).resolves.toEqual({
            total: 2,
            byStatus: { pending: 1, in_progress: 0, retrying: 0, succeeded: 0, failed: 1 },
            byTopic: { 'dw_law.consultar_processo': 2 },
            successRate: 0,
        });
    });
});
