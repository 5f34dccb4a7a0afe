import { BusinessRejectedError, ErrorCodes, TransientError } from '@taskgate/sdk';
import { CamundaRestClient } from '../../src/clients/engine-client';

type FetchMock = jest.Mock<Promise<Response>, Parameters<typeof fetch>>;

function reply(status: number, body?: unknown): FetchMock {
    return jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () =>
        new Response(body === undefined ? null : JSON.stringify(body), { status }),
    );
}

function sent(fetchMock: FetchMock, call = 0): { url: unknown; body: unknown; headers: unknown } {
    const [url, init] = fetchMock.mock.calls[call] ?? [];
    return { url, body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined, headers: init?.headers };
}

describe('CamundaRestClient', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('fetches and locks tasks, normalizing variable types', async () => {
        const fetchMock = reply(200, [
            {
                id: 'ext-1',
                topicName: 'dw_law.inserir_processos',
                processInstanceId: 'proc-1',
                businessKey: null,
                retries: null,
                variables: {
                    chave_projeto: { value: 'P1', type: 'string' },
                    processos: { value: '["0001"]', type: 'json' },
                    total: { value: 2, type: 'Integer' },
                },
            },
            { topicName: 'sem_id' },
        ]);
        const client = new CamundaRestClient({ restUrl: 'http://engine.test/engine-rest/' }, fetchMock);

        const tasks = await client.fetchAndLock('engine-worker', [{ topicName: 'dw_law.inserir_processos', lockDuration: 60_000 }], 5);

        expect(tasks).toEqual([{
            id: 'ext-1',
            topicName: 'dw_law.inserir_processos',
            processInstanceId: 'proc-1',
            businessKey: null,
            retries: null,
            variables: {
                chave_projeto: { value: 'P1', type: 'String' },
                processos: { value: '["0001"]', type: 'Json' },
                total: { value: 2, type: 'Integer' },
            },
        }]);
        expect(sent(fetchMock)).toMatchObject({
            url: 'http://engine.test/engine-rest/external-task/fetchAndLock',
            body: {
                workerId: 'engine-worker',
                maxTasks: 5,
                usePriority: true,
                topics: [{ topicName: 'dw_law.inserir_processos', lockDuration: 60_000 }],
            },
        });
    });

    it('posts completions, failures and BPMN errors to the task resource', async () => {
        const fetchMock = reply(204);
        const client = new CamundaRestClient({ restUrl: 'http://engine.test/engine-rest' }, fetchMock);

        await client.complete('ext 1', 'w', { ok: { value: true, type: 'Boolean' } });
        await client.handleFailure('ext-1', 'w', { errorMessage: 'E: m', retries: 2, retryTimeout: 1000 });
        await client.handleBpmnError('ext-1', 'w', 'VALIDATION_ERROR', 'Missing required variables: processos');
        await client.extendLock('ext-1', 'w', 60_000);

        expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
            'http://engine.test/engine-rest/external-task/ext%201/complete',
            'http://engine.test/engine-rest/external-task/ext-1/failure',
            'http://engine.test/engine-rest/external-task/ext-1/bpmnError',
            'http://engine.test/engine-rest/external-task/ext-1/extendLock',
        ]);
        expect(sent(fetchMock, 1).body).toEqual({ workerId: 'w', errorMessage: 'E: m', retries: 2, retryTimeout: 1000 });
        expect(sent(fetchMock, 2).body).toEqual({
            workerId: 'w',
            errorCode: 'VALIDATION_ERROR',
            errorMessage: 'Missing required variables: processos',
            variables: {},
        });
        expect(sent(fetchMock, 3).body).toEqual({ workerId: 'w', newDuration: 60_000 });
    });

    it('correlates messages with basic auth when configured', async () => {
        const fetchMock = reply(204);
        const client = new CamundaRestClient({ restUrl: 'http://engine.test/engine-rest', user: 'demo', password: 'change-me' }, fetchMock);

        await client.correlateMessage({
            messageName: 'retorno_dw_law',
            businessKey: 'bk-1',
            processVariables: { dw_law_status_pesquisa: { value: 'OK', type: 'String' } },
        });

        expect(sent(fetchMock)).toEqual({
            url: 'http://engine.test/engine-rest/message',
            body: {
                messageName: 'retorno_dw_law',
                businessKey: 'bk-1',
                processVariables: { dw_law_status_pesquisa: { value: 'OK', type: 'String' } },
            },
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Basic ${Buffer.from('demo:change-me').toString('base64')}`,
            },
        });
    });

    it('classifies engine errors', async () => {
        const down = new CamundaRestClient({ restUrl: 'http://engine.test' }, reply(503, { message: 'busy' }));
        const rejecting = new CamundaRestClient({ restUrl: 'http://engine.test' }, reply(400, { message: 'No process waits for retorno_dw_law' }));

        await expect(down.correlateMessage({ messageName: 'm', processVariables: {} })).rejects.toBeInstanceOf(TransientError);
        await expect(rejecting.correlateMessage({ messageName: 'm', processVariables: {} })).rejects.toBeInstanceOf(BusinessRejectedError);
    });

    it('reports an unreachable engine as transient', async () => {
        const fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () => {
            throw new Error('connect ECONNREFUSED 127.0.0.1:8080');
        });
        const client = new CamundaRestClient({ restUrl: 'http://engine.test' }, fetchMock);

        await expect(client.extendLock('ext-1', 'w', 1000)).rejects.toMatchObject({
            code: ErrorCodes.UPSTREAM_UNAVAILABLE,
            message: 'engine /external-task/ext-1/extendLock unreachable: connect ECONNREFUSED 127.0.0.1:8080',
        });
    });
});
