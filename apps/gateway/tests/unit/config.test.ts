import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG_DIR, loadConfig, parseCallbackSources, parseTopicRoutes } from '../../src/config';

describe('loadConfig', () => {
    it('applies defaults and reads the shipped routes', () => {
        const config = loadConfig({}, DEFAULT_CONFIG_DIR);

        expect(config.grpcPort).toBe(50051);
        expect(config.httpPort).toBe(8080);
        expect(config.workerId).toMatch(/^gateway-[0-9a-f]{8}$/);
        expect(config.engine.workerId).toBe(config.workerId);
        expect(config.credentials.safetyMarginMs).toBe(60_000);
        expect(config.callbacks.retentionMs).toBe(72 * 3600 * 1000);
        expect(config.apis).toEqual([]);
        expect(config.topics.map(t => t.topic)).toContain('dw_law.inserir_processos');
        expect(config.topics.find(t => t.topic === 'dw_law.inserir_processos')?.awaitCallback).toEqual({
            source: 'dw_law',
            keyField: 'chave_de_pesquisa',
        });
        expect(config.callbacks.sources.map(s => s.name)).toEqual(['dw_law']);
    });

    it('builds external APIs from prefixed variables', () => {
        const config = loadConfig({
            WORKER_ID: 'gw-a',
            EXTERNAL_APIS: 'dw_law, cpj',
            DW_LAW_BASE_URL: 'https://dwlaw.test/',
            DW_LAW_ACCOUNT: 'escritorio',
            DW_LAW_SECRET: 'test-secret',
            CPJ_BASE_URL: 'https://cpj.test',
            CPJ_ACCOUNT: 'integracao',
            CPJ_TIMEOUT_MS: '1000',
            CPJ_FORBIDDEN_IS_AUTH: 'true',
            ENGINE_TOPICS: 'dw_law.inserir_processos,cpj.buscar_processo',
        }, DEFAULT_CONFIG_DIR);

        expect(config.workerId).toBe('gw-a');
        expect(config.apis[0]).toEqual({
            name: 'dw_law',
            baseUrl: 'https://dwlaw.test',
            authPath: '/api/auth',
            defaultAccount: 'escritorio',
            accounts: { escritorio: 'test-secret' },
            tokenTtlMinutes: 30,
            timeoutMs: 30_000,
            forbiddenIsAuth: false,
            callClasses: { slow: { timeoutMs: 120_000, maxElapsedMs: 180_000 } },
        });
        expect(config.apis[1]).toMatchObject({ name: 'cpj', timeoutMs: 1000, forbiddenIsAuth: true, callClasses: { slow: { timeoutMs: 4000 } } });
        expect(config.engine.topics).toEqual(['dw_law.inserir_processos', 'cpj.buscar_processo']);
    });

    it('refuses an API without its base URL or account', () => {
        expect(() => loadConfig({ EXTERNAL_APIS: 'cpj', CPJ_BASE_URL: 'https://cpj.test' }, DEFAULT_CONFIG_DIR)).toThrow(
            'Missing required env vars CPJ_BASE_URL / CPJ_ACCOUNT for external API "cpj"',
        );
    });

    it('refuses a non-numeric port', () => {
        expect(() => loadConfig({ PORT: 'abc' }, DEFAULT_CONFIG_DIR)).toThrow('PORT must be an integer, got "abc"');
    });

    it('runs without route files', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskgate-config-'));
        try {
            const config = loadConfig({}, dir);
            expect(config.topics).toEqual([]);
            expect(config.callbacks.sources).toEqual([]);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});

describe('parseTopicRoutes', () => {
    it('parses a route with its optional parts', () => {
        expect(parseTopicRoutes([{
            topic: 'cpj.buscar_processo',
            api: 'cpj',
            method: 'GET',
            path: '/processo/{numero_processo}',
            account: 'leitura',
            callClass: 'slow',
        }])).toEqual([{
            topic: 'cpj.buscar_processo',
            api: 'cpj',
            method: 'GET',
            path: '/processo/{numero_processo}',
            requiredFields: [],
            account: 'leitura',
            callClass: 'slow',
        }]);
    });

    it('names the offending entry', () => {
        const base = { topic: 't', api: 'a', method: 'POST', path: '/x' };
        expect(() => parseTopicRoutes({})).toThrow('topic routes: expected an array');
        expect(() => parseTopicRoutes([{ ...base, method: 'FETCH' }])).toThrow('topic routes[0]: "method" must be one of GET, POST, PUT, PATCH, DELETE');
        expect(() => parseTopicRoutes([base, { ...base, path: '' }])).toThrow('topic routes[1]: "path" must be a non-empty string');
        expect(() => parseTopicRoutes([{ ...base, requiredFields: 'id' }])).toThrow('topic routes[0]: "requiredFields" must be an array of strings');
        expect(() => parseTopicRoutes([{ ...base, awaitCallback: { source: 'dw_law' } }])).toThrow(
            'topic routes[0].awaitCallback: "keyField" must be a non-empty string',
        );
    });
});

describe('parseCallbackSources', () => {
    it('keeps the variable field list when given', () => {
        expect(parseCallbackSources([
            { name: 'dw_law', keyField: 'chave_de_pesquisa', messageName: 'retorno_dw_law', variableFields: ['status_pesquisa'] },
            { name: 'cpj', keyField: 'protocolo', messageName: 'retorno_cpj' },
        ])).toEqual([
            { name: 'dw_law', keyField: 'chave_de_pesquisa', messageName: 'retorno_dw_law', variableFields: ['status_pesquisa'] },
            { name: 'cpj', keyField: 'protocolo', messageName: 'retorno_cpj' },
        ]);
    });

    it('requires a message name', () => {
        expect(() => parseCallbackSources([{ name: 'cpj', keyField: 'protocolo' }])).toThrow(
            'callback sources[0]: "messageName" must be a non-empty string',
        );
    });
});
