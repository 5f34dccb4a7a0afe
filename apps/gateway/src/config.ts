import fs from 'fs';
import path from 'path';
import { v7 as uuid } from 'uuid';
import { HttpMethod } from '@taskgate/sdk';

type Env = Record<string, string | undefined>;

export interface CallClassConfig {
    timeoutMs: number;
    maxElapsedMs?: number;
}

export interface ExternalApiConfig {
    name: string;
    baseUrl: string;
    authPath: string;
    defaultAccount: string;
    /** account id → secret */
    accounts: Record<string, string>;
    /** Used when the credential endpoint reports no expiry. */
    tokenTtlMinutes: number;
    timeoutMs: number;
    forbiddenIsAuth: boolean;
    callClasses: Record<string, CallClassConfig>;
}

export interface TopicRouteConfig {
    topic: string;
    api: string;
    method: HttpMethod;
    /** `{field}` placeholders are filled from the payload. */
    path: string;
    account?: string;
    requiredFields: string[];
    callClass?: string;
    /** After success, park the workflow on a callback keyed by this result field. */
    awaitCallback?: AwaitCallbackConfig;
}

export interface AwaitCallbackConfig {
    source: string;
    keyField: string;
}

export interface CallbackSourceConfig {
    name: string;
    keyField: string;
    messageName: string;
    variableFields?: string[];
}

export interface GatewayConfig {
    grpcPort: number;
    httpPort: number;
    databaseUrl: string | undefined;
    redisUrl: string;
    workerId: string;
    runMigrations: boolean;
    dispatch: {
        concurrency: number;
        batchSize: number;
        maxAttempts: number;
        retryInitialMs: number;
        retryMaxMs: number;
        heartbeatIntervalMs: number;
        idlePollMaxMs: number;
    };
    lease: {
        timeoutSeconds: number;
        reaperIntervalMs: number;
        leaderTtlSeconds: number;
    };
    credentials: {
        safetyMarginMs: number;
    };
    apiClient: {
        maxAttempts: number;
        maxElapsedMs: number;
        initialBackoffMs: number;
        maxBackoffMs: number;
    };
    callbacks: {
        sweepIntervalMs: number;
        retentionMs: number;
        sources: CallbackSourceConfig[];
    };
    engine: {
        restUrl: string;
        user?: string;
        password?: string;
        workerId: string;
        lockDurationMs: number;
        maxTasks: number;
        pollIntervalMs: number;
        defaultRetries: number;
        retryTimeoutMs: number;
        topics: string[];
    };
    apis: ExternalApiConfig[];
    topics: TopicRouteConfig[];
}

export const DEFAULT_CONFIG_DIR = path.resolve(__dirname, '../config');

function int(env: Env, key: string, fallback: number): number {
    const value = parseInt(env[key] || String(fallback), 10);
    if (Number.isNaN(value)) throw new Error(`${key} must be an integer, got "${env[key]}"`);
    return value;
}

function list(value: string | undefined): string[] {
    return (value || '').split(',').map(s => s.trim()).filter(Boolean);
}

export function loadConfig(env: Env = process.env, configDir: string = DEFAULT_CONFIG_DIR): GatewayConfig {
    const workerId = env.WORKER_ID || `gateway-${uuid().slice(0, 8)}`;
    return {
        grpcPort: int(env, 'PORT', 50051),
        httpPort: int(env, 'HTTP_PORT', 8080),
        databaseUrl: env.DATABASE_URL,
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        workerId,
        runMigrations: env.RUN_MIGRATIONS === 'true',
        dispatch: {
            concurrency: int(env, 'DISPATCH_CONCURRENCY', 10),
            batchSize: int(env, 'DISPATCH_BATCH_SIZE', 10),
            maxAttempts: int(env, 'TASK_MAX_ATTEMPTS', 3),
            retryInitialMs: int(env, 'TASK_RETRY_INITIAL_MS', 1000),
            retryMaxMs: int(env, 'TASK_RETRY_MAX_MS', 60_000),
            heartbeatIntervalMs: int(env, 'HEARTBEAT_INTERVAL_MS', 5000),
            idlePollMaxMs: int(env, 'DISPATCH_IDLE_POLL_MAX_MS', 500),
        },
        lease: {
            timeoutSeconds: int(env, 'LEASE_TIMEOUT_SECONDS', 300),
            reaperIntervalMs: int(env, 'REAPER_INTERVAL_MS', 10_000),
            leaderTtlSeconds: int(env, 'LEADER_TTL_SECONDS', 30),
        },
        credentials: {
            safetyMarginMs: int(env, 'CREDENTIAL_SAFETY_MARGIN_SECONDS', 60) * 1000,
        },
        apiClient: {
            maxAttempts: int(env, 'API_MAX_ATTEMPTS', 3),
            maxElapsedMs: int(env, 'API_MAX_ELAPSED_MS', 120_000),
            initialBackoffMs: int(env, 'API_BACKOFF_INITIAL_MS', 500),
            maxBackoffMs: int(env, 'API_BACKOFF_MAX_MS', 10_000),
        },
        callbacks: {
            sweepIntervalMs: int(env, 'CALLBACK_SWEEP_INTERVAL_MS', 5000),
            retentionMs: int(env, 'CALLBACK_RETENTION_HOURS', 72) * 3600 * 1000,
            sources: parseCallbackSources(readJson(configDir, env.CALLBACK_SOURCES_FILE || 'callbacks.json')),
        },
        engine: {
            restUrl: env.ENGINE_REST_URL || 'http://localhost:8080/engine-rest',
            user: env.ENGINE_REST_USER,
            password: env.ENGINE_REST_PASSWORD,
            workerId: env.ENGINE_WORKER_ID || workerId,
            lockDurationMs: int(env, 'ENGINE_LOCK_DURATION_MS', 60_000),
            maxTasks: int(env, 'ENGINE_MAX_TASKS', 5),
            pollIntervalMs: int(env, 'ENGINE_POLL_INTERVAL_MS', 2000),
            defaultRetries: int(env, 'ENGINE_DEFAULT_RETRIES', 3),
            retryTimeoutMs: int(env, 'ENGINE_RETRY_TIMEOUT_MS', 60_000),
            topics: list(env.ENGINE_TOPICS),
        },
        apis: list(env.EXTERNAL_APIS).map(name => loadApi(env, name)),
        topics: parseTopicRoutes(readJson(configDir, env.TOPIC_ROUTES_FILE || 'topics.json')),
    };
}

function loadApi(env: Env, name: string): ExternalApiConfig {
    const prefix = name.toUpperCase();
    const baseUrl = env[`${prefix}_BASE_URL`];
    const account = env[`${prefix}_ACCOUNT`];
    if (!baseUrl || !account) {
        throw new Error(`Missing required env vars ${prefix}_BASE_URL / ${prefix}_ACCOUNT for external API "${name}"`);
    }
    const timeoutMs = int(env, `${prefix}_TIMEOUT_MS`, 30_000);
    return {
        name,
        baseUrl: baseUrl.replace(/\/+$/, ''),
        authPath: env[`${prefix}_AUTH_PATH`] || '/api/auth',
        defaultAccount: account,
        accounts: { [account]: env[`${prefix}_SECRET`] || '' },
        tokenTtlMinutes: int(env, `${prefix}_TOKEN_TTL_MINUTES`, 30),
        timeoutMs,
        forbiddenIsAuth: env[`${prefix}_FORBIDDEN_IS_AUTH`] === 'true',
        callClasses: {
            slow: {
                timeoutMs: int(env, `${prefix}_SLOW_TIMEOUT_MS`, timeoutMs * 4),
                maxElapsedMs: int(env, `${prefix}_SLOW_MAX_ELAPSED_MS`, 180_000),
            },
        },
    };
}

function readJson(dir: string, file: string): unknown {
    const full = path.isAbsolute(file) ? file : path.join(dir, file);
    if (!fs.existsSync(full)) return [];
    return JSON.parse(fs.readFileSync(full, 'utf-8'));
}

const METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(entry: Record<string, unknown>, key: string, where: string): string {
    const value = entry[key];
    if (typeof value !== 'string' || value.length === 0) throw new Error(`${where}: "${key}" must be a non-empty string`);
    return value;
}

function strings(entry: Record<string, unknown>, key: string, where: string): string[] | undefined {
    const value = entry[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new Error(`${where}: "${key}" must be an array of strings`);
    }
    return value;
}

export function parseTopicRoutes(raw: unknown): TopicRouteConfig[] {
    if (!Array.isArray(raw)) throw new Error('topic routes: expected an array');
    return raw.map((entry, i) => {
        const where = `topic routes[${i}]`;
        if (!isObject(entry)) throw new Error(`${where}: expected an object`);
        const method = METHODS.find(m => m === entry.method);
        if (!method) throw new Error(`${where}: "method" must be one of ${METHODS.join(', ')}`);
        const route: TopicRouteConfig = {
            topic: str(entry, 'topic', where),
            api: str(entry, 'api', where),
            method,
            path: str(entry, 'path', where),
            requiredFields: strings(entry, 'requiredFields', where) ?? [],
        };
        if (typeof entry.account === 'string') route.account = entry.account;
        if (typeof entry.callClass === 'string') route.callClass = entry.callClass;
        if (entry.awaitCallback !== undefined) {
            const awaited = entry.awaitCallback;
            if (!isObject(awaited)) throw new Error(`${where}: "awaitCallback" must be an object`);
            route.awaitCallback = {
                source: str(awaited, 'source', `${where}.awaitCallback`),
                keyField: str(awaited, 'keyField', `${where}.awaitCallback`),
            };
        }
        return route;
    });
}

export function parseCallbackSources(raw: unknown): CallbackSourceConfig[] {
    if (!Array.isArray(raw)) throw new Error('callback sources: expected an array');
    return raw.map((entry, i) => {
        const where = `callback sources[${i}]`;
        if (!isObject(entry)) throw new Error(`${where}: expected an object`);
        const source: CallbackSourceConfig = {
            name: str(entry, 'name', where),
            keyField: str(entry, 'keyField', where),
            messageName: str(entry, 'messageName', where),
        };
        const variableFields = strings(entry, 'variableFields', where);
        if (variableFields) source.variableFields = variableFields;
        return source;
    });
}
