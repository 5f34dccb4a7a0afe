import {
    ApiCaller,
    ApiRequest,
    ApiResponse,
    AuthenticationExpiredError,
    BusinessRejectedError,
    ErrorCodes,
    TransientError,
} from '@taskgate/sdk';
import { ExternalApiConfig } from '../config';
import { CredentialCache, Clock } from '../credentials/credential-cache';
import { calculateBackOff, sleep } from '../utils/backoff';

const TAG = '[api-client]';

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

export interface ApiClientOptions {
    maxAttempts: number;
    maxElapsedMs: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    backoffMultiplier?: number;
    clock?: Clock;
    sleep?: (ms: number) => Promise<void>;
    fetch?: typeof fetch;
}

type AttemptOutcome =
    | { kind: 'ok'; response: ApiResponse }
    | { kind: 'auth'; status: number }
    | { kind: 'rejected'; response: ApiResponse }
    | { kind: 'transient'; error: TransientError };

/**
 * One logical call against a flaky external API.
 * Transport failures and 408/429/5xx are retried with jittered backoff inside
 * the attempt and elapsed budgets, as are transient failures of the credential
 * endpoint. An auth rejection invalidates the cached credential once per call
 * and retries within the same budget; other 4xx answers are final.
 */
export class ResilientApiClient implements ApiCaller {
    private readonly apis: Map<string, ExternalApiConfig>;
    private readonly clock: Clock;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly fetchFn: typeof fetch;

    constructor(
        apis: ExternalApiConfig[],
        private readonly credentials: CredentialCache,
        private readonly options: ApiClientOptions,
    ) {
        this.apis = new Map(apis.map(api => [api.name, api]));
        this.clock = options.clock ?? Date.now;
        this.sleep = options.sleep ?? sleep;
        this.fetchFn = options.fetch ?? fetch;
    }

    async call(apiName: string, accountId: string, request: ApiRequest): Promise<ApiResponse> {
        const api = this.apis.get(apiName);
        if (!api) throw new Error(`External API "${apiName}" is not configured`);

        const callClass = request.callClass ? api.callClasses[request.callClass] : undefined;
        const timeoutMs = request.timeoutMs ?? callClass?.timeoutMs ?? api.timeoutMs;
        const maxElapsedMs = callClass?.maxElapsedMs ?? this.options.maxElapsedMs;
        const label = `${apiName}/${accountId} ${request.method} ${request.path}`;

        const startedAt = this.clock();
        let reauthenticated = false;
        let attempt = 0;

        while (true) {
            attempt++;
            const outcome = await this.attempt(api, accountId, request, timeoutMs);
            const elapsedMs = this.clock() - startedAt;
            this.logAttempt(label, attempt, elapsedMs, outcome);

            switch (outcome.kind) {
                case 'ok':
                    return outcome.response;

                case 'rejected':
                    throw new BusinessRejectedError(
                        `${label} rejected with ${outcome.response.status}`,
                        { status: outcome.response.status, body: outcome.response.body },
                    );

                case 'auth':
                    if (reauthenticated) {
                        throw new AuthenticationExpiredError(
                            `${label} rejected credentials after re-authentication`,
                            ErrorCodes.AUTH_REJECTED,
                            { status: outcome.status, attempts: attempt },
                        );
                    }
                    if (attempt >= this.options.maxAttempts) {
                        throw new AuthenticationExpiredError(
                            `${label} rejected credentials with no attempts left`,
                            ErrorCodes.AUTH_REJECTED,
                            { status: outcome.status, attempts: attempt },
                        );
                    }
                    // the one mandatory re-authentication does not wait for backoff
                    reauthenticated = true;
                    await this.credentials.invalidate(apiName, accountId);
                    continue;

                case 'transient': {
                    if (attempt >= this.options.maxAttempts) {
                        throw new TransientError(
                            `${label} failed after ${attempt} attempts: ${outcome.error.message}`,
                            outcome.error.code,
                            { ...outcome.error.details, attempts: attempt, elapsedMs },
                        );
                    }
                    const delay = calculateBackOff(
                        attempt,
                        this.options.initialBackoffMs,
                        this.options.backoffMultiplier ?? 2,
                        this.options.maxBackoffMs,
                    );
                    if (elapsedMs + delay > maxElapsedMs) {
                        throw new TransientError(
                            `${label} exceeded ${maxElapsedMs}ms after ${attempt} attempts: ${outcome.error.message}`,
                            outcome.error.code,
                            { ...outcome.error.details, attempts: attempt, elapsedMs },
                        );
                    }
                    await this.sleep(delay);
                }
            }
        }
    }

    private async attempt(api: ExternalApiConfig, accountId: string, request: ApiRequest, timeoutMs: number): Promise<AttemptOutcome> {
        let token: string;
        try {
            token = await this.credentials.acquire(api.name, accountId);
        } catch (err) {
            if (!(err instanceof TransientError)) throw err;
            return { kind: 'transient', error: err };
        }
        return this.send(api, token, request, timeoutMs);
    }

    private async send(api: ExternalApiConfig, token: string, request: ApiRequest, timeoutMs: number): Promise<AttemptOutcome> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);

        const headers: Record<string, string> = {
            Accept: 'application/json',
            Authorization: `Bearer ${token}`,
        };
        if (request.body !== undefined) headers['Content-Type'] = 'application/json';

        let response: ApiResponse;
        try {
            const res = await this.fetchFn(buildUrl(api.baseUrl, request.path, request.query), {
                method: request.method,
                headers: { ...headers, ...request.headers },
                body: request.body === undefined ? undefined : JSON.stringify(request.body),
                signal: controller.signal,
            });
            const responseHeaders: Record<string, string> = {};
            res.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });
            response = { status: res.status, body: parseBody(await res.text()), headers: responseHeaders };
        } catch (err) {
            const timedOut = controller.signal.aborted;
            return {
                kind: 'transient',
                error: new TransientError(
                    timedOut ? `timed out after ${timeoutMs}ms` : errorMessage(err),
                    timedOut ? ErrorCodes.UPSTREAM_TIMEOUT : ErrorCodes.UPSTREAM_UNAVAILABLE,
                ),
            };
        } finally {
            clearTimeout(timeout);
        }

        const status = response.status;
        if (status >= 200 && status < 300) return { kind: 'ok', response };
        if (status === 401 || (status === 403 && api.forbiddenIsAuth)) return { kind: 'auth', status };
        if (RETRYABLE_STATUSES.has(status)) {
            return {
                kind: 'transient',
                error: new TransientError(
                    `upstream returned ${status}`,
                    status === 408 ? ErrorCodes.UPSTREAM_TIMEOUT : ErrorCodes.UPSTREAM_UNAVAILABLE,
                    { status },
                ),
            };
        }
        if (status >= 400 && status < 500) return { kind: 'rejected', response };
        return {
            kind: 'transient',
            error: new TransientError(`upstream returned unexpected status ${status}`, ErrorCodes.UPSTREAM_UNAVAILABLE, { status }),
        };
    }

    private logAttempt(label: string, attempt: number, elapsedMs: number, outcome: AttemptOutcome): void {
        const line = `${TAG} ${label} attempt=${attempt} elapsedMs=${elapsedMs}`;
        switch (outcome.kind) {
            case 'ok':
                console.log(`${line} outcome=ok status=${outcome.response.status}`);
                break;
            case 'auth':
                console.warn(`${line} outcome=auth_expired status=${outcome.status}`);
                break;
            case 'rejected':
                console.warn(`${line} outcome=business_rejected status=${outcome.response.status}`);
                break;
            case 'transient':
                console.warn(`${line} outcome=transient code=${outcome.error.code} (${outcome.error.message})`);
                break;
        }
    }
}

export function buildUrl(baseUrl: string, path: string, query?: ApiRequest['query']): string {
    const url = `${baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    if (!query || Object.keys(query).length === 0) return url;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) params.append(key, String(value));
    return `${url}?${params.toString()}`;
}

function parseBody(text: string): unknown {
    if (text.length === 0) return null;
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
