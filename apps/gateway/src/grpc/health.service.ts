import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';

export interface HealthCheckRequest {
    service: string;
}

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckResponse {
    status: ServingStatus;
}

/** A dependency ping; rejects when the dependency is down. */
export type DependencyCheck = () => Promise<unknown>;

export interface HealthDependencies {
    /** Serving only while all of these answer. */
    required: Record<string, DependencyCheck>;
    /** Reported as degraded when down; the instance keeps serving. */
    degradable?: Record<string, DependencyCheck>;
}

export type CheckState = 'up' | 'down' | 'degraded';

export interface HealthReport {
    status: ServingStatus;
    degraded: boolean;
    checks: Record<string, CheckState>;
}

/**
 * Standard gRPC health check service implementation.
 * Postgres gates SERVING; a Redis outage only marks the instance degraded.
 */
export class HealthService {
    private readonly required: Record<string, DependencyCheck>;
    private readonly degradable: Record<string, DependencyCheck>;

    constructor(dependencies: HealthDependencies) {
        this.required = dependencies.required;
        this.degradable = dependencies.degradable ?? {};
    }

    async report(): Promise<HealthReport> {
        const checks: Record<string, CheckState> = {};
        let status: ServingStatus = 'SERVING';
        let degraded = false;

        for (const [name, check] of Object.entries(this.required)) {
            if (await answers(name, check, 'error')) {
                checks[name] = 'up';
            } else {
                checks[name] = 'down';
                status = 'NOT_SERVING';
            }
        }
        for (const [name, check] of Object.entries(this.degradable)) {
            if (await answers(name, check, 'warn')) {
                checks[name] = 'up';
            } else {
                checks[name] = 'degraded';
                degraded = true;
            }
        }
        return { status, degraded, checks };
    }

    async status(): Promise<ServingStatus> {
        const { status } = await this.report();
        return status;
    }

    async check(
        _call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): Promise<void> {
        callback(null, { status: await this.status() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): Promise<void> {
        call.write({ status: await this.status() });
        call.end();
    }
}

async function answers(name: string, check: DependencyCheck, level: 'error' | 'warn'): Promise<boolean> {
    try {
        await check();
        return true;
    } catch (error) {
        if (level === 'error') console.error(`[health] ${name} check failed:`, error);
        else console.warn(`[health] ${name} check failed, running degraded:`, error);
        return false;
    }
}
