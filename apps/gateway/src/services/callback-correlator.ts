import { createHash } from 'crypto';
import { Document, ErrorCodes, ValidationError } from '@taskgate/sdk';
import { CallbackSourceConfig } from '../config';
import { CallbackEntity } from '../db/callback.entity';
import { CallbackStore } from '../repositories/callback.repository';
import { PendingCorrelationStore } from '../repositories/correlation.repository';
import { EngineClient } from '../clients/engine-client';
import { VariableMap, inferType, toVariables } from '../utils/variables';

const TAG = '[correlator]';

export interface ReceiveResult {
    accepted: true;
    callbackId: string;
    duplicate: boolean;
}

export type ProcessOutcome = 'already_signalled' | 'expired' | 'unmatched' | 'signalled' | 'signal_failed';

/**
 * Persists push notifications from external systems and turns them into
 * resume signals for the workflow instance waiting on the same key.
 * Receipt is acknowledged once the record is stored; correlation runs after.
 */
export class CallbackCorrelator {
    private readonly sources: Map<string, CallbackSourceConfig>;
    private readonly inflight = new Set<Promise<void>>();

    constructor(
        private readonly callbacks: CallbackStore,
        private readonly correlations: PendingCorrelationStore,
        private readonly engine: EngineClient,
        sources: CallbackSourceConfig[],
    ) {
        this.sources = new Map(sources.map(source => [source.name, source]));
    }

    hasSource(name: string): boolean {
        return this.sources.has(name);
    }

    async receive(source: string, payload: Document): Promise<ReceiveResult> {
        const config = this.sources.get(source);
        if (!config) {
            throw new ValidationError(`Unknown callback source "${source}"`, ErrorCodes.INVALID_PAYLOAD, { source });
        }

        const correlationKey = readKey(payload, config.keyField);
        if (correlationKey === null) {
            throw new ValidationError(
                `Callback from ${source} carries no "${config.keyField}"`,
                ErrorCodes.MISSING_CORRELATION_KEY,
                { field: config.keyField },
            );
        }

        const { record, duplicate } = await this.callbacks.insert({
            source,
            correlationKey,
            payloadHash: payloadHash(payload),
            rawPayload: payload,
        });
        console.log(`${TAG} callback ${record.id} from ${source} key=${correlationKey}${duplicate ? ' (duplicate)' : ''}`);

        if (!record.signal_sent) this.schedule(record);
        return { accepted: true, callbackId: record.id, duplicate };
    }

    async process(record: CallbackEntity): Promise<ProcessOutcome> {
        if (record.signal_sent) return 'already_signalled';
        if (record.expired_at) return 'expired';

        const config = this.sources.get(record.source);
        if (!config) {
            await this.callbacks.markUnmatched(record.id, `source ${record.source} is not configured`);
            return 'unmatched';
        }

        const pending = await this.correlations.consume(record.source, record.correlation_key);
        if (!pending) {
            await this.callbacks.markUnmatched(record.id, null);
            return 'unmatched';
        }

        try {
            await this.engine.correlateMessage({
                messageName: pending.message_name ?? config.messageName,
                businessKey: pending.business_key ?? undefined,
                processInstanceId: pending.process_instance_id ?? undefined,
                processVariables: callbackVariables(config, record),
            });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.warn(`${TAG} resume signal for ${record.correlation_key} failed, kept for the next sweep: ${message}`);
            await this.correlations.restore(pending);
            await this.callbacks.markUnmatched(record.id, message);
            return 'signal_failed';
        }

        await this.callbacks.markSignalled(record.id);
        console.log(`${TAG} callback ${record.id} correlated to ${pending.business_key ?? pending.process_instance_id ?? record.correlation_key}`);
        return 'signalled';
    }

    /**
     * Correlates callbacks already stored for a key that a workflow has just
     * started waiting on, so early arrivals do not depend on the sweep.
     * Stops at the first delivered signal: a pending correlation resumes once.
     */
    async correlateWaiting(source: string, correlationKey: string): Promise<ProcessOutcome | null> {
        const waiting = await this.callbacks.findByCorrelationKey(source, correlationKey);
        let last: ProcessOutcome | null = null;
        for (const record of waiting) {
            if (record.signal_sent || record.expired_at) continue;
            last = await this.process(record);
            if (last === 'signalled' || last === 'signal_failed') break;
        }
        return last;
    }

    /** Waits for correlations started by receive(). */
    async drain(): Promise<void> {
        await Promise.allSettled(Array.from(this.inflight));
    }

    private schedule(record: CallbackEntity): void {
        const job: Promise<void> = this.process(record)
            .then(() => undefined)
            .catch(err => console.error(`${TAG} processing callback ${record.id} failed:`, err))
            .finally(() => this.inflight.delete(job));
        this.inflight.add(job);
    }
}

function readKey(payload: Document, field: string): string | null {
    const value = payload[field];
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    return null;
}

/** sha256 of the payload serialized with sorted keys. */
export function payloadHash(payload: Document): string {
    return createHash('sha256').update(canonicalJson(payload)).digest('hex');
}

export function canonicalJson(value: unknown): string {
    if (Array.isArray(value)) return `[${value.map(item => canonicalJson(item ?? null)).join(',')}]`;
    if (typeof value === 'object' && value !== null) {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
        return `{${entries.join(',')}}`;
    }
    return JSON.stringify(value) ?? 'null';
}

// <source>_<field> for the configured fields, plus the whole payload and receipt time.
export function callbackVariables(config: CallbackSourceConfig, record: CallbackEntity): VariableMap {
    const payload = record.raw_payload;
    const picked: Document = {};
    for (const field of config.variableFields ?? Object.keys(payload)) {
        if (field in payload) picked[field] = payload[field];
    }
    return {
        ...toVariables(picked, `${config.name}_`),
        [`${config.name}_payload`]: { value: JSON.stringify(payload), type: 'Json' },
        [`${config.name}_received_at`]: inferType(new Date(record.received_at).toISOString()),
    };
}
