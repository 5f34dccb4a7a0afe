import { CallbackStore } from '../repositories/callback.repository';
import { Clock } from '../credentials/credential-cache';
import { CallbackCorrelator } from './callback-correlator';
import { LeaderElector } from './leaderelector';

const TAG = '[reconciler]';

export interface ReconcilerOptions {
    sweepIntervalMs: number;
    retentionMs: number;
    batchSize?: number;
    clock?: Clock;
}

export interface SweepResult {
    scanned: number;
    signalled: number;
    expired: number;
}

// Retries correlation for callbacks that arrived before their workflow was
// waiting, and expires the ones still unmatched after the retention window.
export class CallbackReconciler {
    private intervalHandle: NodeJS.Timeout | null = null;
    private sweeping = false;
    private readonly clock: Clock;

    constructor(
        private readonly callbacks: CallbackStore,
        private readonly correlator: CallbackCorrelator,
        private readonly leaderElector: LeaderElector,
        private readonly options: ReconcilerOptions,
    ) {
        this.clock = options.clock ?? Date.now;
    }

    start(): void {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running`);
            return;
        }
        console.log(`${TAG} started (interval: ${this.options.sweepIntervalMs}ms, retention: ${this.options.retentionMs}ms)`);
        this.intervalHandle = setInterval(() => void this.tick(), this.options.sweepIntervalMs);
    }

    async stop(): Promise<void> {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leaderElector.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    async tick(): Promise<SweepResult | null> {
        try {
            if (!(await this.leaderElector.tryBecomeLeader())) return null;
        } catch (err) {
            console.error(`${TAG} leader election failed:`, err);
            return null;
        }
        return this.sweep();
    }

    async sweep(): Promise<SweepResult | null> {
        if (this.sweeping) return null;
        this.sweeping = true;

        const result: SweepResult = { scanned: 0, signalled: 0, expired: 0 };
        try {
            const cutoff = new Date(this.clock() - this.options.retentionMs);
            result.expired = await this.callbacks.expireUnmatched(cutoff);

            const unmatched = await this.callbacks.findUnmatched(cutoff, this.options.batchSize ?? 100);
            for (const record of unmatched) {
                result.scanned++;
                if ((await this.correlator.process(record)) === 'signalled') result.signalled++;
            }

            if (result.signalled > 0 || result.expired > 0) {
                console.log(`${TAG} sweep: ${result.signalled} correlated, ${result.expired} expired, ${result.scanned} scanned`);
            }
        } catch (err) {
            console.error(`${TAG} error during sweep:`, err);
        } finally {
            this.sweeping = false;
        }
        return result;
    }
}
