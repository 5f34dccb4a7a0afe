import { ReclaimedTask, TaskStore } from '../repositories/task.repository';
import { LeaderElector } from './leaderelector';

const TAG = '[reaper]';

export interface ReaperOptions {
    leaseTimeoutSeconds: number;
    intervalMs: number;
}

// Reclaims in_progress tasks whose lease stopped being renewed. Runs on one
// instance at a time via Redis leader election.
export class Reaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly store: TaskStore,
        private readonly leaderElector: LeaderElector,
        private readonly options: ReaperOptions,
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.options.intervalMs}ms, lease timeout: ${this.options.leaseTimeoutSeconds}s)`);

        // Fire immediately, then on schedule
        void this.tick();
        this.intervalHandle = setInterval(() => void this.tick(), this.options.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leaderElector.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async tick(): Promise<ReclaimedTask[]> {
        try {
            if (!(await this.leaderElector.tryBecomeLeader())) return [];
        } catch (err) {
            console.error(`${TAG} leader election failed:`, err);
            return [];
        }
        return this.reap();
    }

    async reap(): Promise<ReclaimedTask[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        try {
            const reaped = await this.store.reclaimExpired(this.options.leaseTimeoutSeconds);
            if (reaped.length > 0) {
                console.log(`${TAG} reclaimed ${reaped.length} tasks: ${reaped.map(t => `${t.id}(${t.action})`).join(', ')}`);
            }
            return reaped;
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
            return [];
        } finally {
            this.isReaping = false;
        }
    }
}
