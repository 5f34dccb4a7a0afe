import { TaskStore } from '../repositories/task.repository';
import { TaskEntity } from '../db/task.entity';

const TAG = '[poller]';

export interface PollerConfig {
    workerId: string;
    onTaskReceived: (task: TaskEntity) => Promise<unknown>;
    /** Free worker slots; nothing is claimed while it is 0. */
    capacity: () => number;
    batchSize?: number;
    /** Delay after a productive claim; doubled on every empty one up to `idleMaxMs`. */
    busyMs?: number;
    idleMaxMs?: number;
}

export class Poller {
    private readonly batchSize: number;
    private readonly minInterval: number;
    private readonly maxInterval: number;
    private interval: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;

    constructor(
        private readonly store: TaskStore,
        private readonly config: PollerConfig,
    ) {
        this.batchSize = config.batchSize || 10;
        this.minInterval = config.busyMs ?? 100;
        this.maxInterval = Math.max(config.idleMaxMs ?? 500, this.minInterval);
        this.interval = this.minInterval;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.config.workerId})`);
        void this.poll();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped`);
    }

    /** One claim cycle; returns how many tasks were handed off. */
    async pollOnce(): Promise<number> {
        const free = this.config.capacity();
        if (free <= 0) return 0;

        const tasks = await this.store.claimBatch(Math.min(this.batchSize, free), this.config.workerId);
        for (const task of tasks) {
            this.config.onTaskReceived(task).catch(
                err => console.error(`${TAG} task ${task.id} callback error:`, err),
            );
        }
        return tasks.length;
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        try {
            const claimed = await this.pollOnce();
            if (claimed > 0) {
                this.interval = this.minInterval;
            } else {
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
        } catch (err) {
            console.error(`${TAG} claim error:`, err);
            this.interval = this.maxInterval;
        }

        if (this.running) {
            this.currentTimeout = setTimeout(() => void this.poll(), this.interval);
        }
    }
}
