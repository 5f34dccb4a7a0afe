import { ExternalTask } from '../clients/engine-client';
import { ExternalTaskAdapter } from './external-task.adapter';

const TAG = '[adapter]';

export interface ExternalTaskWorkerOptions {
    topics: string[];
    maxTasks: number;
    pollIntervalMs: number;
}

/** Long-polls the engine for the configured topics and hands each task to the adapter. */
export class ExternalTaskWorker {
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly active = new Map<string, Promise<void>>();

    constructor(
        private readonly adapter: ExternalTaskAdapter,
        private readonly options: ExternalTaskWorkerOptions,
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} worker already running`);
            return;
        }
        if (this.options.topics.length === 0) {
            console.log(`${TAG} no engine topics configured, worker not started`);
            return;
        }
        this.running = true;
        this.adapter.resume();
        console.log(`${TAG} worker started (topics: ${this.options.topics.join(', ')})`);
        void this.poll();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        this.adapter.stop();
        await Promise.allSettled(Array.from(this.active.values()));
        console.log(`${TAG} worker stopped`);
    }

    get activeCount(): number {
        return this.active.size;
    }

    /** One fetch round over all topics; returns how many tasks were started. */
    async pollOnce(): Promise<number> {
        let started = 0;
        for (const topic of this.options.topics) {
            const free = this.options.maxTasks - this.active.size;
            if (free <= 0) break;
            const tasks = await this.adapter.fetch(topic, free);
            for (const task of tasks) {
                this.track(task);
                started++;
            }
        }
        return started;
    }

    private track(task: ExternalTask): void {
        if (this.active.has(task.id)) return;
        const job = this.adapter
            .process(task)
            .then(outcome => console.log(`${TAG} external task ${task.id} (${task.topicName}): ${outcome}`))
            .catch(err => console.error(`${TAG} external task ${task.id} handling failed:`, err))
            .finally(() => this.active.delete(task.id));
        this.active.set(task.id, job);
    }

    private async poll(): Promise<void> {
        if (!this.running) return;
        try {
            await this.pollOnce();
        } catch (err) {
            console.error(`${TAG} fetch error:`, err);
        }
        if (this.running) {
            this.currentTimeout = setTimeout(() => void this.poll(), this.options.pollIntervalMs);
        }
    }
}
