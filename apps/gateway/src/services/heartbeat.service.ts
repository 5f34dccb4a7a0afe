/** Renews one lease; resolve false when the lease is gone. */
export type Beat = (id: string) => Promise<boolean | void>;

/**
 * Keeps leases alive by calling `beat` for every tracked id on an interval.
 * Used for gateway task leases and for engine external-task locks.
 */
export class HeartbeatService {
    private readonly handles = new Map<string, NodeJS.Timeout>();

    constructor(
        private readonly beat: Beat,
        private readonly intervalMs: number = 5000,
        private readonly tag: string = '[heartbeat]',
    ) { }

    start(id: string): void {
        if (this.handles.has(id)) {
            console.warn(`${this.tag} already running for ${id}, restarting`);
            this.stop(id);
        }

        void this.tick(id);
        this.handles.set(id, setInterval(() => void this.tick(id), this.intervalMs));
    }

    stop(id: string): void {
        const handle = this.handles.get(id);
        if (handle) {
            clearInterval(handle);
            this.handles.delete(id);
        }
    }

    stopAll(): void {
        for (const handle of this.handles.values()) clearInterval(handle);
        this.handles.clear();
    }

    isRunning(id: string): boolean {
        return this.handles.has(id);
    }

    get size(): number {
        return this.handles.size;
    }

    private async tick(id: string): Promise<void> {
        try {
            const alive = await this.beat(id);
            if (alive === false && this.handles.has(id)) {
                console.warn(`${this.tag} lease on ${id} lost, stopping renewal`);
                this.stop(id);
            }
        } catch (err) {
            console.error(`${this.tag} failed to renew ${id}:`, err);
        }
    }
}
