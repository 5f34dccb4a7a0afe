import { Redis } from 'ioredis';

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

/**
 * Redis lease naming one instance leader for a periodic job.
 * Call tryBecomeLeader() on every tick: it acquires a free lease or renews our own.
 */
export class LeaderElector {
    constructor(
        private readonly redis: Redis,
        private readonly key: string,
        private readonly workerId: string,
        private readonly ttlSeconds: number = 30,
    ) { }

    async tryBecomeLeader(): Promise<boolean> {
        // SETNX with TTL - atomic operation
        const result = await this.redis.set(this.key, this.workerId, 'EX', this.ttlSeconds, 'NX');
        if (result === 'OK') return true;

        return this.renewLock();
    }

    async releaseLeadership(): Promise<void> {
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.workerId);
    }

    private async renewLock(): Promise<boolean> {
        // Only extend TTL if we're still the leader
        const result = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.workerId, this.ttlSeconds);
        return result === 1;
    }
}
