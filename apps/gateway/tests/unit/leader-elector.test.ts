import { LeaderElector } from '../../src/services/leaderelector';
import { FakeRedis } from '../helpers/fake-redis';

describe('LeaderElector', () => {
    let redis: FakeRedis;
    const key = 'taskgate:reaper:leader';

    // the elector only touches set and eval
    const elector = (workerId: string, ttl = 30) => new LeaderElector(redis as any, key, workerId, ttl);

    beforeEach(() => {
        redis = new FakeRedis();
    });

    it('elects a leader when key is empty', async () => {
        const won = await elector('worker-1').tryBecomeLeader();
        expect(won).toBe(true);
        expect(redis.values.get(key)).toEqual({ value: 'worker-1', ttlSeconds: 30 });
    });

    it('keeps a second instance out while the lease is held', async () => {
        const first = elector('worker-1');
        const second = elector('worker-2');

        expect(await first.tryBecomeLeader()).toBe(true);
        expect(await second.tryBecomeLeader()).toBe(false);
        expect(redis.values.get(key)?.value).toBe('worker-1');
    });

    it('renews its own lease on the next tick', async () => {
        const leader = elector('worker-1', 10);
        await leader.tryBecomeLeader();
        redis.values.set(key, { value: 'worker-1', ttlSeconds: 2 });

        expect(await leader.tryBecomeLeader()).toBe(true);
        expect(redis.values.get(key)?.ttlSeconds).toBe(10);
    });

    it('hands over after the holder releases', async () => {
        const first = elector('worker-1');
        const second = elector('worker-2');
        await first.tryBecomeLeader();

        await first.releaseLeadership();

        expect(await second.tryBecomeLeader()).toBe(true);
    });

    it('does not release a lease held by someone else', async () => {
        const first = elector('worker-1');
        const second = elector('worker-2');
        await first.tryBecomeLeader();

        await second.releaseLeadership();

        expect(redis.values.get(key)?.value).toBe('worker-1');
    });

    it('lets another instance take over once the lease expires', async () => {
        const first = elector('worker-1');
        const second = elector('worker-2');
        await first.tryBecomeLeader();

        redis.expire(key);

        expect(await second.tryBecomeLeader()).toBe(true);
        expect(await first.tryBecomeLeader()).toBe(false);
    });
});
