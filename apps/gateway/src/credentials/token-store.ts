import { Redis } from 'ioredis';

/** Credential tier shared by every gateway instance. */
export interface SharedTokenStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    delete(key: string): Promise<void>;
}

export class RedisTokenStore implements SharedTokenStore {
    constructor(private readonly redis: Redis) { }

    async get(key: string): Promise<string | null> {
        return this.redis.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.redis.set(key, value, 'EX', ttlSeconds);
    }

    async delete(key: string): Promise<void> {
        await this.redis.del(key);
    }
}
