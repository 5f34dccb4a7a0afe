/**
 * Connection management for Postgres and Redis.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string | undefined): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/**
 * Redis client for the shared credential tier and leader election.
 * Commands fail fast while disconnected so credential lookups can degrade
 * to re-authentication instead of queueing.
 */
export function createRedis(url: string): Redis {
    return new Redis(url, {
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        connectTimeout: 5000,
    });
}
