import { AuthenticationExpiredError, ErrorCodes, GatewayError } from '@taskgate/sdk';
import { SharedTokenStore } from './token-store';

const TAG = '[credentials]';

export type Clock = () => number;

export interface Credential {
    apiName: string;
    accountId: string;
    token: string;
    issuedAt: number;
    expiresAt: number;
}

/** What a credential-issuing endpoint hands back. Times are epoch ms. */
export interface IssuedCredential {
    token: string;
    expiresAt: number;
    issuedAt?: number;
}

export interface Authenticator {
    authenticate(accountId: string): Promise<IssuedCredential>;
}

export interface CredentialDescription {
    cached: boolean;
    tier: 'local' | 'shared' | null;
    expiresAt: Date | null;
}

export interface CredentialCacheOptions {
    store: SharedTokenStore;
    authenticators: Record<string, Authenticator>;
    safetyMarginMs: number;
    clock?: Clock;
}

export function cacheKey(apiName: string, accountId: string): string {
    return `token:${apiName}:${accountId}`;
}

/**
 * Two-tier bearer credential cache: a local slot per (api, account) in front
 * of a shared store. A credential is never handed out once
 * now >= expiresAt - safetyMarginMs. Full misses are single-flight per key.
 */
export class CredentialCache {
    private readonly slots = new Map<string, Credential>();
    private readonly inflight = new Map<string, Promise<Credential>>();
    /** Bumped by invalidate(); a lookup that started under an older value is discarded. */
    private readonly generations = new Map<string, number>();
    private readonly authenticators: Map<string, Authenticator>;
    private readonly store: SharedTokenStore;
    private readonly safetyMarginMs: number;
    private readonly clock: Clock;

    constructor(options: CredentialCacheOptions) {
        this.store = options.store;
        this.authenticators = new Map(Object.entries(options.authenticators));
        this.safetyMarginMs = options.safetyMarginMs;
        this.clock = options.clock ?? Date.now;
    }

    async acquire(apiName: string, accountId: string): Promise<string> {
        const credential = await this.obtain(apiName, accountId);
        return credential.token;
    }

    async invalidate(apiName: string, accountId: string): Promise<void> {
        const key = cacheKey(apiName, accountId);
        this.generations.set(key, this.generation(key) + 1);
        this.inflight.delete(key);
        this.slots.delete(key);
        try {
            await this.store.delete(key);
        } catch (err) {
            console.warn(`${TAG} shared store unavailable, could not invalidate ${key}:`, errorMessage(err));
        }
        console.log(`${TAG} invalidated ${apiName}/${accountId}`);
    }

    async describe(apiName: string, accountId: string): Promise<CredentialDescription> {
        const key = cacheKey(apiName, accountId);
        const local = this.slots.get(key);
        if (local && this.usable(local)) {
            return { cached: true, tier: 'local', expiresAt: new Date(local.expiresAt) };
        }
        const shared = await this.readShared(key);
        if (shared && this.usable(shared)) {
            return { cached: true, tier: 'shared', expiresAt: new Date(shared.expiresAt) };
        }
        return { cached: false, tier: null, expiresAt: null };
    }

    private usable(credential: Credential): boolean {
        return this.clock() < credential.expiresAt - this.safetyMarginMs;
    }

    private generation(key: string): number {
        return this.generations.get(key) ?? 0;
    }

    private obtain(apiName: string, accountId: string): Promise<Credential> {
        const key = cacheKey(apiName, accountId);

        const local = this.slots.get(key);
        if (local && this.usable(local)) return Promise.resolve(local);
        if (local) this.slots.delete(key);

        const current = this.inflight.get(key);
        if (current) return current;

        const pending: Promise<Credential> = this.resolve(apiName, accountId, key).finally(() => {
            if (this.inflight.get(key) === pending) this.inflight.delete(key);
        });
        this.inflight.set(key, pending);
        return pending;
    }

    private async resolve(apiName: string, accountId: string, key: string): Promise<Credential> {
        const generation = this.generation(key);

        const shared = await this.readShared(key);
        // invalidated while reading: what was read may be the rejected credential
        if (this.generation(key) !== generation) return this.obtain(apiName, accountId);
        if (shared && shared.apiName === apiName && shared.accountId === accountId && this.usable(shared)) {
            this.slots.set(key, shared);
            return shared;
        }

        const credential = await this.authenticate(apiName, accountId);
        if (this.generation(key) !== generation) return this.obtain(apiName, accountId);
        if (!this.usable(credential)) {
            throw new AuthenticationExpiredError(
                `Credential for ${apiName}/${accountId} expires within the safety margin`,
                ErrorCodes.AUTH_TOKEN_UNUSABLE,
                { expiresAt: new Date(credential.expiresAt).toISOString() },
            );
        }
        this.slots.set(key, credential);

        const ttlSeconds = Math.floor((credential.expiresAt - this.clock() - this.safetyMarginMs) / 1000);
        if (ttlSeconds > 0) {
            await this.writeShared(key, credential, ttlSeconds);
        }
        return credential;
    }

    private async authenticate(apiName: string, accountId: string): Promise<Credential> {
        const authenticator = this.authenticators.get(apiName);
        if (!authenticator) {
            throw new Error(`No authenticator configured for API "${apiName}"`);
        }

        let issued: IssuedCredential;
        try {
            issued = await authenticator.authenticate(accountId);
        } catch (err) {
            if (err instanceof GatewayError) throw err;
            throw new AuthenticationExpiredError(
                `Authentication against ${apiName} failed: ${errorMessage(err)}`,
                ErrorCodes.AUTH_FAILED,
            );
        }

        console.log(`${TAG} authenticated ${apiName}/${accountId}, expires ${new Date(issued.expiresAt).toISOString()}`);
        return {
            apiName,
            accountId,
            token: issued.token,
            issuedAt: issued.issuedAt ?? this.clock(),
            expiresAt: issued.expiresAt,
        };
    }

    // Any shared-tier failure is a miss; the caller re-authenticates.
    private async readShared(key: string): Promise<Credential | null> {
        let raw: string | null;
        try {
            raw = await this.store.get(key);
        } catch (err) {
            console.warn(`${TAG} shared store unavailable, treating ${key} as a miss:`, errorMessage(err));
            return null;
        }
        return raw ? parseCredential(raw) : null;
    }

    private async writeShared(key: string, credential: Credential, ttlSeconds: number): Promise<void> {
        try {
            await this.store.set(key, JSON.stringify(credential), ttlSeconds);
        } catch (err) {
            console.warn(`${TAG} shared store unavailable, ${key} cached locally only:`, errorMessage(err));
        }
    }
}

function parseCredential(raw: string): Credential | null {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return null;
    }
    if (typeof value !== 'object' || value === null) return null;
    const { apiName, accountId, token, issuedAt, expiresAt } = Object.fromEntries(Object.entries(value));
    if (
        typeof apiName !== 'string' ||
        typeof accountId !== 'string' ||
        typeof token !== 'string' ||
        typeof issuedAt !== 'number' ||
        typeof expiresAt !== 'number'
    ) {
        return null;
    }
    return { apiName, accountId, token, issuedAt, expiresAt };
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
