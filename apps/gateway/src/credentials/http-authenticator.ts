import { AuthenticationExpiredError, ErrorCodes, TransientError } from '@taskgate/sdk';
import { ExternalApiConfig } from '../config';
import { Authenticator, Clock, IssuedCredential } from './credential-cache';

export interface HttpAuthenticatorOptions {
    clock?: Clock;
    fetch?: typeof fetch;
}

/**
 * Credential-issuing endpoint of one external API.
 * POST <baseUrl><authPath> {account_id, secret} → {token, expires_at? | expires_in?}.
 */
export class HttpAuthenticator implements Authenticator {
    private readonly clock: Clock;
    private readonly fetchFn: typeof fetch;

    constructor(private readonly api: ExternalApiConfig, options: HttpAuthenticatorOptions = {}) {
        this.clock = options.clock ?? Date.now;
        this.fetchFn = options.fetch ?? fetch;
    }

    async authenticate(accountId: string): Promise<IssuedCredential> {
        const secret = this.api.accounts[accountId];
        if (secret === undefined) {
            throw new AuthenticationExpiredError(
                `No secret configured for ${this.api.name}/${accountId}`,
                ErrorCodes.AUTH_FAILED,
            );
        }

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.api.timeoutMs);
        const issuedAt = this.clock();

        let response: Response;
        try {
            response = await this.fetchFn(`${this.api.baseUrl}${this.api.authPath}`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ account_id: accountId, secret }),
                signal: controller.signal,
            });
        } catch (err) {
            throw new TransientError(
                `Credential endpoint of ${this.api.name} unreachable: ${err instanceof Error ? err.message : String(err)}`,
                controller.signal.aborted ? ErrorCodes.UPSTREAM_TIMEOUT : ErrorCodes.UPSTREAM_UNAVAILABLE,
            );
        } finally {
            clearTimeout(timeout);
        }

        if (response.status >= 500 || response.status === 429) {
            throw new TransientError(`Credential endpoint of ${this.api.name} returned ${response.status}`);
        }
        if (!response.ok) {
            const text = await response.text();
            throw new AuthenticationExpiredError(
                `Credential endpoint of ${this.api.name} rejected ${accountId}: ${response.status}`,
                ErrorCodes.AUTH_FAILED,
                { status: response.status, body: text },
            );
        }

        const body: unknown = await response.json();
        return this.parse(body, issuedAt);
    }

    private parse(body: unknown, issuedAt: number): IssuedCredential {
        if (typeof body !== 'object' || body === null) {
            throw new AuthenticationExpiredError(`Credential endpoint of ${this.api.name} returned no object`, ErrorCodes.AUTH_FAILED);
        }
        const fields = Object.fromEntries(Object.entries(body));
        const token = fields.token ?? fields.access_token;
        if (typeof token !== 'string' || token.length === 0) {
            throw new AuthenticationExpiredError(`Credential endpoint of ${this.api.name} returned no token`, ErrorCodes.AUTH_FAILED);
        }
        return { token, issuedAt, expiresAt: this.expiry(fields.expires_at, fields.expires_in, issuedAt) };
    }

    private expiry(expiresAt: unknown, expiresIn: unknown, issuedAt: number): number {
        if (typeof expiresAt === 'string') {
            const parsed = Date.parse(expiresAt);
            if (!Number.isNaN(parsed)) return parsed;
        }
        // epoch seconds
        if (typeof expiresAt === 'number' && expiresAt > 0) return expiresAt * 1000;
        if (typeof expiresIn === 'number' && expiresIn > 0) return issuedAt + expiresIn * 1000;
        return issuedAt + this.api.tokenTtlMinutes * 60_000;
    }
}
