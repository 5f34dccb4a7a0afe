import { AuthenticationExpiredError, ErrorCodes, TransientError } from '@taskgate/sdk';
import { HttpAuthenticator } from '../../src/credentials/http-authenticator';
import { ExternalApiConfig } from '../../src/config';

const api: ExternalApiConfig = {
    name: 'cpj',
    baseUrl: 'https://cpj.test',
    authPath: '/auth/token',
    defaultAccount: 'main',
    accounts: { main: 'test-secret' },
    tokenTtlMinutes: 30,
    timeoutMs: 1000,
    forbiddenIsAuth: true,
    callClasses: {},
};

const NOW = Date.parse('2026-01-10T12:00:00.000Z');

function reply(status: number, body: unknown) {
    return jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () =>
        new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }),
    );
}

describe('HttpAuthenticator', () => {
    it('posts the account secret and reads an ISO expiry', async () => {
        const fetchMock = reply(200, { token: 'tok-a', expires_at: '2026-01-10T13:00:00.000Z' });
        const auth = new HttpAuthenticator(api, { clock: () => NOW, fetch: fetchMock });

        const credential = await auth.authenticate('main');

        expect(credential).toEqual({ token: 'tok-a', issuedAt: NOW, expiresAt: NOW + 3600_000 });
        expect(fetchMock.mock.calls[0]?.[0]).toBe('https://cpj.test/auth/token');
        expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
        expect(fetchMock.mock.calls[0]?.[1]?.body).toBe('{"account_id":"main","secret":"test-secret"}');
    });

    it('accepts access_token with expires_in seconds', async () => {
        const auth = new HttpAuthenticator(api, { clock: () => NOW, fetch: reply(200, { access_token: 'tok-b', expires_in: 600 }) });

        await expect(auth.authenticate('main')).resolves.toEqual({ token: 'tok-b', issuedAt: NOW, expiresAt: NOW + 600_000 });
    });

    it('reads expires_at given as epoch seconds', async () => {
        const auth = new HttpAuthenticator(api, { clock: () => NOW, fetch: reply(200, { token: 'tok-c', expires_at: NOW / 1000 + 120 }) });

        const credential = await auth.authenticate('main');
        expect(credential.expiresAt).toBe(NOW + 120_000);
    });

    it('falls back to the configured lifetime when no expiry is reported', async () => {
        const auth = new HttpAuthenticator(api, { clock: () => NOW, fetch: reply(200, { token: 'tok-d' }) });

        const credential = await auth.authenticate('main');
        expect(credential.expiresAt).toBe(NOW + 30 * 60_000);
    });

    it('fails without calling out when the account has no secret', async () => {
        const fetchMock = reply(200, { token: 'never' });
        const auth = new HttpAuthenticator(api, { fetch: fetchMock });

        await expect(auth.authenticate('other')).rejects.toMatchObject({ code: ErrorCodes.AUTH_FAILED });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('maps a rejected secret to AUTH_FAILED with the status', async () => {
        const auth = new HttpAuthenticator(api, { fetch: reply(401, 'bad secret') });

        const attempt = auth.authenticate('main');
        await expect(attempt).rejects.toBeInstanceOf(AuthenticationExpiredError);
        await expect(attempt).rejects.toMatchObject({
            code: ErrorCodes.AUTH_FAILED,
            details: { status: 401, body: 'bad secret' },
        });
    });

    it('treats 5xx and 429 from the credential endpoint as transient', async () => {
        await expect(new HttpAuthenticator(api, { fetch: reply(503, {}) }).authenticate('main')).rejects.toBeInstanceOf(TransientError);
        await expect(new HttpAuthenticator(api, { fetch: reply(429, {}) }).authenticate('main')).rejects.toBeInstanceOf(TransientError);
    });

    it('treats an unreachable endpoint as transient', async () => {
        const fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () => {
            throw new Error('getaddrinfo ENOTFOUND cpj.test');
        });
        const auth = new HttpAuthenticator(api, { fetch: fetchMock });

        await expect(auth.authenticate('main')).rejects.toMatchObject({
            code: ErrorCodes.UPSTREAM_UNAVAILABLE,
            message: 'Credential endpoint of cpj unreachable: getaddrinfo ENOTFOUND cpj.test',
        });
    });

    it('rejects an answer without a token', async () => {
        const auth = new HttpAuthenticator(api, { fetch: reply(200, { expires_in: 60 }) });

        await expect(auth.authenticate('main')).rejects.toThrow('Credential endpoint of cpj returned no token');
    });
});
