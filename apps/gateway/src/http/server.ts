import http from 'http';
import express, { Express, NextFunction, Request, Response, Router } from 'express';
import { GatewayError } from '@taskgate/sdk';
import { CallbackCorrelator } from '../services/callback-correlator';
import { HealthService } from '../grpc/health.service';
import { CredentialDescription } from '../credentials/credential-cache';

const TAG = '[http]';

interface CallbackAckResponse {
    received: true;
    callback_id: string;
    duplicate: boolean;
}

export interface CredentialStatus extends CredentialDescription {
    api: string;
    account: string;
}

/** Cache state of each API's default account, shown on /health. Never includes the token. */
export type CredentialReport = () => Promise<CredentialStatus[]>;

// =============================================================================
// ROUTES
// =============================================================================

export function createRoutes(correlator: CallbackCorrelator, health: HealthService, credentials?: CredentialReport): Router {
    const router = Router();

    // The answer only ever says "received": correlation happens after the record is stored.
    router.post('/callbacks/:source', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { source } = req.params;
            if (!source || !correlator.hasSource(source)) {
                res.status(404).json({ error: `Unknown callback source "${source}"` });
                return;
            }

            const body: unknown = req.body;
            if (typeof body !== 'object' || body === null || Array.isArray(body)) {
                res.status(400).json({ error: 'Callback body must be a JSON object', code: 'INVALID_PAYLOAD' });
                return;
            }

            const result = await correlator.receive(source, Object.fromEntries(Object.entries(body)));
            const ack: CallbackAckResponse = {
                received: true,
                callback_id: result.callbackId,
                duplicate: result.duplicate,
            };
            res.status(202).json(ack);
        } catch (error) {
            next(error);
        }
    });

    router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const report = await health.report();
            res.status(report.status === 'SERVING' ? 200 : 503).json({
                ...report,
                ...(credentials ? { credentials: await credentials() } : {}),
                timestamp: Date.now(),
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler() {
    return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof GatewayError && err.errorClass === 'validation') {
            res.status(400).json({ error: err.message, code: err.code });
            return;
        }
        // body-parser marks malformed JSON with a 4xx status
        if ('status' in err && err.status === 400) {
            res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_PAYLOAD' });
            return;
        }

        console.error(`${TAG} unhandled error:`, err);
        res.status(500).json({ error: 'Internal server error' });
    };
}

export function createHttpApp(correlator: CallbackCorrelator, health: HealthService, credentials?: CredentialReport): Express {
    const app = express();
    app.use(express.json({ limit: '1mb' }));
    app.use(createRoutes(correlator, health, credentials));
    app.use(errorHandler());
    return app;
}

export function startHttpServer(app: Express, port: number): Promise<http.Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            console.log(`[taskgate] http server listening on port ${port}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}

export function stopHttpServer(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}
