import express, { type ErrorRequestHandler, type Express } from 'express';
import type { Server } from 'node:http';
import { ILogger } from './interfaces';
import { err2Str } from './methods';

/** Volumio 'queue' pushes carry the whole play queue */
export const PUSH_BODY_LIMIT = '10mb';

export interface IPushReceiver {
    handleRawMessage(rawMessage: string): Promise<void>;
    handlePushBody(body: unknown): Promise<void>;
}

export interface IPushAppOptions {
    receiver: IPushReceiver;
    log: ILogger;
    /** address notifications are accepted from; undefined while unknown, then any source is accepted */
    source?: () => string | undefined;
}

/**
 * '::ffff:192.168.1.20' -> '192.168.1.20'
 */
export function normalizeAddress(address: string | undefined): string {
    if (!address) return '';
    return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/**
 * Express app for Volumio push notifications.
 * Volumio posts JSON; relays may forward the raw message ('... body:<base64>') with any other content type.
 */
export function createPushApp(options: IPushAppOptions): Express {
    const { receiver, log, source } = options;
    const app = express();
    app.use(express.json({ limit: PUSH_BODY_LIMIT }));
    app.use(express.text({ type: () => true, limit: PUSH_BODY_LIMIT }));

    app.post('*', (req, res) => {
        const from = normalizeAddress(req.ip ?? req.socket.remoteAddress);
        const expected = source?.();
        if (expected && from !== expected) {
            log.warn(`Push notification from ${from} ignored, Volumio host is ${expected}`);
            res.sendStatus(403);
            return;
        }
        res.sendStatus(200);
        const body: unknown = req.body;
        let handled: Promise<void>;
        if (typeof body === 'string' && body.trim() !== '') {
            handled = receiver.handleRawMessage(body);
        } else if (body !== null && typeof body === 'object' && Object.keys(body).length > 0) {
            handled = receiver.handlePushBody(body);
        } else {
            log.warn('Push notification dropped: empty body');
            return;
        }
        handled.catch((e: unknown) => log.error(`Push notification: ${err2Str(e)}`));
    });

    // body-parser errors: invalid JSON, body too large
    const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
        const status = err instanceof Error && 'status' in err && typeof err.status === 'number' ? err.status : 400;
        log.warn(`Push notification dropped: ${err instanceof Error ? err.message : err2Str(err)}`);
        res.sendStatus(status);
    };
    app.use(onError);
    return app;
}

/**
 * Listen on a port. A failure to bind is logged, push notifications are then not received.
 * @param host - bind address, all interfaces if not given
 */
export async function listenPushApp(app: Express, port: number, log: ILogger, host?: string): Promise<Server> {
    return new Promise<Server>((resolve) => {
        const onListening = (): void => {
            log.debug(`Push notification server is listening on port ${port}`);
            resolve(server);
        };
        const server = host === undefined ? app.listen(port, onListening) : app.listen(port, host, onListening);
        server.on('error', (error: NodeJS.ErrnoException) => {
            if (error.code === 'EADDRINUSE') {
                log.error(`Port ${port} is already in use. Please choose another one. Push notifications will not be received.`);
            } else {
                log.error(`Starting push notification server on port ${port} failed: ${err2Str(error)}`);
            }
            resolve(server);
        });
    });
}
