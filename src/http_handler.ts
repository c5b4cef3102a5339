// src/http_handler.ts

import * as net from 'net';
import { TCPConn } from './conn';
import { readBody, readHeaders, readRequestLine, RequestLine } from './http_parser';
import { HTTPResponse } from './http_writer';
import { describeError, Logger } from './logger';
import { RouteTable } from './router';
import {
    CancelledError,
    ConnectionError,
    FileProvider,
    HTTPError,
    HTTPRequest,
    TimeoutError,
} from './types';

// What a connection task needs from the server that owns it.
export interface ServerContext {
    routes: RouteTable;
    requestTimeoutMs: number;
    debug: boolean;
    logger: Logger;
    files: FileProvider;
}

// The parts of one exchange the failure path needs to see.
interface Exchange {
    line?: RequestLine;
    res: HTTPResponse;
}

const NO_HEADERS = { parseHeaders: false, saveHeaders: new Set<string>() };

function isTeardown(err: unknown): boolean {
    return err instanceof TimeoutError || err instanceof CancelledError || err instanceof ConnectionError;
}

// Settles like `work`, unless the signal fires first. Work that is
// abandoned this way is only logged.
function untilAborted<T>(work: Promise<T>, signal: AbortSignal, onAbandoned: (err: unknown) => void): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }
        work.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                if (signal.aborted) onAbandoned(err);
                reject(err);
            },
        );
    });
}

// Parse -> route -> dispatch for the single request a connection carries.
async function serveRequest(
    conn: TCPConn,
    ctx: ServerContext,
    signal: AbortSignal,
    exchange: Exchange,
    parsed: () => void,
): Promise<void> {
    const line = await readRequestLine(conn);
    exchange.line = line;
    const omitBody = line.method === 'HEAD';
    exchange.res = new HTTPResponse(conn, { files: ctx.files, omitBody });
    ctx.logger.debug('request line', { method: line.method, path: line.path });

    const resolution = ctx.routes.resolve(line.method, line.path);
    if (resolution.kind !== 'found') {
        // Headers are still consumed so the reply is not cut short by a reset.
        await readHeaders(conn, NO_HEADERS);
        parsed();
        if (resolution.kind === 'not-found') {
            await exchange.res.error(404);
            return;
        }
        const { route } = resolution;
        if (line.method === 'OPTIONS' && route.accessControl) {
            // CORS preflight
            exchange.res = new HTTPResponse(conn, { accessControl: route.accessControl, methods: route.methods, files: ctx.files, omitBody });
            exchange.res.setHeader('Content-Length', '0');
            await exchange.res.start();
            return;
        }
        await exchange.res.error(405);
        return;
    }

    const { route, params } = resolution;
    const headers = await readHeaders(conn, route);
    const body = await readBody(conn, line.method, headers, route.maxBodySize);
    parsed();

    const req: HTTPRequest = { ...line, headers, body, params, signal };
    const res = new HTTPResponse(conn, { accessControl: route.accessControl, methods: route.methods, files: ctx.files, omitBody });
    exchange.res = res;

    const work = Promise.resolve().then(() => route.handler(req, res));
    await untilAborted(work, signal, (err) => ctx.logger.debug('abandoned handler failed', describeError(err)));
    if (!res.started) {
        await res.start();
    }
}

// Answers a failure that happened before anything was written.
async function replyToFailure(err: unknown, exchange: Exchange, ctx: ServerContext): Promise<void> {
    const { res } = exchange;
    if (err instanceof HTTPError) {
        ctx.logger.debug('request failed', { status: err.statusCode, ...describeError(err) });
        await res.error(err.statusCode);
        return;
    }
    ctx.logger.error('handler failed', { path: exchange.line?.path, ...describeError(err) });
    const detail = ctx.debug && err instanceof Error ? err.stack ?? err.message : undefined;
    await res.error(500, detail);
}

type Ending = 'close' | 'destroy' | 'reset';

// Owns one accepted socket for its whole lifetime. Never rejects.
export async function handleConnection(socket: net.Socket, ctx: ServerContext, controller: AbortController): Promise<void> {
    const startedAt = Date.now();
    const conn = new TCPConn(socket, controller.signal);
    const exchange: Exchange = { res: new HTTPResponse(conn, { files: ctx.files }) };
    const timer = setTimeout(() => controller.abort(new TimeoutError()), ctx.requestTimeoutMs);
    let ending: Ending = 'close';

    try {
        await serveRequest(conn, ctx, controller.signal, exchange, () => clearTimeout(timer));
    } catch (e) {
        if (isTeardown(e) || controller.signal.aborted) {
            ctx.logger.debug('connection dropped', describeError(e));
            ending = 'destroy';
        } else if (exchange.res.started) {
            // Part of the response is already out; nothing can repair it.
            ctx.logger.error('response broken off', { path: exchange.line?.path, ...describeError(e) });
            ending = 'reset';
        } else {
            try {
                await replyToFailure(e, exchange, ctx);
            } catch (writeErr) {
                ctx.logger.debug('error reply failed', describeError(writeErr));
                ending = 'destroy';
            }
        }
    } finally {
        clearTimeout(timer);
        exchange.res.finish();
        if (controller.signal.aborted) {
            conn.destroy();
        } else if (ending === 'close') {
            await conn.close();
        } else if (ending === 'reset') {
            conn.reset();
        } else {
            conn.destroy();
        }
    }

    if (exchange.line) {
        ctx.logger.info('request', {
            method: exchange.line.method,
            path: exchange.line.path,
            status: ending === 'close' ? exchange.res.code : undefined,
            durationMs: Date.now() - startedAt,
        });
    }
}
